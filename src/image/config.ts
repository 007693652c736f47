import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { ExeSection, ExeSymbol } from './types';
import { ExecutableImage } from './image';
import { DisasmError } from '../disasm/errors';
import { parseNumber } from '../utils/hex';

/*
 * Image description format:
 *
 * {
 *   "imageBase": "0x400000",            optional, defaults to the lowest section
 *   "imageEnd": "0x40a000",             optional, defaults to the highest section end
 *   "sections": [
 *     { "name": ".text", "address": "0x401000", "kind": "code",
 *       "file": "image.bin", "offset": "0x400", "size": "0x2000" },
 *     { "name": ".data", "address": "0x403000", "kind": "data", "hex": "00 01 02 03" }
 *   ],
 *   "symbols": [ { "name": "main", "address": "0x401000", "size": 64 } ]
 * }
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAddress(value: unknown, field: string): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? parseNumber(value) : null;
  if (n === null || !Number.isSafeInteger(n) || n < 0) {
    throw new DisasmError('config', `${field}: expected a non-negative integer or 0x string`);
  }
  return n;
}

function readOptionalAddress(value: unknown, field: string): number | undefined {
  return value === undefined ? undefined : readAddress(value, field);
}

function readString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new DisasmError('config', `${field}: expected a non-empty string`);
  }
  return value;
}

function parseHexBytes(text: string, field: string): Uint8Array {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(compact)) {
    throw new DisasmError('config', `${field}: expected pairs of hex digits`);
  }
  const bytes = new Uint8Array(compact.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(compact.substring(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

async function loadSection(raw: unknown, index: number, baseDir: string): Promise<ExeSection> {
  const field = `sections[${index}]`;
  if (!isRecord(raw)) throw new DisasmError('config', `${field}: expected an object`);

  const name = readString(raw.name, `${field}.name`);
  const address = readAddress(raw.address, `${field}.address`);
  const kind = raw.kind ?? 'code';
  if (kind !== 'code' && kind !== 'data') {
    throw new DisasmError('config', `${field}.kind: expected "code" or "data"`);
  }

  let data: Uint8Array;
  if (typeof raw.hex === 'string') {
    data = parseHexBytes(raw.hex, `${field}.hex`);
  } else if (raw.file !== undefined) {
    const path = resolve(baseDir, readString(raw.file, `${field}.file`));
    const contents = new Uint8Array(await readFile(path));
    const offset = readOptionalAddress(raw.offset, `${field}.offset`) ?? 0;
    const size = readOptionalAddress(raw.size, `${field}.size`) ?? contents.length - offset;
    if (offset + size > contents.length) {
      throw new DisasmError('config', `${field}: ${size} bytes at offset ${offset} exceed ${path}`);
    }
    data = contents.subarray(offset, offset + size);
  } else {
    throw new DisasmError('config', `${field}: needs either "file" or "hex"`);
  }

  return { name, address, data, kind };
}

function loadSymbol(raw: unknown, index: number): ExeSymbol {
  const field = `symbols[${index}]`;
  if (!isRecord(raw)) throw new DisasmError('config', `${field}: expected an object`);
  return {
    name: readString(raw.name, `${field}.name`),
    address: readAddress(raw.address, `${field}.address`),
    size: readOptionalAddress(raw.size, `${field}.size`) ?? 0,
  };
}

/**
 * Build an image from an already parsed description. Relative section files
 * resolve against `baseDir`.
 */
export async function imageFromDescription(description: unknown, baseDir: string): Promise<ExecutableImage> {
  if (!isRecord(description)) throw new DisasmError('config', 'image description: expected an object');
  if (!Array.isArray(description.sections)) throw new DisasmError('config', 'sections: expected an array');

  const rawSections: unknown[] = description.sections;
  const sections = await Promise.all(rawSections.map((s, i) => loadSection(s, i, baseDir)));

  const symbolList = description.symbols ?? [];
  if (!Array.isArray(symbolList)) throw new DisasmError('config', 'symbols: expected an array');
  const rawSymbols: unknown[] = symbolList;

  return new ExecutableImage(sections, rawSymbols.map(loadSymbol), {
    imageBase: readOptionalAddress(description.imageBase, 'imageBase'),
    imageEnd: readOptionalAddress(description.imageEnd, 'imageEnd'),
  });
}

export async function loadImage(descriptionPath: string): Promise<ExecutableImage> {
  const text = await readFile(descriptionPath, 'utf8');
  let description: unknown;
  try {
    description = JSON.parse(text);
  } catch (e) {
    throw new DisasmError('config', `${descriptionPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return imageFromDescription(description, dirname(resolve(descriptionPath)));
}
