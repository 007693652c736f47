import { writeFile } from 'node:fs/promises';
import { Command, Option } from 'commander';
import pk from '../package.json';
import type { FunctionRange, MachineMode } from './disasm/types';
import { CapstoneDecoder } from './disasm/decoder';
import { DisassemblyEngine, type FunctionDisassembly } from './disasm/engine';
import { DisasmError } from './disasm/errors';
import { ASM_FORMATS, FunctionSetup, type AsmFormat } from './disasm/setup';
import type { ExecutableImage } from './image/image';
import { loadImage } from './image/config';
import { parseNumber } from './utils/hex';

const MACHINE_MODES: MachineMode[] = ['long64', 'compat32', 'legacy32', 'compat16', 'legacy16', 'real16'];

interface CliOptions {
  section: string;
  function: string[];
  range: string[];
  all?: boolean;
  format: AsmFormat;
  mode: MachineMode;
  labels?: boolean;
  output?: string;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseRange(text: string, section: string): FunctionRange {
  const parts = text.split(':');
  const begin = parts.length === 2 ? parseNumber(parts[0]) : null;
  const end = parts.length === 2 ? parseNumber(parts[1]) : null;
  if (begin === null || end === null) {
    throw new DisasmError('invalid-argument', `Expected <begin>:<end>, got "${text}"`);
  }
  return { beginAddress: begin, endAddress: end, section };
}

/** Symbols cover [address, address + size); ranges are inclusive. */
function selectRanges(image: ExecutableImage, opts: CliOptions): FunctionRange[] {
  const ranges: FunctionRange[] = opts.range.map((r) => parseRange(r, opts.section));

  for (const name of opts.function) {
    const sym = image.symbolByName(name);
    if (!sym) throw new DisasmError('invalid-argument', `Unknown function symbol: ${name}`);
    if (sym.size === 0) throw new DisasmError('invalid-argument', `Symbol ${name} has no size`);
    ranges.push({ beginAddress: sym.address, endAddress: sym.address + sym.size - 1, section: opts.section });
  }

  if (opts.all) {
    const start = image.sectionAddress(opts.section);
    const end = image.sectionEnd(opts.section);
    for (const sym of image.symbols.all()) {
      if (sym.size > 0 && sym.address >= start && sym.address < end) {
        ranges.push({ beginAddress: sym.address, endAddress: sym.address + sym.size - 1, section: opts.section });
      }
    }
  }

  return ranges;
}

function render(image: ExecutableImage, fn: FunctionDisassembly, withLabels: boolean): string {
  const { beginAddress, endAddress } = fn.range;
  const sym = image.exactSymbolAt(beginAddress);
  const name = sym ? sym.name : `sub_${beginAddress.toString(16)}`;

  let out = `; ${name} [0x${beginAddress.toString(16)}, 0x${endAddress.toString(16)}]\n`;
  if (withLabels) {
    for (const [address, label] of fn.labels.entries()) {
      out += `; ${label} = 0x${address.toString(16)}\n`;
    }
  }
  out += `${name}:\n${fn.text}`;
  return out;
}

async function run(file: string, opts: CliOptions): Promise<void> {
  const image = await loadImage(file);
  const ranges = selectRanges(image, opts);
  if (ranges.length === 0) {
    throw new DisasmError('invalid-argument', 'Nothing to disassemble: pass --function, --range or --all');
  }

  const decoder = await CapstoneDecoder.create(opts.mode);
  try {
    const engine = new DisassemblyEngine(new FunctionSetup(image, decoder, opts.format));
    const chunks: string[] = [];

    for await (const fn of engine.disassembleAll(ranges)) {
      if (fn.truncatedAt !== null) {
        console.warn(`warning: decoding stopped at 0x${fn.truncatedAt.toString(16)}`);
      }
      if (opts.verbose) {
        console.error(
          `[disasm] 0x${fn.range.beginAddress.toString(16)}: ${fn.instructions.length} instructions, ` +
            `${fn.labels.size} labels, ${fn.jumpTables.length} jump tables`,
        );
      }
      chunks.push(render(image, fn, !!opts.labels));
    }

    const text = chunks.join('\n');
    if (opts.output) {
      await writeFile(opts.output, text);
    } else {
      process.stdout.write(text);
    }
  } finally {
    decoder.close();
  }
}

function main() {
  const program = new Command();
  program
    .name('symbolic-disasm')
    .version(pk.version)
    .description('Disassemble functions of a loaded image into label- and symbol-annotated assembly')
    .argument('<image>', 'JSON image description')
    .option('-s, --section <name>', 'section holding the functions', '.text')
    .option('-f, --function <symbol>', 'function to disassemble, by symbol name', collect, [])
    .option('-r, --range <begin:end>', 'inclusive address range to disassemble', collect, [])
    .option('-a, --all', 'disassemble every sized symbol in the section')
    .addOption(new Option('--format <format>', 'output syntax').choices(ASM_FORMATS).default('default'))
    .addOption(new Option('-m, --mode <mode>', 'machine mode').choices(MACHINE_MODES).default('legacy32'))
    .option('-l, --labels', 'list each function\'s label table')
    .option('-o, --output <file>', 'write to a file instead of stdout')
    .option('--verbose', 'print per-function statistics');

  program.parse();

  const [file] = program.args;
  run(file, program.opts<CliOptions>()).catch((e: unknown) => {
    if (e instanceof DisasmError) {
      console.error(`error: ${e.message}`);
    } else {
      console.error(e);
    }
    process.exitCode = 1;
  });
}
main();
