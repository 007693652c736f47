import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { FunctionRange, Instruction, InstructionData, JumpTable } from './types';
import type { FunctionSetup } from './setup';
import { LabelTable } from './labels';
import { isJumpTableTrigger, scanJumpTable } from './jumpTable';
import { isJumpMnemonic, relativeTarget } from './operands';
import { AddressResolver, createSymbolHooks } from './resolver';
import { DisasmError } from './errors';

const INDENT = '    ';

export interface FunctionDisassembly {
  range: FunctionRange;
  text: string;
  labels: LabelTable;
  instructions: InstructionData[];
  jumpTables: JumpTable[];
  /** Address where decoding failed, or null when the pass ran to completion. */
  truncatedAt: number | null;
}

interface PassVisitor {
  instruction(insn: Instruction, address: number): void;
  jumpTable(table: JumpTable): void;
}

interface PassBounds {
  data: Uint8Array;
  sectionAddress: number;
  begin: number;
  end: number;
}

/**
 * Walk [begin, end] once, decoding linearly and stepping over inline jump
 * tables. Both passes go through here so they see the same instruction stream.
 */
function traverse(setup: FunctionSetup, bounds: PassBounds, visitor: PassVisitor): number | null {
  const { data, sectionAddress, begin, end } = bounds;
  let address = begin;

  while (address <= end) {
    const offset = address - sectionAddress;
    if (offset >= data.length) return null;

    const insn = setup.decoder.decode(data.subarray(offset), address);
    if (!insn) return address;

    visitor.instruction(insn, address);
    address += insn.size;

    if (isJumpTableTrigger(insn)) {
      const table = scanJumpTable(data, address - sectionAddress, address, begin, end);
      if (table) {
        visitor.jumpTable(table);
        address += table.byteLength;
      }
    }
  }

  return null;
}

function validateRange(range: FunctionRange): void {
  const { beginAddress, endAddress } = range;
  if (!Number.isSafeInteger(beginAddress) || !Number.isSafeInteger(endAddress) || beginAddress < 0) {
    throw new DisasmError('invalid-argument', `Invalid function range ${beginAddress}..${endAddress}`);
  }
  if (beginAddress > endAddress) {
    throw new DisasmError(
      'invalid-argument',
      `Function begins after it ends: 0x${beginAddress.toString(16)} > 0x${endAddress.toString(16)}`,
    );
  }
}

export class DisassemblyEngine {
  private static BATCH_SIZE = 64;

  constructor(private readonly setup: FunctionSetup) {}

  disassemble(range: FunctionRange): FunctionDisassembly {
    validateRange(range);

    const labels = new LabelTable();
    const result: FunctionDisassembly = {
      range,
      text: '',
      labels,
      instructions: [],
      jumpTables: [],
      truncatedAt: null,
    };

    const image = this.setup.image;
    if (image.sectionSize(range.section) === 0) return result;

    const sectionAddress = image.sectionAddress(range.section);
    if (range.beginAddress < sectionAddress || range.beginAddress >= image.sectionEnd(range.section)) {
      return result;
    }

    const bounds: PassBounds = {
      data: image.sectionData(range.section),
      sectionAddress,
      begin: range.beginAddress,
      end: range.endAddress,
    };

    this.discoverLabels(bounds, labels);
    result.truncatedAt = this.emit(bounds, range.section, labels, result);
    return result;
  }

  /**
   * Disassemble many functions, giving the event loop a turn after every batch.
   */
  async *disassembleAll(
    ranges: Iterable<FunctionRange>,
    batchSize: number = DisassemblyEngine.BATCH_SIZE,
  ): AsyncGenerator<FunctionDisassembly> {
    let done = 0;
    for (const range of ranges) {
      yield this.disassemble(range);
      if (++done % batchSize === 0) await yieldToEventLoop();
    }
  }

  // Pass 1: labels for in-range branch targets and jump tables
  private discoverLabels(bounds: PassBounds, labels: LabelTable): void {
    const { begin, end } = bounds;

    traverse(this.setup, bounds, {
      instruction: (insn) => {
        const target = relativeTarget(insn);
        if (target !== null && target >= begin && target <= end) {
          labels.insert(target);
        }
      },
      jumpTable: (table) => {
        if (table.anchor >= begin && table.anchor <= end) {
          labels.insert(table.anchor);
        }
        for (const target of table.targets) labels.insert(target);
      },
    });
  }

  // Pass 2: formatted text with symbol substitution
  private emit(bounds: PassBounds, section: string, labels: LabelTable, result: FunctionDisassembly): number | null {
    const { formatter, defaults, image } = this.setup;
    const hooks = createSymbolHooks(new AddressResolver(labels, image, section), defaults);
    const lines: string[] = [];

    const truncatedAt = traverse(this.setup, bounds, {
      instruction: (insn, address) => {
        const label = labels.nameAt(address);
        if (label !== undefined) lines.push(`${label}:`);

        const text = formatter.format(insn, address, hooks);
        lines.push(INDENT + text);

        const target = isJumpMnemonic(insn.mnemonic) ? relativeTarget(insn) : null;
        const data: InstructionData = {
          address,
          size: insn.size,
          mnemonic: insn.mnemonic,
          text,
          isJump: target !== null,
          jumpLength: target !== null ? target - address : 0,
        };
        if (label !== undefined) data.label = label;
        result.instructions.push(data);
      },
      jumpTable: (table) => {
        const anchor = labels.nameAt(table.anchor);
        if (anchor !== undefined) lines.push(`${anchor}:`);
        for (const target of table.targets) {
          const name = labels.nameAt(target);
          if (name !== undefined) lines.push(`${INDENT}.int ${name}`);
        }
        result.jumpTables.push(table);
      },
    });

    result.text = lines.map((line) => line + '\n').join('');
    return truncatedAt;
  }
}
