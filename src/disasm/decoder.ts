import { Const, Capstone, loadCapstone, type CapstoneInstruction } from 'capstone-wasm';
import type { Decoder, Instruction, MachineMode, StackWidth } from './types';
import { parseOperands } from './operands';
import { DisasmError } from './errors';

// Longest legal x86 encoding
const MAX_INSTRUCTION_LENGTH = 15;

export function stackWidthFor(mode: MachineMode): StackWidth {
  switch (mode) {
    case 'long64':
      return 64;
    case 'compat32':
    case 'legacy32':
      return 32;
    case 'compat16':
    case 'legacy16':
    case 'real16':
      return 16;
    default:
      throw new DisasmError('invalid-argument', `Unsupported machine mode: ${String(mode)}`);
  }
}

let capstoneReady: Promise<void> | null = null;

function ensureCapstone(): Promise<void> {
  if (!capstoneReady) capstoneReady = loadCapstone();
  return capstoneReady;
}

/**
 * x86 decoder backed by the Capstone wasm build.
 */
export class CapstoneDecoder implements Decoder {
  readonly machineMode: MachineMode;
  private cs: Capstone;

  private constructor(cs: Capstone, mode: MachineMode) {
    this.cs = cs;
    this.machineMode = mode;
  }

  static async create(mode: MachineMode): Promise<CapstoneDecoder> {
    const width = stackWidthFor(mode);
    await ensureCapstone();
    const csMode = width === 64 ? Const.CS_MODE_64 : width === 32 ? Const.CS_MODE_32 : Const.CS_MODE_16;
    return new CapstoneDecoder(new Capstone(Const.CS_ARCH_X86, csMode), mode);
  }

  decode(buffer: Uint8Array, runtimeAddress: number): Instruction | null {
    if (buffer.length === 0) return null;

    const window = buffer.subarray(0, MAX_INSTRUCTION_LENGTH);
    let insns: CapstoneInstruction[];
    try {
      insns = this.cs.disasm(window, { address: runtimeAddress });
    } catch {
      // Capstone throws on some malformed input instead of returning nothing
      return null;
    }

    const insn = insns[0];
    if (!insn || insn.address !== runtimeAddress) return null;

    return {
      address: insn.address,
      bytes: new Uint8Array(insn.bytes),
      mnemonic: insn.mnemonic,
      size: insn.size,
      operands: parseOperands(insn.mnemonic, insn.opStr, insn.address, insn.size),
    };
  }

  close(): void {
    this.cs.close();
  }
}
