import type { Instruction, JumpTable } from './types';
import { baseMnemonic } from './operands';

const SLOT_SIZE = 4;

/** Instructions that may be directly followed by an inline jump table. */
export function isJumpTableTrigger(insn: Instruction): boolean {
  const mnemonic = baseMnemonic(insn.mnemonic);
  return mnemonic === 'nop' || mnemonic === 'jmp';
}

/**
 * Naive inline jump table detection: consecutive little-endian dwords whose
 * value falls inside [begin, end] are taken as table slots. A data constant
 * that happens to land in that range is indistinguishable from a real slot.
 *
 * @param data    backing bytes of the section
 * @param offset  section offset right after the triggering instruction
 * @param anchor  runtime address at `offset`
 */
export function scanJumpTable(
  data: Uint8Array,
  offset: number,
  anchor: number,
  begin: number,
  end: number,
): JumpTable | null {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const targets: number[] = [];
  let cursor = offset;

  while (cursor >= 0 && cursor + SLOT_SIZE <= data.length) {
    const value = view.getUint32(cursor, true);
    if (value < begin || value > end) break;
    targets.push(value);
    cursor += SLOT_SIZE;
  }

  if (targets.length === 0) return null;
  return { anchor, targets, byteLength: targets.length * SLOT_SIZE };
}
