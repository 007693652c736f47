import type { Instruction, MemoryOperand, Operand } from './types';
import { parseNumber } from '../utils/hex';

const MEMORY_SIZES: Record<string, number> = {
  byte: 1,
  word: 2,
  dword: 4,
  fword: 6,
  qword: 8,
  tbyte: 10,
  xword: 10,
  xmmword: 16,
  ymmword: 32,
  zmmword: 64,
};

export function memorySizeKeyword(size: number): string | undefined {
  for (const [keyword, bytes] of Object.entries(MEMORY_SIZES)) {
    if (bytes === size) return keyword;
  }
  return undefined;
}

// Prefixes the decoder folds into the mnemonic text ("bnd jmp", "rep stosd")
const PREFIXES = new Set(['bnd', 'notrack', 'lock', 'rep', 'repe', 'repne', 'repz', 'repnz', 'xacquire', 'xrelease']);

/** The mnemonic with any leading prefixes removed. */
export function baseMnemonic(mnemonic: string): string {
  const words = mnemonic.trim().split(/\s+/);
  let i = 0;
  while (i < words.length - 1 && PREFIXES.has(words[i])) i++;
  return words.slice(i).join(' ');
}

/**
 * Branches whose immediate operand is encoded relative to the next instruction.
 */
export function isBranchMnemonic(mnemonic: string): boolean {
  const base = baseMnemonic(mnemonic);
  return base === 'call' || base.startsWith('j') || base.startsWith('loop') || base === 'xbegin';
}

export function isJumpMnemonic(mnemonic: string): boolean {
  const base = baseMnemonic(mnemonic);
  return base.startsWith('j') || base.startsWith('loop');
}

export function isRipRelative(op: MemoryOperand): boolean {
  return op.base === 'rip' || op.base === 'eip';
}

/**
 * Absolute address an operand refers to, as seen from `runtimeAddress`.
 * Relative immediates and RIP-relative memory are measured from the end of
 * the instruction; everything else carries its address directly.
 */
export function calcAbsoluteAddress(insn: Instruction, op: Operand, runtimeAddress: number): number {
  const next = runtimeAddress + insn.size;
  switch (op.kind) {
    case 'immediate':
      return op.isRelative ? next + op.value : op.value;
    case 'memory':
      return isRipRelative(op) ? next + op.disp : op.disp;
    case 'pointer':
      return op.offset;
    case 'register':
      return 0;
  }
}

/** First relative immediate of the instruction, resolved to its target. */
export function relativeTarget(insn: Instruction): number | null {
  for (const op of insn.operands) {
    if (op.kind === 'immediate' && op.isRelative) {
      return calcAbsoluteAddress(insn, op, insn.address);
    }
  }
  return null;
}

function splitOperands(opStr: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of opStr) {
    if (ch === '[') depth++;
    if (ch === ']') depth--;
    if (ch === ',' && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  if (current.trim()) parts.push(current.trim());
  return parts;
}

function parseMemory(size: string | undefined, segment: string | undefined, inner: string): MemoryOperand {
  const op: MemoryOperand = { kind: 'memory', scale: 1, disp: 0 };
  if (size) {
    const keyword = size.toLowerCase();
    const bytes = MEMORY_SIZES[keyword];
    if (bytes !== undefined) op.size = bytes;
    op.sizeKeyword = keyword;
  }
  if (segment) op.segment = segment.toLowerCase();

  // Terms: "ebx", "ecx*4", "0x10", each optionally preceded by a sign
  for (const m of inner.matchAll(/([+-])?\s*([^+\-\s]+)/g)) {
    const sign = m[1] === '-' ? -1 : 1;
    const term = m[2].toLowerCase();
    const scaled = term.match(/^(\w+)\*(\d+)$/);
    if (scaled) {
      op.index = scaled[1];
      op.scale = parseInt(scaled[2], 10);
      continue;
    }
    const value = parseNumber(term);
    if (value !== null) {
      op.disp += sign * value;
    } else if (op.base === undefined) {
      op.base = term;
    } else {
      op.index = term;
    }
  }
  return op;
}

/**
 * Parse Intel-syntax operand text (as produced by Capstone) into structured operands.
 */
export function parseOperands(mnemonic: string, opStr: string, address: number, size: number): Operand[] {
  const operands: Operand[] = [];
  const branch = isBranchMnemonic(mnemonic);

  for (const part of splitOperands(opStr)) {
    // Far pointer: 0x10:0x401000
    const ptr = part.match(/^(0x[0-9a-fA-F]+|\d+):(0x[0-9a-fA-F]+|\d+)$/);
    if (ptr) {
      operands.push({
        kind: 'pointer',
        segment: parseNumber(ptr[1]) ?? 0,
        offset: parseNumber(ptr[2]) ?? 0,
      });
      continue;
    }

    // [size ptr ][seg:][terms]
    const mem = part.match(/^(?:(\w+) ptr )?(?:(\w+):)?\[([^\]]*)\]$/i);
    if (mem) {
      operands.push(parseMemory(mem[1], mem[2], mem[3]));
      continue;
    }

    const value = parseNumber(part);
    if (value !== null) {
      operands.push(
        branch
          ? { kind: 'immediate', value: value - (address + size), isRelative: true }
          : { kind: 'immediate', value, isRelative: false },
      );
      continue;
    }

    operands.push({ kind: 'register', name: part.toLowerCase() });
  }

  return operands;
}
