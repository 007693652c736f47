import type { ImmediateOperand, Instruction, MemoryOperand, Operand } from './types';
import { calcAbsoluteAddress, isBranchMnemonic, isRipRelative, memorySizeKeyword } from './operands';
import { hex, masmHex, signedHex } from '../utils/hex';

export type FormatterStyle = 'intel' | 'intel-masm' | 'att';

export interface FormatterContext {
  instruction: Instruction;
  operand: Operand;
  operandIndex: number;
  runtimeAddress: number;
  /** The number the hook prints: address, immediate, displacement or pointer offset. */
  value: number;
}

export type FormatterFunc = (ctx: FormatterContext) => string;

export interface FormatterHooks {
  printAddressAbsolute: FormatterFunc;
  printAddressRelative: FormatterFunc;
  printImmediate: FormatterFunc;
  printDisplacement: FormatterFunc;
  formatOperandPointer: FormatterFunc;
}

export interface FormatterOptions {
  /** Route branch targets through `printAddressRelative`. */
  relativeBranches?: boolean;
}

const ATT_SUFFIX: Record<number, string> = { 1: 'b', 2: 'w', 4: 'l', 8: 'q' };

function defaultHooks(style: FormatterStyle): FormatterHooks {
  const num = style === 'intel-masm' ? masmHex : hex;
  const here = style === 'att' ? '.' : '$';

  return {
    printAddressAbsolute: (ctx) => num(ctx.value),
    printAddressRelative: (ctx) => here + signedHex(ctx.value - ctx.runtimeAddress, num),
    printImmediate: (ctx) => num(ctx.value),
    printDisplacement: (ctx) => (style === 'att' ? num(ctx.value) : signedHex(ctx.value, num)),
    formatOperandPointer: (ctx) => {
      const op = ctx.operand;
      if (op.kind !== 'pointer') return num(ctx.value);
      return style === 'att'
        ? `$${num(op.segment)}, $${num(op.offset)}`
        : `${num(op.segment)}:${num(op.offset)}`;
    },
  };
}

/**
 * Renders decoded instructions. Every address-bearing piece of an operand goes
 * through one of five hooks. Overrides are passed per call; `defaults` stays
 * available to overrides that need the plain rendering.
 */
export class Formatter {
  readonly style: FormatterStyle;
  readonly defaults: Readonly<FormatterHooks>;
  private readonly relativeBranches: boolean;

  constructor(style: FormatterStyle = 'intel', options: FormatterOptions = {}) {
    this.style = style;
    this.defaults = Object.freeze(defaultHooks(style));
    this.relativeBranches = options.relativeBranches ?? false;
  }

  format(insn: Instruction, runtimeAddress: number, overrides: Partial<FormatterHooks> = {}): string {
    const hooks: FormatterHooks = { ...this.defaults, ...overrides };
    const rendered = insn.operands.map((op, i) => this.formatOperand(insn, op, i, runtimeAddress, hooks));

    if (this.style === 'att') {
      const mnemonic = insn.mnemonic + this.attSuffix(insn);
      return rendered.length ? `${mnemonic} ${rendered.reverse().join(', ')}` : mnemonic;
    }
    return rendered.length ? `${insn.mnemonic} ${rendered.join(', ')}` : insn.mnemonic;
  }

  private formatOperand(
    insn: Instruction,
    op: Operand,
    operandIndex: number,
    runtimeAddress: number,
    hooks: FormatterHooks,
  ): string {
    const ctx = (value: number): FormatterContext => ({ instruction: insn, operand: op, operandIndex, runtimeAddress, value });
    const att = this.style === 'att';

    switch (op.kind) {
      case 'register': {
        if (!att) return op.name;
        return isBranchMnemonic(insn.mnemonic) ? `*%${op.name}` : `%${op.name}`;
      }
      case 'immediate':
        return this.formatImmediate(insn, op, runtimeAddress, hooks, ctx);
      case 'memory':
        return att ? this.formatMemoryAtt(insn, op, runtimeAddress, hooks, ctx) : this.formatMemoryIntel(insn, op, runtimeAddress, hooks, ctx);
      case 'pointer':
        return hooks.formatOperandPointer(ctx(op.offset));
    }
  }

  private formatImmediate(
    insn: Instruction,
    op: ImmediateOperand,
    runtimeAddress: number,
    hooks: FormatterHooks,
    ctx: (value: number) => FormatterContext,
  ): string {
    if (op.isRelative) {
      const target = calcAbsoluteAddress(insn, op, runtimeAddress);
      return this.relativeBranches ? hooks.printAddressRelative(ctx(target)) : hooks.printAddressAbsolute(ctx(target));
    }
    const text = hooks.printImmediate(ctx(op.value));
    return this.style === 'att' ? `$${text}` : text;
  }

  private formatMemoryIntel(
    insn: Instruction,
    op: MemoryOperand,
    runtimeAddress: number,
    hooks: FormatterHooks,
    ctx: (value: number) => FormatterContext,
  ): string {
    const keyword = op.sizeKeyword ?? (op.size !== undefined ? memorySizeKeyword(op.size) : undefined);
    const prefix = (keyword ? `${keyword} ptr ` : '') + (op.segment ? `${op.segment}:` : '');

    if (isRipRelative(op)) {
      return `${prefix}[${hooks.printAddressAbsolute(ctx(calcAbsoluteAddress(insn, op, runtimeAddress)))}]`;
    }
    if (op.base === undefined && op.index === undefined) {
      return `${prefix}[${hooks.printAddressAbsolute(ctx(op.disp))}]`;
    }

    let inner = op.base ?? '';
    if (op.index !== undefined) {
      inner += (inner ? '+' : '') + op.index + (op.scale > 1 ? `*${op.scale}` : '');
    }
    if (op.disp !== 0) {
      inner += hooks.printDisplacement(ctx(op.disp));
    }
    return `${prefix}[${inner}]`;
  }

  private formatMemoryAtt(
    insn: Instruction,
    op: MemoryOperand,
    runtimeAddress: number,
    hooks: FormatterHooks,
    ctx: (value: number) => FormatterContext,
  ): string {
    const indirect = isBranchMnemonic(insn.mnemonic) ? '*' : '';
    const prefix = indirect + (op.segment ? `%${op.segment}:` : '');

    if (isRipRelative(op)) {
      return prefix + hooks.printAddressAbsolute(ctx(calcAbsoluteAddress(insn, op, runtimeAddress)));
    }
    if (op.base === undefined && op.index === undefined) {
      return prefix + hooks.printAddressAbsolute(ctx(op.disp));
    }

    const disp = op.disp !== 0 ? hooks.printDisplacement(ctx(op.disp)) : '';
    const base = op.base !== undefined ? `%${op.base}` : '';
    const index = op.index !== undefined ? `,%${op.index},${op.scale}` : '';
    return `${prefix}${disp}(${base}${index})`;
  }

  // Width suffix when no register operand pins the operand size
  private attSuffix(insn: Instruction): string {
    if (isBranchMnemonic(insn.mnemonic)) return '';
    if (insn.operands.some((op) => op.kind === 'register')) return '';
    const mem = insn.operands.find((op): op is MemoryOperand => op.kind === 'memory');
    if (!mem || mem.size === undefined) return '';
    return ATT_SUFFIX[mem.size] ?? '';
  }
}
