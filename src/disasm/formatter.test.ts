import { describe, expect, it } from 'vitest';
import { Formatter } from './formatter';
import { parseOperands } from './operands';
import type { Instruction, Operand } from './types';

function insn(address: number, size: number, mnemonic: string, operands: Operand[]): Instruction {
  return { address, bytes: new Uint8Array(size), mnemonic, size, operands };
}

const eax: Operand = { kind: 'register', name: 'eax' };
const scaled: Operand = { kind: 'memory', size: 4, base: 'ebx', index: 'ecx', scale: 4, disp: 0x10 };
const tableSlot: Operand = { kind: 'memory', size: 4, index: 'eax', scale: 4, disp: 0x2007 };
const shortJmp = insn(0x1000, 2, 'jmp', [{ kind: 'immediate', value: 6, isRelative: true }]);
const farJmp = insn(0x1000, 7, 'jmp', [{ kind: 'pointer', segment: 0x10, offset: 0x401000 }]);
const ripLea = insn(0x1000, 7, 'lea', [
  { kind: 'register', name: 'rax' },
  { kind: 'memory', base: 'rip', scale: 1, disp: 0x2000 },
]);

describe('Formatter (intel)', () => {
  const formatter = new Formatter('intel');

  it('prints size keywords and base+index*scale+disp', () => {
    expect(formatter.format(insn(0x1000, 4, 'mov', [eax, scaled]), 0x1000)).toBe('mov eax, dword ptr [ebx+ecx*4+0x10]');
  });

  it('prints negative displacements with a minus sign', () => {
    const mem: Operand = { kind: 'memory', size: 4, base: 'ebp', scale: 1, disp: -8 };
    expect(formatter.format(insn(0x1000, 3, 'mov', [eax, mem]), 0x1000)).toBe('mov eax, dword ptr [ebp-0x8]');
  });

  it('prints branch targets as absolute addresses', () => {
    expect(formatter.format(shortJmp, 0x1000)).toBe('jmp 0x1008');
  });

  it('resolves rip-relative memory to an absolute address', () => {
    expect(formatter.format(ripLea, 0x1000)).toBe('lea rax, [0x3007]');
  });

  it('prints far pointers as segment:offset', () => {
    expect(formatter.format(farJmp, 0x1000)).toBe('jmp 0x10:0x401000');
  });

  it('prints 64-bit masks as signed immediates', () => {
    const and = insn(0x1000, 4, 'and', parseOperands('and', 'rsp, 0xfffffffffffffff0', 0x1000, 4));
    expect(formatter.format(and, 0x1000)).toBe('and rsp, -0x10');
  });

  it('prints the size keyword as the decoder spelled it', () => {
    const fld = insn(0x1000, 2, 'fld', parseOperands('fld', 'xword ptr [eax]', 0x1000, 2));
    expect(formatter.format(fld, 0x1000)).toBe('fld xword ptr [eax]');
  });

  it('prints bare mnemonics', () => {
    expect(formatter.format(insn(0x1000, 1, 'ret', []), 0x1000)).toBe('ret');
  });

  it('applies per-call hook overrides', () => {
    const push = insn(0x1000, 5, 'push', [{ kind: 'immediate', value: 0x403000, isRelative: false }]);
    expect(formatter.format(push, 0x1000, { printImmediate: (ctx) => `imm_${ctx.value.toString(16)}` })).toBe(
      'push imm_403000',
    );
    expect(formatter.format(push, 0x1000)).toBe('push 0x403000');
  });

  it('routes index-only memory displacements through the displacement hook', () => {
    const text = formatter.format(insn(0x2000, 7, 'jmp', [tableSlot]), 0x2000, {
      printDisplacement: (ctx) => `+table_${ctx.value.toString(16)}`,
    });
    expect(text).toBe('jmp dword ptr [eax*4+table_2007]');
  });
});

describe('Formatter options', () => {
  it('prints relative branches from the instruction address', () => {
    const formatter = new Formatter('intel', { relativeBranches: true });
    expect(formatter.format(shortJmp, 0x1000)).toBe('jmp $+0x8');
  });

  it('keeps rip-relative memory on the absolute-address hook', () => {
    const formatter = new Formatter('intel', { relativeBranches: true });
    const text = formatter.format(ripLea, 0x1000, {
      printDisplacement: () => '+wrong',
      printAddressAbsolute: (ctx) => `abs_${ctx.value.toString(16)}`,
    });
    expect(text).toBe('lea rax, [abs_3007]');
  });
});

describe('Formatter (intel-masm)', () => {
  const formatter = new Formatter('intel-masm');

  it('prints hex with an h suffix', () => {
    const push = insn(0x1000, 2, 'push', [{ kind: 'immediate', value: 0xff, isRelative: false }]);
    expect(formatter.format(push, 0x1000)).toBe('push 0FFh');
  });

  it('prints absolute memory in MASM radix', () => {
    const mem: Operand = { kind: 'memory', size: 4, scale: 1, disp: 0x403000 };
    expect(formatter.format(insn(0x1000, 5, 'mov', [eax, mem]), 0x1000)).toBe('mov eax, dword ptr [403000h]');
  });
});

describe('Formatter (att)', () => {
  const formatter = new Formatter('att');

  it('reverses operands and uses disp(base,index,scale)', () => {
    expect(formatter.format(insn(0x1000, 4, 'mov', [eax, scaled]), 0x1000)).toBe('mov 0x10(%ebx,%ecx,4), %eax');
  });

  it('prefixes immediates with $', () => {
    const push = insn(0x1000, 2, 'push', [{ kind: 'immediate', value: 0x10, isRelative: false }]);
    expect(formatter.format(push, 0x1000)).toBe('push $0x10');
  });

  it('marks indirect branches with *', () => {
    expect(formatter.format(insn(0x2000, 7, 'jmp', [tableSlot]), 0x2000)).toBe('jmp *0x2007(,%eax,4)');
  });

  it('adds a width suffix when no register fixes the size', () => {
    const mem: Operand = { kind: 'memory', size: 4, base: 'eax', scale: 1, disp: 0 };
    const imm: Operand = { kind: 'immediate', value: 1, isRelative: false };
    expect(formatter.format(insn(0x1000, 6, 'mov', [mem, imm]), 0x1000)).toBe('movl $0x1, (%eax)');
  });

  it('prints far pointers as two immediates', () => {
    expect(formatter.format(farJmp, 0x1000)).toBe('jmp $0x10, $0x401000');
  });
});
