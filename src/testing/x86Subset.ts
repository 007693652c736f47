import type { Decoder, Instruction, MachineMode, Operand } from '../disasm/types';

/**
 * A handful of 32-bit x86 encodings, enough to build test functions without
 * loading the wasm decoder. Anything else decodes as a failure.
 *
 *   90            nop                  C3            ret
 *   55            push ebp             5D            pop ebp
 *   89 E5         mov ebp, esp         31 C0         xor eax, eax
 *   EB rel8       jmp                  E9 rel32      jmp
 *   E8 rel32      call                 74/75 rel8    je/jne
 *   68 imm32      push imm             B8 imm32      mov eax, imm
 *   A1 moffs32    mov eax, dword ptr [moffs]
 *   8B 80 disp32  mov eax, dword ptr [eax+disp]
 *   FF 24 85 d32  jmp dword ptr [eax*4+disp]
 *   EA off32 sel16  jmp far ptr
 *   F2 EB rel8    bnd jmp
 */
export class X86SubsetDecoder implements Decoder {
  readonly machineMode: MachineMode = 'legacy32';

  decode(buffer: Uint8Array, runtimeAddress: number): Instruction | null {
    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const has = (n: number) => buffer.length >= n;
    const i8 = (at: number) => view.getInt8(at);
    const i32 = (at: number) => view.getInt32(at, true);
    const u32 = (at: number) => view.getUint32(at, true);

    const make = (size: number, mnemonic: string, operands: Operand[] = []): Instruction | null =>
      has(size) ? { address: runtimeAddress, bytes: buffer.slice(0, size), mnemonic, size, operands } : null;
    const reg = (name: string): Operand => ({ kind: 'register', name });
    const rel = (value: number): Operand => ({ kind: 'immediate', value, isRelative: true });
    const imm = (value: number): Operand => ({ kind: 'immediate', value, isRelative: false });

    if (!has(1)) return null;
    switch (buffer[0]) {
      case 0x90: return make(1, 'nop');
      case 0xc3: return make(1, 'ret');
      case 0x55: return make(1, 'push', [reg('ebp')]);
      case 0x5d: return make(1, 'pop', [reg('ebp')]);
      case 0x89: return buffer[1] === 0xe5 ? make(2, 'mov', [reg('ebp'), reg('esp')]) : null;
      case 0x31: return buffer[1] === 0xc0 ? make(2, 'xor', [reg('eax'), reg('eax')]) : null;
      case 0xeb: return has(2) ? make(2, 'jmp', [rel(i8(1))]) : null;
      case 0x74: return has(2) ? make(2, 'je', [rel(i8(1))]) : null;
      case 0x75: return has(2) ? make(2, 'jne', [rel(i8(1))]) : null;
      case 0xe9: return has(5) ? make(5, 'jmp', [rel(i32(1))]) : null;
      case 0xe8: return has(5) ? make(5, 'call', [rel(i32(1))]) : null;
      case 0x68: return has(5) ? make(5, 'push', [imm(u32(1))]) : null;
      case 0xb8: return has(5) ? make(5, 'mov', [reg('eax'), imm(u32(1))]) : null;
      case 0xa1:
        return has(5) ? make(5, 'mov', [reg('eax'), { kind: 'memory', size: 4, scale: 1, disp: u32(1) }]) : null;
      case 0x8b:
        if (buffer[1] !== 0x80 || !has(6)) return null;
        return make(6, 'mov', [reg('eax'), { kind: 'memory', size: 4, base: 'eax', scale: 1, disp: i32(2) }]);
      case 0xff:
        if (buffer[1] !== 0x24 || buffer[2] !== 0x85 || !has(7)) return null;
        return make(7, 'jmp', [{ kind: 'memory', size: 4, index: 'eax', scale: 4, disp: i32(3) }]);
      case 0xf2:
        return buffer[1] === 0xeb && has(3) ? make(3, 'bnd jmp', [rel(i8(2))]) : null;
      case 0xea:
        if (!has(7)) return null;
        return make(7, 'jmp', [{ kind: 'pointer', segment: view.getUint16(5, true), offset: u32(1) }]);
      default:
        return null;
    }
  }
}

/** Hex string ("55 89 e5") to bytes. */
export function bytes(text: string): Uint8Array {
  const compact = text.replace(/\s+/g, '');
  const out = new Uint8Array(compact.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = parseInt(compact.substring(i * 2, i * 2 + 2), 16);
  return out;
}
