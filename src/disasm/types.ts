export type MachineMode =
  | 'long64'
  | 'compat32'
  | 'legacy32'
  | 'compat16'
  | 'legacy16'
  | 'real16';

export type StackWidth = 16 | 32 | 64;

export interface RegisterOperand {
  kind: 'register';
  name: string;
}

export interface MemoryOperand {
  kind: 'memory';
  size?: number; // access width in bytes, when the decoder knows it
  sizeKeyword?: string; // the decoder's own spelling ("xword", "opaque")
  segment?: string;
  base?: string;
  index?: string;
  scale: number;
  disp: number; // signed
}

export interface ImmediateOperand {
  kind: 'immediate';
  value: number;
  isRelative: boolean; // value is a displacement from the end of the instruction
}

export interface PointerOperand {
  kind: 'pointer';
  segment: number;
  offset: number;
}

export type Operand = RegisterOperand | MemoryOperand | ImmediateOperand | PointerOperand;

export interface Instruction {
  address: number;
  bytes: Uint8Array;
  mnemonic: string;
  size: number;
  operands: Operand[];
}

export interface Decoder {
  readonly machineMode: MachineMode;
  /** Decodes the first instruction in `buffer`; `null` when it is not a valid instruction. */
  decode(buffer: Uint8Array, runtimeAddress: number): Instruction | null;
}

export interface FunctionRange {
  beginAddress: number;
  endAddress: number;
  section: string;
}

export interface JumpTable {
  anchor: number;     // address of the first slot
  targets: number[];  // slot contents, in table order
  byteLength: number;
}

export interface InstructionData {
  address: number;
  size: number;
  mnemonic: string;
  text: string;       // formatted with symbol substitution
  label?: string;     // label emitted right before this instruction
  isJump: boolean;
  jumpLength: number; // target - address for jumps, 0 otherwise
}
