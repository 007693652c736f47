export * from './disasm/types';
export { DisasmError, type DisasmErrorCode } from './disasm/errors';
export { CapstoneDecoder, stackWidthFor } from './disasm/decoder';
export { parseOperands, calcAbsoluteAddress, relativeTarget } from './disasm/operands';
export {
  Formatter,
  type FormatterContext,
  type FormatterFunc,
  type FormatterHooks,
  type FormatterOptions,
  type FormatterStyle,
} from './disasm/formatter';
export { LabelTable, labelName } from './disasm/labels';
export { scanJumpTable, isJumpTableTrigger } from './disasm/jumpTable';
export { AddressResolver, createSymbolHooks, type OperandContext, type Resolution } from './disasm/resolver';
export { FunctionSetup, ASM_FORMATS, type AsmFormat } from './disasm/setup';
export { DisassemblyEngine, type FunctionDisassembly } from './disasm/engine';
export * from './image/types';
export { ExecutableImage, type ImageOptions } from './image/image';
export { SymbolTable } from './image/symbols';
export { loadImage, imageFromDescription } from './image/config';
