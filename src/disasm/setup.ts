import type { ExecutableImage } from '../image/image';
import type { Decoder, MachineMode, StackWidth } from './types';
import { Formatter, type FormatterHooks, type FormatterOptions, type FormatterStyle } from './formatter';
import { stackWidthFor } from './decoder';
import { DisasmError } from './errors';

export type AsmFormat = 'default' | 'igas' | 'agas' | 'masm';

export const ASM_FORMATS: readonly AsmFormat[] = ['default', 'igas', 'agas', 'masm'];

const FORMAT_STYLES: Record<AsmFormat, FormatterStyle> = {
  default: 'intel',
  igas: 'intel',
  agas: 'att',
  masm: 'intel-masm',
};

/**
 * Decoder, formatter and the formatter's default hooks for one target. Built
 * once and shared read-only by every function disassembled for that target.
 */
export class FunctionSetup {
  readonly image: ExecutableImage;
  readonly format: AsmFormat;
  readonly machineMode: MachineMode;
  readonly stackWidth: StackWidth;
  readonly decoder: Decoder;
  readonly formatter: Formatter;
  readonly defaults: Readonly<FormatterHooks>;

  constructor(image: ExecutableImage, decoder: Decoder, format: AsmFormat = 'default', options: FormatterOptions = {}) {
    const style = FORMAT_STYLES[format];
    if (!style) throw new DisasmError('invalid-argument', `Unsupported asm format: ${String(format)}`);

    this.image = image;
    this.format = format;
    this.machineMode = decoder.machineMode;
    this.stackWidth = stackWidthFor(decoder.machineMode);
    this.decoder = decoder;
    this.formatter = new Formatter(style, options);
    this.defaults = this.formatter.defaults;
    Object.freeze(this);
  }
}
