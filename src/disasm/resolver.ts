import type { ImageLayout, SymbolLookup } from '../image/types';
import type { FormatterContext, FormatterFunc, FormatterHooks } from './formatter';
import type { LabelTable } from './labels';

export type OperandContext = 'addressAbsolute' | 'addressRelative' | 'immediate' | 'displacement' | 'pointer';

export type Resolution =
  | { kind: 'local'; text: string }
  | { kind: 'sectionSymbol'; text: string }
  | { kind: 'imageSymbol'; text: string }
  | { kind: 'unresolved' };

/**
 * Turns an address into symbolic text for one function. First match wins:
 * local label, then anything in the function's own section (probably code,
 * `sub_`), then anything else inside the image (probably data, `off_`).
 */
export class AddressResolver {
  private readonly sectionStart: number;
  private readonly sectionEnd: number;

  constructor(
    private readonly labels: LabelTable,
    private readonly image: ImageLayout & SymbolLookup,
    section: string,
  ) {
    this.sectionStart = image.sectionAddress(section);
    this.sectionEnd = image.sectionEnd(section);
  }

  resolve(address: number, context: OperandContext = 'addressAbsolute'): Resolution {
    const prefix = context === 'displacement' ? '+' : '';

    const label = this.labels.nameAt(address);
    if (label !== undefined) {
      return { kind: 'local', text: prefix + label };
    }

    if (address >= this.sectionStart && address <= this.sectionEnd) {
      return { kind: 'sectionSymbol', text: prefix + this.symbolText(address, context, 'sub_') };
    }

    if (address >= this.image.imageBase() && address <= this.image.imageEnd()) {
      return { kind: 'imageSymbol', text: prefix + this.symbolText(address, context, 'off_') };
    }

    return { kind: 'unresolved' };
  }

  private symbolText(address: number, context: OperandContext, pseudoPrefix: string): string {
    const exact = this.image.exactSymbolAt(address);
    if (exact) return exact.name;

    if (context === 'displacement') {
      const nearest = this.image.nearestSymbolAtOrBelow(address);
      if (nearest) return `${nearest.name}+0x${(address - nearest.address).toString(16)}`;
    }

    return pseudoPrefix + address.toString(16);
  }
}

/**
 * Formatter hooks that print resolver text and fall back to `defaults` for
 * unresolved addresses.
 */
export function createSymbolHooks(resolver: AddressResolver, defaults: Readonly<FormatterHooks>): FormatterHooks {
  const hook = (context: OperandContext, fallback: FormatterFunc): FormatterFunc => (ctx: FormatterContext) => {
    const resolution = resolver.resolve(ctx.value, context);
    return resolution.kind === 'unresolved' ? fallback(ctx) : resolution.text;
  };

  return {
    printAddressAbsolute: hook('addressAbsolute', defaults.printAddressAbsolute),
    printAddressRelative: hook('addressRelative', defaults.printAddressRelative),
    printImmediate: hook('immediate', defaults.printImmediate),
    printDisplacement: hook('displacement', defaults.printDisplacement),
    formatOperandPointer: hook('pointer', defaults.formatOperandPointer),
  };
}
