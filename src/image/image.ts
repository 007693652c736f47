import type { ExeSection, ExeSymbol, ImageLayout, SymbolLookup } from './types';
import { SymbolTable } from './symbols';

export interface ImageOptions {
  imageBase?: number;
  imageEnd?: number;
}

const EMPTY = new Uint8Array(0);

/**
 * In-memory executable image: named sections plus an image-wide symbol table.
 * Unknown section names read as empty sections.
 */
export class ExecutableImage implements ImageLayout, SymbolLookup {
  readonly symbols: SymbolTable;
  private sectionMap = new Map<string, ExeSection>();
  private base: number;
  private end: number;

  constructor(sections: ExeSection[], symbols: ExeSymbol[] = [], options: ImageOptions = {}) {
    for (const section of sections) this.sectionMap.set(section.name, section);
    this.symbols = new SymbolTable(symbols);

    const starts = sections.map((s) => s.address);
    const ends = sections.map((s) => s.address + s.data.length);
    this.base = options.imageBase ?? (starts.length ? Math.min(...starts) : 0);
    this.end = options.imageEnd ?? (ends.length ? Math.max(...ends) : this.base);
  }

  section(name: string): ExeSection | undefined {
    return this.sectionMap.get(name);
  }

  sectionAddress(name: string): number {
    return this.sectionMap.get(name)?.address ?? 0;
  }

  sectionEnd(name: string): number {
    const section = this.sectionMap.get(name);
    return section ? section.address + section.data.length : 0;
  }

  sectionData(name: string): Uint8Array {
    return this.sectionMap.get(name)?.data ?? EMPTY;
  }

  sectionSize(name: string): number {
    return this.sectionMap.get(name)?.data.length ?? 0;
  }

  imageBase(): number {
    return this.base;
  }

  imageEnd(): number {
    return this.end;
  }

  exactSymbolAt(address: number): ExeSymbol | undefined {
    return this.symbols.exactSymbolAt(address);
  }

  nearestSymbolAtOrBelow(address: number): ExeSymbol | undefined {
    return this.symbols.nearestSymbolAtOrBelow(address);
  }

  symbolByName(name: string): ExeSymbol | undefined {
    return this.symbols.findByName(name);
  }
}
