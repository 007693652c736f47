export type SectionKind = 'code' | 'data';

export interface ExeSection {
  name: string;
  address: number;
  data: Uint8Array;
  kind: SectionKind;
}

export interface ExeSymbol {
  name: string;
  address: number;
  size: number;
}

/** Section and image address ranges of a loaded executable. */
export interface ImageLayout {
  sectionAddress(name: string): number;
  sectionEnd(name: string): number;
  sectionData(name: string): Uint8Array;
  sectionSize(name: string): number;
  imageBase(): number;
  imageEnd(): number;
}

export interface SymbolLookup {
  exactSymbolAt(address: number): ExeSymbol | undefined;
  /** Closest symbol whose address is at or below `address`. */
  nearestSymbolAtOrBelow(address: number): ExeSymbol | undefined;
}
