import type { ExeSymbol, SymbolLookup } from './types';

/**
 * Symbols kept sorted by address. Among symbols sharing an address, the one
 * added first is the one lookups return.
 */
export class SymbolTable implements SymbolLookup {
  private sorted: ExeSymbol[] = [];
  private byName = new Map<string, ExeSymbol>();

  constructor(symbols: Iterable<ExeSymbol> = []) {
    for (const sym of symbols) this.add(sym);
  }

  add(symbol: ExeSymbol): void {
    // Insert after any symbol at the same address to keep first-wins order
    const idx = this.upperBound(symbol.address);
    this.sorted.splice(idx, 0, symbol);
    if (!this.byName.has(symbol.name)) this.byName.set(symbol.name, symbol);
  }

  get size(): number {
    return this.sorted.length;
  }

  all(): readonly ExeSymbol[] {
    return this.sorted;
  }

  findByName(name: string): ExeSymbol | undefined {
    return this.byName.get(name);
  }

  exactSymbolAt(address: number): ExeSymbol | undefined {
    const idx = this.lowerBound(address);
    const sym = this.sorted[idx];
    return sym && sym.address === address ? sym : undefined;
  }

  nearestSymbolAtOrBelow(address: number): ExeSymbol | undefined {
    const exact = this.exactSymbolAt(address);
    if (exact) return exact;
    const idx = this.lowerBound(address);
    if (idx === 0) return undefined;
    // Several symbols may share the preceding address; return the first of them
    return this.exactSymbolAt(this.sorted[idx - 1].address);
  }

  // First index whose address is >= `address`
  private lowerBound(address: number): number {
    let lo = 0;
    let hi = this.sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.sorted[mid].address < address) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  // First index whose address is > `address`
  private upperBound(address: number): number {
    let lo = 0;
    let hi = this.sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.sorted[mid].address <= address) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
