export function labelName(address: number): string {
  return `label_${address.toString(16)}`;
}

/**
 * Address → synthesized label for one function run.
 */
export class LabelTable {
  private labels = new Map<number, string>();

  /** Adds a label at `address` unless one exists; returns its name either way. */
  insert(address: number): string {
    let name = this.labels.get(address);
    if (name === undefined) {
      name = labelName(address);
      this.labels.set(address, name);
    }
    return name;
  }

  has(address: number): boolean {
    return this.labels.has(address);
  }

  nameAt(address: number): string | undefined {
    return this.labels.get(address);
  }

  get size(): number {
    return this.labels.size;
  }

  /** Labels in address order. */
  entries(): [number, string][] {
    return Array.from(this.labels.entries()).sort((a, b) => a[0] - b[0]);
  }

  clear(): void {
    this.labels.clear();
  }
}
