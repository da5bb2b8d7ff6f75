/**
 * Barcode × sample count accumulator
 */

export class CountMatrix {
  private readonly counts = new Map<string, Map<string, number>>();
  private readonly sampleNames = new Set<string>();

  /**
   * Register a sample so it gets a column even without any counts
   */
  addSample(sample: string): void {
    this.sampleNames.add(sample);
  }

  increment(key: string, sample: string, amount: number = 1): void {
    this.addSample(sample);
    const row = this.counts.get(key) ?? new Map<string, number>();
    row.set(sample, (row.get(sample) ?? 0) + amount);
    this.counts.set(key, row);
  }

  get(key: string, sample: string): number {
    return this.counts.get(key)?.get(sample) ?? 0;
  }

  /**
   * Keys with at least one recorded count, in first-seen order
   */
  keys(): string[] {
    return [...this.counts.keys()];
  }

  /**
   * Registered samples, in registration order
   */
  samples(): string[] {
    return [...this.sampleNames];
  }

  /**
   * Sum over all keys for one sample
   */
  sampleTotal(sample: string): number {
    let total = 0;
    for (const row of this.counts.values()) {
      total += row.get(sample) ?? 0;
    }
    return total;
  }

  /**
   * Cell-wise sum of two matrices, leaving both inputs untouched
   *
   * The sum is commutative and associative, so partial matrices built
   * from disjoint sets of reads can be combined in any order.
   */
  merge(other: CountMatrix): CountMatrix {
    const merged = new CountMatrix();
    for (const source of [this, other]) {
      for (const sample of source.sampleNames) {
        merged.addSample(sample);
      }
      for (const [key, row] of source.counts) {
        for (const [sample, count] of row) {
          merged.increment(key, sample, count);
        }
      }
    }
    return merged;
  }
}
