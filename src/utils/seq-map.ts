/**
 * Sequence-number keyed map used for the sender's outstanding segments and the
 * receiver's reorder buffer. Lookups are O(1); `drainFrom` walks only the
 * contiguous run it removes.
 */
export class SeqMap<V> {
  private readonly entries = new Map<number, V>();

  get size(): number {
    return this.entries.size;
  }

  has(seq: number): boolean {
    return this.entries.has(seq);
  }

  get(seq: number): V | undefined {
    return this.entries.get(seq);
  }

  set(seq: number, value: V): this {
    this.entries.set(seq, value);
    return this;
  }

  delete(seq: number): boolean {
    return this.entries.delete(seq);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys in ascending order. */
  keys(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }

  /**
   * Removes the run `start, start + 1, ...` while each key is present.
   * `next` is the first key of the run that was missing.
   */
  drainFrom(start: number): { values: V[]; next: number } {
    const values: V[] = [];
    let next = start;
    while (this.entries.has(next)) {
      const value = this.entries.get(next);
      this.entries.delete(next);
      if (value !== undefined) values.push(value);
      next += 1;
    }
    return { values, next };
  }

  /** Removes every key below `floor`; returns how many were removed. */
  dropBelow(floor: number): number {
    let removed = 0;
    for (const seq of this.entries.keys()) {
      if (seq < floor) {
        this.entries.delete(seq);
        removed += 1;
      }
    }
    return removed;
  }

  /** Entries with `from <= seq < to`, ascending. Missing keys are skipped. */
  range(from: number, to: number): Array<[number, V]> {
    const out: Array<[number, V]> = [];
    for (let seq = from; seq < to; seq += 1) {
      const value = this.entries.get(seq);
      if (value !== undefined) out.push([seq, value]);
    }
    return out;
  }
}
