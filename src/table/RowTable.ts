import type { SampleRow } from '../types/assay.js';

/**
 * In-memory table of normalized sample rows.
 *
 * Rows are stored once and frozen. Grouping returns row indices so that
 * batches and plates can take their own arrays without rescanning the
 * table for every group.
 */
export class RowTable {
  private readonly rows: ReadonlyArray<Readonly<SampleRow>>;

  constructor(rows: Iterable<SampleRow>) {
    this.rows = Array.from(rows, (row) => Object.freeze({ ...row }));
  }

  get size(): number {
    return this.rows.length;
  }

  at(index: number): Readonly<SampleRow> | undefined {
    return this.rows[index];
  }

  all(): Readonly<SampleRow>[] {
    return [...this.rows];
  }

  /**
   * Group row indices by key in a single pass. Keys keep first-seen order.
   */
  groupIndices<K>(key: (row: Readonly<SampleRow>) => K): Map<K, number[]> {
    return groupIndices(this.rows, key);
  }

  pick(indices: readonly number[]): Readonly<SampleRow>[] {
    const out: Readonly<SampleRow>[] = [];
    for (const index of indices) {
      const row = this.rows[index];
      if (row !== undefined) out.push(row);
    }
    return out;
  }
}

export function groupIndices<T, K>(items: readonly T[], key: (item: T) => K): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  items.forEach((item, index) => {
    const k = key(item);
    const bucket = groups.get(k);
    if (bucket) {
      bucket.push(index);
    } else {
      groups.set(k, [index]);
    }
  });
  return groups;
}
