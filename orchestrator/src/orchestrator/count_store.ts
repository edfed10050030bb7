type Row<K> = K & { count: number };

/**
 * Integer tallies keyed by a fixed tuple of string fields. Keys are stored as the JSON encoding of
 * the field values in declaration order.
 */
export class TallyTable<K extends Record<string, string>> {
  private readonly entries = new Map<string, Row<K>>();

  constructor(private readonly fields: readonly (keyof K & string)[]) {}

  get size(): number {
    return this.entries.size;
  }

  increment(key: K, by = 1): number {
    const id = this.idOf(key);
    const existing = this.entries.get(id);
    if (existing) {
      existing.count += by;
      return existing.count;
    }
    this.entries.set(id, { ...key, count: by });
    return by;
  }

  get(key: K): number {
    return this.entries.get(this.idOf(key))?.count ?? 0;
  }

  rows(predicate: (key: K) => boolean = () => true): Row<K>[] {
    const result: Row<K>[] = [];
    for (const row of this.entries.values()) {
      if (predicate(row)) {
        result.push({ ...row });
      }
    }
    return result;
  }

  /** Deletes every row the predicate selects and returns how many went. */
  deleteWhere(predicate: (key: K) => boolean): number {
    let removed = 0;
    for (const [id, row] of this.entries) {
      if (predicate(row)) {
        this.entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  private idOf(key: K): string {
    return JSON.stringify(this.fields.map((field) => key[field]));
  }
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
