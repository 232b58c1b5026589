import type { ProductRecord } from "./types";

/**
 * Ordered, id-unique collection of scraped records, capped at `maxItems`.
 * The first record seen for an id wins; later ones are discarded.
 */
export class ProductAccumulator {
  private readonly records: ProductRecord[] = [];
  private readonly seen = new Set<string>();

  constructor(readonly maxItems: number) {
    if (!Number.isInteger(maxItems) || maxItems < 0) {
      throw new RangeError(`maxItems must be a non-negative integer, got ${maxItems}`);
    }
  }

  /** Ingest records in order. Returns how many were new and fit under the cap. */
  add(records: Iterable<ProductRecord>): number {
    let added = 0;
    for (const record of records) {
      if (this.isFull()) break;
      if (this.seen.has(record.id)) continue;
      this.seen.add(record.id);
      this.records.push(record);
      added++;
    }
    return added;
  }

  get size(): number {
    return this.records.length;
  }

  isFull(): boolean {
    return this.records.length >= this.maxItems;
  }

  snapshot(): readonly ProductRecord[] {
    return Object.freeze([...this.records]);
  }
}
