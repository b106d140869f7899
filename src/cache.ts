import { createHash } from "crypto";
import type { ReadingTable } from "./types.js";

const MAX_TABLES = 4;

/** Content hash of a table: its columns and every cell, in column order. */
export function fingerprint(table: ReadingTable): string {
  const hash = createHash("sha256");
  hash.update(JSON.stringify(table.columns));
  for (const record of table.records) {
    hash.update("\n");
    hash.update(JSON.stringify(table.columns.map((column) => record.row[column] ?? "")));
  }
  return hash.digest("hex");
}

/**
 * Memoizes results per table fingerprint. Only the most recent few tables are
 * kept; an upload or an enrichment merge yields a new fingerprint.
 */
export class ResultCache<T> {
  private tables = new Map<string, Map<string, { value: T }>>();
  hits = 0;
  misses = 0;

  constructor(private readonly maxTables = MAX_TABLES) {}

  get(table: ReadingTable, key: string, compute: () => T): T {
    const tableKey = fingerprint(table);
    let results = this.tables.get(tableKey);
    if (results) {
      // refresh recency
      this.tables.delete(tableKey);
      this.tables.set(tableKey, results);
    } else {
      results = new Map<string, { value: T }>();
      this.tables.set(tableKey, results);
      this.evict();
    }

    const cached = results.get(key);
    if (cached) {
      this.hits++;
      return cached.value;
    }
    this.misses++;
    const value = compute();
    results.set(key, { value });
    return value;
  }

  clear(): void {
    this.tables.clear();
  }

  get size(): number {
    return this.tables.size;
  }

  private evict(): void {
    while (this.tables.size > this.maxTables) {
      const oldest = this.tables.keys().next().value;
      if (oldest === undefined) return;
      this.tables.delete(oldest);
    }
  }
}
