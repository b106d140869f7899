import { EnrichmentStateError } from "./errors.js";
import {
  COLUMNS,
  fetchGoodreadsGenres,
  formatGenres,
  isGoodreadsBookId,
  type GenreFetchOptions,
} from "./goodreads.js";
import type {
  EnrichmentState,
  GenreFetcher,
  GenreLookup,
  LookupSummary,
  ReadingTable,
} from "./types.js";

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TIMEOUT_MS = 15_000;

export interface EnrichOptions {
  fetchGenres: GenreFetcher;
  concurrency?: number;
  timeoutMs?: number;
  /** Stops dispatching new lookups once aborted. In-flight lookups still finish. */
  signal?: AbortSignal;
  onResult?: (bookId: string, lookup: GenreLookup, done: number, total: number) => void;
}

export function goodreadsFetcher(options: Omit<GenreFetchOptions, "signal"> = {}): GenreFetcher {
  return async (bookId, signal) => {
    if (!isGoodreadsBookId(bookId)) return [];
    return fetchGoodreadsGenres(bookId, { ...options, signal });
  };
}

/** One lookup under its own timeout. A timeout counts as a failure, like a network error. */
async function lookupGenres(
  bookId: string,
  fetchGenres: GenreFetcher,
  timeoutMs: number
): Promise<GenreLookup> {
  const controller = new AbortController();
  const expired = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(new Error(`timed out after ${timeoutMs}ms`)), {
      once: true,
    });
  });
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const genres = await Promise.race([fetchGenres(bookId, controller.signal), expired]);
    return genres.length > 0 ? { status: "found", genres } : { status: "not_found" };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Error fetching genres for book ${bookId}: ${reason}`);
    return { status: "failed", reason };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Looks up genres for every distinct id with at most `concurrency` requests in
 * flight. The result has exactly one entry per distinct id, in input order,
 * whatever order the lookups complete in.
 */
export async function enrichGenres(
  bookIds: string[],
  options: EnrichOptions
): Promise<Map<string, GenreLookup>> {
  const {
    fetchGenres,
    concurrency = DEFAULT_CONCURRENCY,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    signal,
    onResult,
  } = options;
  const ids = [...new Set(bookIds)];
  const collected = new Map<string, GenreLookup>();
  let next = 0;

  const collect = (bookId: string, lookup: GenreLookup) => {
    collected.set(bookId, lookup);
    onResult?.(bookId, lookup, collected.size, ids.length);
  };

  const worker = async () => {
    while (next < ids.length && !signal?.aborted) {
      const bookId = ids[next++];
      collect(bookId, await lookupGenres(bookId, fetchGenres, timeoutMs));
    }
  };

  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : DEFAULT_CONCURRENCY;
  const width = Math.max(1, Math.min(limit, ids.length));
  await Promise.all(Array.from({ length: width }, worker));

  const results = new Map<string, GenreLookup>();
  for (const bookId of ids) {
    const lookup = collected.get(bookId);
    if (lookup) {
      results.set(bookId, lookup);
    } else {
      const cancelled: GenreLookup = { status: "failed", reason: "cancelled" };
      collect(bookId, cancelled);
      results.set(bookId, cancelled);
    }
  }
  return results;
}

export function summarizeLookups(lookups: Map<string, GenreLookup>): LookupSummary {
  const summary: LookupSummary = { total: lookups.size, found: 0, notFound: 0, failed: 0 };
  for (const lookup of lookups.values()) {
    if (lookup.status === "found") summary.found++;
    else if (lookup.status === "not_found") summary.notFound++;
    else summary.failed++;
  }
  return summary;
}

/** Distinct ids of records that have no genres yet. */
export function booksNeedingGenres(table: ReadingTable): string[] {
  const ids = table.records.filter((r) => !r.genres && r.bookId).map((r) => r.bookId);
  return [...new Set(ids)];
}

/** Returns a new table with found genres written into every record with a matching id. */
export function mergeGenres(table: ReadingTable, lookups: Map<string, GenreLookup>): ReadingTable {
  const columns = table.columns.includes(COLUMNS.genres)
    ? [...table.columns]
    : [...table.columns, COLUMNS.genres];

  const records = table.records.map((record) => {
    const lookup = lookups.get(record.bookId);
    if (!lookup || lookup.status !== "found") return record;
    return {
      ...record,
      genres: [...lookup.genres],
      row: { ...record.row, [COLUMNS.genres]: formatGenres(lookup.genres) },
    };
  });

  return { columns, records };
}

export class EnrichmentRun {
  private _state: EnrichmentState = "idle";
  private controller = new AbortController();
  private lookups = new Map<string, GenreLookup>();
  readonly total: number;
  done = 0;

  constructor(
    private readonly bookIds: string[],
    private readonly options: Omit<EnrichOptions, "signal">
  ) {
    this.total = new Set(bookIds).size;
  }

  get state(): EnrichmentState {
    return this._state;
  }

  get summary(): LookupSummary {
    return summarizeLookups(this.lookups);
  }

  async start(): Promise<Map<string, GenreLookup>> {
    if (this._state !== "idle") {
      throw new EnrichmentStateError(`Enrichment run is already ${this._state}`);
    }
    this._state = "running";

    const results = await enrichGenres(this.bookIds, {
      ...this.options,
      signal: this.controller.signal,
      onResult: (bookId, lookup, done, total) => {
        this.lookups.set(bookId, lookup);
        this.done = done;
        this.options.onResult?.(bookId, lookup, done, total);
      },
    });

    this.lookups = results;
    this._state = this.controller.signal.aborted ? "cancelled" : "complete";
    return results;
  }

  cancel(): void {
    if (this._state === "running") {
      this.controller.abort();
    }
  }
}
