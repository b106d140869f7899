import { ResultCache } from "./cache.js";
import { booksNeedingGenres, EnrichmentRun, mergeGenres, type EnrichOptions } from "./enrich.js";
import { NoTableError } from "./errors.js";
import { COLUMNS, parseGoodreadsCSV, toGoodreadsCSV } from "./goodreads.js";
import { booksByAuthor, booksPublishedIn, readBooks } from "./insights.js";
import { buildReport, toBookRow, type BookRow, type InsightsReport } from "./report.js";
import type { EnrichmentState, LookupSummary, ReadingTable } from "./types.js";

export const DEFAULT_FILE_NAME = "goodreads_export.csv";

const EXPECTED_COLUMNS = [COLUMNS.author, COLUMNS.myRating, COLUMNS.avgRating, COLUMNS.dateRead];

export interface LoadResult {
  totalBooks: number;
  readBooks: number;
  columns: string[];
  warnings: string[];
}

export interface EnrichmentStatus {
  state: EnrichmentState;
  done: number;
  total: number;
  summary: LookupSummary;
}

export type SessionOptions = Omit<EnrichOptions, "signal">;

/**
 * Everything one user works with: the uploaded library (read shelf only), the
 * reports derived from it and at most one enrichment run at a time.
 */
export class ReadingSession {
  private current: ReadingTable | undefined;
  private run: EnrichmentRun | undefined;
  private pending: Promise<EnrichmentStatus> | undefined;
  private readonly reports = new ResultCache<InsightsReport>();
  fileName = DEFAULT_FILE_NAME;

  constructor(private readonly options: SessionOptions) {}

  get table(): ReadingTable {
    if (!this.current) throw new NoTableError();
    return this.current;
  }

  get hasTable(): boolean {
    return this.current !== undefined;
  }

  load(content: string, fileName = DEFAULT_FILE_NAME): LoadResult {
    const library = parseGoodreadsCSV(content);
    this.run?.cancel();
    this.run = undefined;
    this.pending = undefined;
    this.current = readBooks(library);
    this.fileName = fileName;

    const warnings: string[] = [];
    const missing = EXPECTED_COLUMNS.filter((column) => !library.columns.includes(column));
    if (missing.length > 0) {
      warnings.push(`Missing columns: ${missing.join(", ")}. Some insights will be unavailable.`);
    }
    if (library.columns.includes(COLUMNS.dateRead) && library.records.every((r) => !r.dateRead)) {
      warnings.push(`No valid dates found in '${COLUMNS.dateRead}' column. Some features may not work properly.`);
    }

    return {
      totalBooks: library.records.length,
      readBooks: this.current.records.length,
      columns: library.columns,
      warnings,
    };
  }

  report(topN: number): InsightsReport {
    const table = this.table;
    return this.reports.get(table, `report:${topN}`, () => buildReport(table, topN));
  }

  booksByAuthor(name: string): BookRow[] {
    return booksByAuthor(this.table, name).map(toBookRow);
  }

  booksPublishedIn(year: number): BookRow[] {
    return booksPublishedIn(this.table, year).map(toBookRow);
  }

  get enrichmentActive(): boolean {
    return this.run?.state === "running";
  }

  /**
   * Starts enrichment of every book still missing genres. The merged table
   * replaces the current one only if the run completes and no new library was
   * loaded in the meantime.
   */
  enrich(): Promise<EnrichmentStatus> {
    const source = this.table;
    if (this.pending && this.enrichmentActive) return this.pending;

    const run = new EnrichmentRun(booksNeedingGenres(source), this.options);
    this.run = run;
    this.pending = run.start().then((lookups) => {
      if (run.state === "complete" && this.current === source) {
        this.current = mergeGenres(source, lookups);
      }
      return this.statusOf(run);
    });
    return this.pending;
  }

  cancelEnrichment(): boolean {
    if (!this.enrichmentActive) return false;
    this.run?.cancel();
    return true;
  }

  enrichmentStatus(): EnrichmentStatus {
    if (!this.run) {
      return { state: "idle", done: 0, total: 0, summary: { total: 0, found: 0, notFound: 0, failed: 0 } };
    }
    return this.statusOf(this.run);
  }

  exportCSV(): string {
    return toGoodreadsCSV(this.table);
  }

  get exportFileName(): string {
    return `enriched_${this.fileName}`;
  }

  private statusOf(run: EnrichmentRun): EnrichmentStatus {
    return { state: run.state, done: run.done, total: run.total, summary: run.summary };
  }
}
