export interface BookRecord {
  bookId: string;
  title: string;
  /** Primary author first, then co-authors. Never empty. */
  authors: string[];
  avgRating?: number;
  /** 0 means the reader did not rate the book. */
  myRating: number;
  pages?: number;
  publisher?: string;
  binding?: string;
  yearPublished?: number;
  /** Calendar day as YYYY-MM-DD. */
  dateRead?: string;
  shelf?: string;
  genres?: string[];
  /** Original cell values keyed by column name, kept for export. */
  row: Record<string, string>;
}

export interface ReadingTable {
  columns: string[];
  records: BookRecord[];
}

export interface YearCount {
  year: number;
  count: number;
}

export interface RankedName {
  name: string;
  count: number;
}

export interface PagesPoint {
  date: string;
  cumulativePages: number;
}

export interface LibrarySummary {
  totalBooks: number;
  averagePersonalRating: number | undefined;
  averageCommunityRating: number | undefined;
  uniqueAuthors: number | undefined;
}

export interface StreakSummary {
  longestStreakDays: number;
  streakStart: string | undefined;
  streakEnd: string | undefined;
  maxBooksInOneDay: number;
  maxDay: string | undefined;
}

export type GenreLookup =
  | { status: "found"; genres: string[] }
  | { status: "not_found" }
  | { status: "failed"; reason: string };

export interface LookupSummary {
  total: number;
  found: number;
  notFound: number;
  failed: number;
}

export type EnrichmentState = "idle" | "running" | "complete" | "cancelled";

/** Fetches the genre labels of one book. An empty list means none were found. */
export type GenreFetcher = (bookId: string, signal: AbortSignal) => Promise<string[]>;
