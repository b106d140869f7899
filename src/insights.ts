import { dayNumber, monthOf, yearOf } from "./dates.js";
import { SchemaError } from "./errors.js";
import { COLUMNS, UNKNOWN_AUTHOR } from "./goodreads.js";
import type {
  BookRecord,
  LibrarySummary,
  PagesPoint,
  RankedName,
  ReadingTable,
  YearCount,
} from "./types.js";

export function requireColumns(table: ReadingTable, ...columns: string[]): void {
  const missing = columns.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function authorKey(name: string): string {
  return name.toLowerCase();
}

/**
 * Counts names case-insensitively, keeping the first spelling seen, and ranks
 * them by count descending then name ascending.
 */
function rankNames(names: Iterable<string>, n?: number): RankedName[] {
  const counts = new Map<string, RankedName>();
  for (const name of names) {
    const key = authorKey(name);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { name, count: 1 });
    }
  }
  const ranked = [...counts.values()].sort(
    (a, b) => b.count - a.count || compareText(a.name, b.name)
  );
  return n === undefined ? ranked : ranked.slice(0, Math.max(0, n));
}

function countByYear(years: number[]): YearCount[] {
  const counts = new Map<number, number>();
  for (const year of years) {
    counts.set(year, (counts.get(year) || 0) + 1);
  }
  return [...counts.entries()]
    .map(([year, count]) => ({ year, count }))
    .sort((a, b) => a.year - b.year);
}

/** Rows on the "read" shelf, or rows with a finish date when there is no shelf column. */
export function readBooks(table: ReadingTable): ReadingTable {
  const records = table.columns.includes(COLUMNS.shelf)
    ? table.records.filter((r) => r.shelf?.toLowerCase() === "read")
    : table.records.filter((r) => r.dateRead !== undefined);
  return { columns: table.columns, records };
}

export function totalBooks(table: ReadingTable): number {
  return table.records.length;
}

export function averagePersonalRating(table: ReadingTable): number | undefined {
  requireColumns(table, COLUMNS.myRating);
  return mean(table.records.filter((r) => r.myRating > 0).map((r) => r.myRating));
}

export function averageCommunityRating(table: ReadingTable): number | undefined {
  requireColumns(table, COLUMNS.avgRating);
  return mean(table.records.flatMap((r) => (r.avgRating ? [r.avgRating] : [])));
}

/** Authors of a record, without the placeholder given to rows with a blank author. */
function knownAuthors(record: BookRecord): string[] {
  return record.authors.filter((author) => author !== UNKNOWN_AUTHOR);
}

export function uniqueAuthorCount(table: ReadingTable): number {
  requireColumns(table, COLUMNS.author);
  const names = new Set<string>();
  for (const record of table.records) {
    for (const author of knownAuthors(record)) {
      names.add(authorKey(author));
    }
  }
  return names.size;
}

export function summarize(table: ReadingTable): LibrarySummary {
  const optional = <T>(compute: (t: ReadingTable) => T): T | undefined => {
    try {
      return compute(table);
    } catch (error) {
      if (error instanceof SchemaError) return undefined;
      throw error;
    }
  };

  return {
    totalBooks: totalBooks(table),
    averagePersonalRating: optional(averagePersonalRating),
    averageCommunityRating: optional(averageCommunityRating),
    uniqueAuthors: optional(uniqueAuthorCount),
  };
}

export function booksPerYear(table: ReadingTable): YearCount[] {
  requireColumns(table, COLUMNS.dateRead);
  return countByYear(table.records.flatMap((r) => (r.dateRead ? [yearOf(r.dateRead)] : [])));
}

export function topAuthors(table: ReadingTable, n: number): RankedName[] {
  requireColumns(table, COLUMNS.author);
  return rankNames(table.records.flatMap(knownAuthors), n);
}

export function toTitleCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function topPublishers(table: ReadingTable, n: number): RankedName[] {
  requireColumns(table, COLUMNS.publisher);
  return rankNames(
    table.records.flatMap((r) => (r.publisher ? [toTitleCase(r.publisher)] : [])),
    n
  );
}

export function bindingDistribution(table: ReadingTable): Record<string, number> {
  requireColumns(table, COLUMNS.binding);
  const counts = new Map<string, number>();
  for (const record of table.records) {
    if (!record.binding) continue;
    counts.set(record.binding, (counts.get(record.binding) || 0) + 1);
  }
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]));
  return Object.fromEntries(sorted);
}

export function booksByPublicationYear(table: ReadingTable): YearCount[] {
  requireColumns(table, COLUMNS.yearPublished);
  return countByYear(table.records.flatMap((r) => (r.yearPublished ? [r.yearPublished] : [])));
}

function topBy(records: BookRecord[], value: (r: BookRecord) => number | undefined, n: number): BookRecord[] {
  return records
    .filter((r) => (value(r) ?? 0) > 0)
    .sort((a, b) => (value(b) ?? 0) - (value(a) ?? 0) || compareText(a.title, b.title))
    .slice(0, Math.max(0, n));
}

export function topRatedByPersonal(table: ReadingTable, n: number): BookRecord[] {
  requireColumns(table, COLUMNS.myRating);
  return topBy(table.records, (r) => r.myRating, n);
}

export function topRatedByCommunity(table: ReadingTable, n: number): BookRecord[] {
  requireColumns(table, COLUMNS.avgRating);
  return topBy(table.records, (r) => r.avgRating, n);
}

export function longestBooks(table: ReadingTable, k: number): BookRecord[] {
  requireColumns(table, COLUMNS.pages);
  return topBy(table.records, (r) => r.pages, k);
}

export function shortestBooks(table: ReadingTable, k: number): BookRecord[] {
  requireColumns(table, COLUMNS.pages);
  return table.records
    .filter((r) => r.pages !== undefined)
    .sort((a, b) => (a.pages ?? 0) - (b.pages ?? 0) || compareText(a.title, b.title))
    .slice(0, Math.max(0, k));
}

interface DatedPages {
  date: string;
  pages: number;
}

function datedPages(table: ReadingTable): DatedPages[] {
  requireColumns(table, COLUMNS.dateRead, COLUMNS.pages);
  return table.records.flatMap((r) =>
    r.dateRead && r.pages ? [{ date: r.dateRead, pages: r.pages }] : []
  );
}

export function cumulativePagesOverTime(table: ReadingTable): PagesPoint[] {
  const entries = datedPages(table).sort((a, b) => dayNumber(a.date) - dayNumber(b.date));
  let running = 0;
  return entries.map(({ date, pages }) => {
    running += pages;
    return { date, cumulativePages: running };
  });
}

export function totalPagesRead(table: ReadingTable): number | undefined {
  const entries = datedPages(table);
  if (entries.length === 0) return undefined;
  return entries.reduce((sum, entry) => sum + entry.pages, 0);
}

export function averagePagesPerMonth(table: ReadingTable): number | undefined {
  const entries = datedPages(table);
  if (entries.length === 0) return undefined;
  const months = new Set(entries.map((entry) => monthOf(entry.date)));
  const total = entries.reduce((sum, entry) => sum + entry.pages, 0);
  return total / Math.max(1, months.size);
}

export function averagePagesPerBook(table: ReadingTable): number | undefined {
  requireColumns(table, COLUMNS.pages);
  return mean(table.records.flatMap((r) => (r.pages ? [r.pages] : [])));
}

export function topGenres(table: ReadingTable, n: number): RankedName[] {
  requireColumns(table, COLUMNS.genres);
  return rankNames(table.records.flatMap((r) => r.genres ?? []), n);
}

function mostRecentlyReadFirst(a: BookRecord, b: BookRecord): number {
  if (a.dateRead === b.dateRead) return 0;
  if (a.dateRead === undefined) return 1;
  if (b.dateRead === undefined) return -1;
  return compareText(b.dateRead, a.dateRead);
}

export function booksByAuthor(table: ReadingTable, name: string): BookRecord[] {
  requireColumns(table, COLUMNS.author);
  const key = authorKey(name.trim());
  return table.records
    .filter((r) => knownAuthors(r).some((author) => authorKey(author) === key))
    .sort(mostRecentlyReadFirst);
}

export function booksPublishedIn(table: ReadingTable, year: number): BookRecord[] {
  requireColumns(table, COLUMNS.yearPublished);
  return table.records.filter((r) => r.yearPublished === year).sort(mostRecentlyReadFirst);
}
