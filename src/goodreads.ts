import * as cheerio from "cheerio";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { readFileSync, writeFileSync } from "fs";
import { parseDateKey } from "./dates.js";
import type { BookRecord, ReadingTable } from "./types.js";

export const COLUMNS = {
  bookId: "Book Id",
  title: "Title",
  author: "Author",
  additionalAuthors: "Additional Authors",
  myRating: "My Rating",
  avgRating: "Average Rating",
  publisher: "Publisher",
  binding: "Binding",
  pages: "Number of Pages",
  yearPublished: "Year Published",
  dateRead: "Date Read",
  shelf: "Exclusive Shelf",
  genres: "Genres",
} as const;

export const UNKNOWN_AUTHOR = "Unknown Author";
export const GENRE_SEPARATOR = " | ";

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export function loadGoodreadsCSV(filepath: string): ReadingTable {
  return parseGoodreadsCSV(readFileSync(filepath, "utf-8"));
}

export function parseGoodreadsCSV(content: string): ReadingTable {
  let columns: string[] = [];
  const rows = parse(content, {
    bom: true,
    columns: (header: string[]) => {
      columns = header.map((name) => name.trim());
      return columns;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  }) as Record<string, string>[];

  return { columns, records: rows.map(toRecord) };
}

export function toRecord(row: Record<string, string>): BookRecord {
  const cell = (name: string) => (row[name] ?? "").trim();

  return {
    bookId: cell(COLUMNS.bookId),
    title: cell(COLUMNS.title),
    authors: parseAuthors(cell(COLUMNS.author), cell(COLUMNS.additionalAuthors)),
    avgRating: positive(parseFloat(cell(COLUMNS.avgRating))),
    myRating: positive(parseFloat(cell(COLUMNS.myRating))) ?? 0,
    pages: positiveInteger(cell(COLUMNS.pages)),
    publisher: cell(COLUMNS.publisher) || undefined,
    binding: cell(COLUMNS.binding) || undefined,
    yearPublished: positiveInteger(cell(COLUMNS.yearPublished)),
    dateRead: parseDateKey(cell(COLUMNS.dateRead)),
    shelf: cell(COLUMNS.shelf) || undefined,
    genres: parseGenreCell(cell(COLUMNS.genres)),
    row: { ...row },
  };
}

function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(" ");
}

export function parseAuthors(primary: string, additional: string): string[] {
  const authors: string[] = [];
  const main = collapseWhitespace(primary);
  if (main) authors.push(main);
  for (const name of additional.split(",")) {
    const cleaned = collapseWhitespace(name);
    if (cleaned) authors.push(cleaned);
  }
  return authors.length > 0 ? authors : [UNKNOWN_AUTHOR];
}

function positive(value: number): number | undefined {
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function positiveInteger(value: string): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Accepts our own "A | B" export format as well as list literals such as
 * "['Fiction', 'Fantasy']" and plain comma lists.
 */
export function parseGenreCell(value: string): string[] | undefined {
  const inner = value.trim().replace(/^\[/, "").replace(/\]$/, "");
  if (!inner) return undefined;
  const separator = inner.includes("|") ? "|" : ",";
  const genres = inner
    .split(separator)
    .map((part) => collapseWhitespace(part.trim().replace(/^['"]|['"]$/g, "")))
    .filter(Boolean);
  return genres.length > 0 ? genres : undefined;
}

export function formatGenres(genres: string[]): string {
  return genres.join(GENRE_SEPARATOR);
}

/** Serializes a table back to the export format, adding a Genres column. */
export function toGoodreadsCSV(table: ReadingTable): string {
  const columns = table.columns.includes(COLUMNS.genres)
    ? table.columns
    : [...table.columns, COLUMNS.genres];
  const rows = table.records.map((record) =>
    columns.map((column) => record.row[column] ?? "")
  );
  return stringify(rows, { header: true, columns });
}

export function writeGoodreadsCSV(filepath: string, table: ReadingTable): void {
  writeFileSync(filepath, toGoodreadsCSV(table));
}

export function isGoodreadsBookId(bookId: string): boolean {
  return /^\d+$/.test(bookId);
}

export interface GenreFetchOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
}

export async function fetchGoodreadsGenres(
  bookId: string,
  options: GenreFetchOptions = {}
): Promise<string[]> {
  const { baseUrl = "https://www.goodreads.com", fetchImpl = fetch, signal } = options;
  const res = await fetchImpl(`${baseUrl}/book/show/${bookId}`, {
    headers: { "User-Agent": USER_AGENT },
    signal,
  });
  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }
  return parseGenresFromHtml(await res.text());
}

export function parseGenresFromHtml(html: string): string[] {
  const $ = cheerio.load(html);
  const genres = new Set<string>();

  $(".BookPageMetadataSection__genres .BookPageMetadataSection__genreButton").each((_i, el) => {
    const label = collapseWhitespace($(el).text());
    if (label) genres.add(label);
  });

  if (genres.size === 0) {
    for (const match of html.matchAll(/genres\/([a-z-]+)/g)) {
      genres.add(slugToLabel(match[1]));
    }
  }

  return [...genres];
}

function slugToLabel(slug: string): string {
  return slug
    .split("-")
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(" ");
}
