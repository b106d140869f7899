import { SchemaError } from "./errors.js";
import {
  averagePagesPerBook,
  averagePagesPerMonth,
  bindingDistribution,
  booksByPublicationYear,
  booksPerYear,
  cumulativePagesOverTime,
  longestBooks,
  shortestBooks,
  summarize,
  topAuthors,
  topGenres,
  topPublishers,
  topRatedByCommunity,
  topRatedByPersonal,
  totalPagesRead,
} from "./insights.js";
import { readingStreaks } from "./streak.js";
import type {
  BookRecord,
  LibrarySummary,
  PagesPoint,
  RankedName,
  ReadingTable,
  StreakSummary,
  YearCount,
} from "./types.js";

export const LENGTH_RANKING_SIZE = 5;

export type Section<T> = { ok: true; value: T } | { ok: false; error: string };

export interface BookRow {
  bookId: string;
  title: string;
  author: string;
  myRating: number | undefined;
  avgRating: number | undefined;
  pages: number | undefined;
  dateRead: string | undefined;
}

/** Each figure needs different columns, so each can fail on its own. */
export interface ReadingPace {
  averagePagesPerMonth: Section<number | undefined>;
  totalPagesRead: Section<number | undefined>;
  averagePagesPerBook: Section<number | undefined>;
}

export interface InsightsReport {
  summary: LibrarySummary;
  booksPerYear: Section<YearCount[]>;
  topAuthors: Section<RankedName[]>;
  topPublishers: Section<RankedName[]>;
  bindings: Section<Record<string, number>>;
  publicationYears: Section<YearCount[]>;
  topRatedPersonal: Section<BookRow[]>;
  topRatedCommunity: Section<BookRow[]>;
  longestBooks: Section<BookRow[]>;
  shortestBooks: Section<BookRow[]>;
  cumulativePages: Section<PagesPoint[]>;
  pace: ReadingPace;
  streaks: Section<StreakSummary>;
  topGenres: Section<RankedName[]>;
}

export function toBookRow(record: BookRecord): BookRow {
  return {
    bookId: record.bookId,
    title: record.title,
    author: record.authors.join(", "),
    myRating: record.myRating > 0 ? record.myRating : undefined,
    avgRating: record.avgRating,
    pages: record.pages,
    dateRead: record.dateRead,
  };
}

/** Runs one aggregate; a schema error becomes a failed section, anything else propagates. */
export function section<T>(compute: () => T): Section<T> {
  try {
    return { ok: true, value: compute() };
  } catch (error) {
    if (error instanceof SchemaError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

export function buildReport(table: ReadingTable, topN: number): InsightsReport {
  const rows = (records: BookRecord[]) => records.map(toBookRow);

  return {
    summary: summarize(table),
    booksPerYear: section(() => booksPerYear(table)),
    topAuthors: section(() => topAuthors(table, topN)),
    topPublishers: section(() => topPublishers(table, topN)),
    bindings: section(() => bindingDistribution(table)),
    publicationYears: section(() => booksByPublicationYear(table)),
    topRatedPersonal: section(() => rows(topRatedByPersonal(table, topN))),
    topRatedCommunity: section(() => rows(topRatedByCommunity(table, topN))),
    longestBooks: section(() => rows(longestBooks(table, LENGTH_RANKING_SIZE))),
    shortestBooks: section(() => rows(shortestBooks(table, LENGTH_RANKING_SIZE))),
    cumulativePages: section(() => cumulativePagesOverTime(table)),
    pace: {
      averagePagesPerMonth: section(() => averagePagesPerMonth(table)),
      totalPagesRead: section(() => totalPagesRead(table)),
      averagePagesPerBook: section(() => averagePagesPerBook(table)),
    },
    streaks: section(() => readingStreaks(table)),
    topGenres: section(() => topGenres(table, topN)),
  };
}

function fixed(value: number | undefined): string {
  return value === undefined ? "N/A" : value.toFixed(2);
}

function heading(title: string): string[] {
  return ["", "=".repeat(60), title, "=".repeat(60)];
}

function formatSection<T>(result: Section<T>, render: (value: T) => string[]): string[] {
  if (!result.ok) return [`(${result.error})`];
  const lines = render(result.value);
  return lines.length > 0 ? lines : ["(no data)"];
}

function paceLine<T>(label: string, result: Section<T>, render: (value: T) => string): string {
  return `${label}: ${result.ok ? render(result.value) : `(${result.error})`}`;
}

function rankedLines(items: RankedName[]): string[] {
  return items.map((item, i) => `${i + 1}. ${item.name} (${item.count})`);
}

function bookLines(books: BookRow[], value: (book: BookRow) => string): string[] {
  return books.map((book, i) => `${i + 1}. [${value(book)}] ${book.title.substring(0, 55)}\n   by ${book.author}`);
}

/** Plain-text rendering for the terminal. */
export function formatReport(report: InsightsReport): string {
  const { summary } = report;
  const lines: string[] = [
    ...heading("SUMMARY"),
    `Books read: ${summary.totalBooks}`,
    `Your average rating: ${fixed(summary.averagePersonalRating)}`,
    `Average Goodreads rating: ${fixed(summary.averageCommunityRating)}`,
    `Unique authors: ${summary.uniqueAuthors ?? "N/A"}`,

    ...heading("READING PACE"),
    paceLine("Average pages per month", report.pace.averagePagesPerMonth, fixed),
    paceLine("Total pages read", report.pace.totalPagesRead, (total) => total?.toLocaleString("en-US") ?? "N/A"),
    paceLine("Average pages per book", report.pace.averagePagesPerBook, fixed),
    ...formatSection(report.streaks, (streak) =>
      streak.longestStreakDays === 0
        ? ["Longest reading streak: N/A"]
        : [
            `Longest reading streak: ${streak.longestStreakDays} days (${
              streak.streakStart === streak.streakEnd
                ? streak.streakStart
                : `${streak.streakStart} to ${streak.streakEnd}`
            })`,
            `Most books finished in one day: ${streak.maxBooksInOneDay} (${streak.maxDay})`,
          ]
    ),

    ...heading("BOOKS READ EACH YEAR"),
    ...formatSection(report.booksPerYear, (years) => years.map((y) => `${y.year}: ${y.count}`)),

    ...heading("TOP AUTHORS"),
    ...formatSection(report.topAuthors, rankedLines),

    ...heading("TOP PUBLISHERS"),
    ...formatSection(report.topPublishers, rankedLines),

    ...heading("BINDING DISTRIBUTION"),
    ...formatSection(report.bindings, (bindings) =>
      Object.entries(bindings).map(([binding, count]) => `${binding}: ${count}`)
    ),

    ...heading("BOOKS BY YEAR PUBLISHED"),
    ...formatSection(report.publicationYears, (years) => years.map((y) => `${y.year}: ${y.count}`)),

    ...heading("YOUR TOP RATED BOOKS"),
    ...formatSection(report.topRatedPersonal, (books) => bookLines(books, (b) => fixed(b.myRating))),

    ...heading("TOP BOOKS BY GOODREADS RATING"),
    ...formatSection(report.topRatedCommunity, (books) => bookLines(books, (b) => fixed(b.avgRating))),

    ...heading("LONGEST BOOKS"),
    ...formatSection(report.longestBooks, (books) => bookLines(books, (b) => `${b.pages} pp`)),

    ...heading("SHORTEST BOOKS"),
    ...formatSection(report.shortestBooks, (books) => bookLines(books, (b) => `${b.pages} pp`)),

    ...heading("TOP GENRES"),
    ...formatSection(report.topGenres, rankedLines),
  ];
  return lines.join("\n");
}
