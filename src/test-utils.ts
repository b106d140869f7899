import { toRecord } from "./goodreads.js";
import type { ReadingTable } from "./types.js";

export const EXPORT_COLUMNS = [
  "Book Id",
  "Title",
  "Author",
  "Additional Authors",
  "My Rating",
  "Average Rating",
  "Publisher",
  "Binding",
  "Number of Pages",
  "Year Published",
  "Date Read",
  "Exclusive Shelf",
];

/** Builds a table from partial rows; cells not given are blank. */
export function makeTable(rows: Record<string, string>[], columns: string[] = EXPORT_COLUMNS): ReadingTable {
  return {
    columns,
    records: rows.map((row) => {
      const full: Record<string, string> = {};
      for (const column of columns) {
        full[column] = row[column] ?? "";
      }
      return toRecord(full);
    }),
  };
}

export function book(title: string, cells: Record<string, string> = {}): Record<string, string> {
  return { Title: title, "Exclusive Shelf": "read", ...cells };
}
