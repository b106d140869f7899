export * from "./types.js";
export * from "./errors.js";
export * from "./insights.js";
export * from "./streak.js";
export * from "./enrich.js";
export * from "./cache.js";
export * from "./report.js";
export * from "./session.js";
export { createApp, type AppOptions } from "./app.js";
export {
  COLUMNS,
  fetchGoodreadsGenres,
  loadGoodreadsCSV,
  parseGenresFromHtml,
  parseGoodreadsCSV,
  toGoodreadsCSV,
  writeGoodreadsCSV,
} from "./goodreads.js";
export { parseDateKey } from "./dates.js";
