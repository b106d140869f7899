#!/usr/bin/env node
import { basename, dirname, join } from "path";
import { loadConfig } from "./config.js";
import { booksNeedingGenres, enrichGenres, goodreadsFetcher, mergeGenres, summarizeLookups } from "./enrich.js";
import { loadGoodreadsCSV, writeGoodreadsCSV } from "./goodreads.js";
import { readBooks } from "./insights.js";

const config = loadConfig();
const CSV_FILE = process.argv[2] || "data/goodreads_library_export.csv";
const OUT_FILE = process.argv[3] || join(dirname(CSV_FILE), `enriched_${basename(CSV_FILE)}`);

async function main() {
  const table = readBooks(loadGoodreadsCSV(CSV_FILE));
  const bookIds = booksNeedingGenres(table);
  console.log(`Fetching genres for ${bookIds.length} books (${config.enrichConcurrency} at a time)...\n`);

  const titles = new Map(table.records.map((r) => [r.bookId, r.title]));
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nCancelling, waiting for in-flight requests...");
    controller.abort();
  });

  const lookups = await enrichGenres(bookIds, {
    fetchGenres: goodreadsFetcher({ baseUrl: config.goodreadsBaseUrl }),
    concurrency: config.enrichConcurrency,
    timeoutMs: config.enrichTimeoutMs,
    signal: controller.signal,
    onResult: (bookId, lookup, done, total) => {
      const title = (titles.get(bookId) || bookId).substring(0, 45);
      const detail =
        lookup.status === "found"
          ? lookup.genres.slice(0, 5).join(", ")
          : lookup.status === "not_found"
            ? "(no genres)"
            : `(failed: ${lookup.reason})`;
      console.log(`[${done}/${total}] ${title}... ${detail}`);
    },
  });

  const summary = summarizeLookups(lookups);
  if (controller.signal.aborted) {
    console.log("\nCancelled. Nothing written.");
    return;
  }

  writeGoodreadsCSV(OUT_FILE, mergeGenres(table, lookups));
  console.log(`\nDone! ${summary.found} found, ${summary.notFound} without genres, ${summary.failed} failed.`);
  console.log(`Enriched CSV saved to ${OUT_FILE}`);
}

main().catch(console.error);
