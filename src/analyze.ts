#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { loadGoodreadsCSV } from "./goodreads.js";
import { readBooks } from "./insights.js";
import { buildReport, formatReport } from "./report.js";

const config = loadConfig();
const CSV_FILE = process.argv[2] || "data/goodreads_library_export.csv";
const TOP_N = parseInt(process.argv[3] || String(config.topN), 10);

function main() {
  console.log(`Loading books from ${CSV_FILE}...`);
  const library = loadGoodreadsCSV(CSV_FILE);
  const table = readBooks(library);
  console.log(`Found ${table.records.length} read books out of ${library.records.length} rows`);

  console.log(formatReport(buildReport(table, TOP_N)));
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
