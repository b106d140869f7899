import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { goodreadsFetcher } from "./enrich.js";
import { ReadingSession } from "./session.js";

const config = loadConfig();

const session = new ReadingSession({
  fetchGenres: goodreadsFetcher({ baseUrl: config.goodreadsBaseUrl }),
  concurrency: config.enrichConcurrency,
  timeoutMs: config.enrichTimeoutMs,
});

const app = createApp(session, { topN: config.topN });

const server = app.listen(config.port, () => {
  console.log(`API server running at http://localhost:${config.port}`);
});

function shutdown() {
  console.log("Shutting down...");
  session.cancelEnrichment();
  server.close(() => {
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
