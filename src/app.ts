import express, { type NextFunction, type Request, type Response } from "express";
import { EnrichmentStateError, NoTableError, SchemaError } from "./errors.js";
import type { ReadingSession } from "./session.js";

export interface AppOptions {
  topN: number;
  maxTopN?: number;
}

function parseTopN(value: unknown, fallback: number, max: number): number {
  const parsed = typeof value === "string" ? parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
}

export function createApp(session: ReadingSession, options: AppOptions): express.Express {
  const { topN, maxTopN = 100 } = options;
  const app = express();

  app.post("/api/library", express.text({ type: ["text/csv", "text/plain"], limit: "20mb" }), (req, res) => {
    if (typeof req.body !== "string" || !req.body.trim()) {
      res.status(400).json({ error: "CSV body is required" });
      return;
    }
    const name = typeof req.query.name === "string" && req.query.name ? req.query.name : undefined;
    try {
      const result = session.load(req.body, name);
      console.log(`Loaded ${result.readBooks}/${result.totalBooks} read books from ${session.fileName}`);
      res.json(result);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      res.status(400).json({ error: `Error processing the CSV file: ${message}` });
    }
  });

  app.get("/api/insights", (req, res) => {
    const report = session.report(parseTopN(req.query.top, topN, maxTopN));
    res.json({ fileName: session.fileName, report });
  });

  app.get("/api/authors/:name/books", (req, res) => {
    const books = session.booksByAuthor(req.params.name);
    res.json({ author: req.params.name, books });
  });

  app.get("/api/publication-years/:year/books", (req, res) => {
    const year = Number(req.params.year);
    if (!Number.isInteger(year)) {
      res.status(400).json({ error: "Year must be an integer" });
      return;
    }
    res.json({ year, books: session.booksPublishedIn(year) });
  });

  app.post("/api/enrich", (_req, res) => {
    if (session.enrichmentActive) {
      throw new EnrichmentStateError("Enrichment is already running");
    }
    session
      .enrich()
      .then((status) => {
        const { found, notFound, failed } = status.summary;
        console.log(`Enrichment ${status.state}: ${found} found, ${notFound} without genres, ${failed} failed`);
      })
      .catch((error) => console.error("Enrichment failed:", error));
    res.status(202).json(session.enrichmentStatus());
  });

  app.get("/api/enrich", (_req, res) => {
    res.json(session.enrichmentStatus());
  });

  app.post("/api/enrich/cancel", (_req, res) => {
    res.json({ cancelled: session.cancelEnrichment() });
  });

  app.get("/api/export", (_req, res) => {
    const csv = session.exportCSV();
    res.setHeader("Content-Type", "text/csv; charset=utf-8");
    res.setHeader("Content-Disposition", `attachment; filename="${session.exportFileName.replace(/"/g, "")}"`);
    res.send(csv);
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof NoTableError) {
      res.status(409).json({ error: error.message });
    } else if (error instanceof EnrichmentStateError) {
      res.status(409).json({ error: error.message });
    } else if (error instanceof SchemaError) {
      res.status(422).json({ error: error.message, missingColumns: error.missingColumns });
    } else {
      console.error("Unhandled error:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}
