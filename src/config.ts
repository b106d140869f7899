import "dotenv/config";

export interface Config {
  port: number;
  enrichConcurrency: number;
  enrichTimeoutMs: number;
  goodreadsBaseUrl: string;
  topN: number;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: positiveInt(env.PORT, 3456),
    enrichConcurrency: positiveInt(env.ENRICH_CONCURRENCY, 8),
    enrichTimeoutMs: positiveInt(env.ENRICH_TIMEOUT_MS, 15_000),
    goodreadsBaseUrl: (env.GOODREADS_BASE_URL || "https://www.goodreads.com").replace(/\/+$/, ""),
    topN: positiveInt(env.TOP_N, 10),
  };
}
