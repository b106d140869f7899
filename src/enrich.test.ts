import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  booksNeedingGenres,
  enrichGenres,
  EnrichmentRun,
  goodreadsFetcher,
  mergeGenres,
  summarizeLookups,
} from "./enrich.js";
import { EnrichmentStateError } from "./errors.js";
import { book, EXPORT_COLUMNS, makeTable } from "./test-utils.js";
import type { GenreFetcher, GenreLookup } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function gate() {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

const ids = (n: number) => Array.from({ length: n }, (_v, i) => String(i + 1));

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("enrichGenres", () => {
  it("returns one entry per id even when lookups fail", async () => {
    const fetchGenres: GenreFetcher = async (bookId) => {
      const n = Number(bookId);
      if (n % 2 === 1) throw new Error("connection reset");
      if (n % 4 === 0) return [];
      return [`Genre ${bookId}`];
    };

    const lookups = await enrichGenres(ids(10), { fetchGenres, concurrency: 3 });

    expect([...lookups.keys()]).toEqual(ids(10));
    expect(lookups.get("1")).toEqual({ status: "failed", reason: "connection reset" });
    expect(lookups.get("2")).toEqual({ status: "found", genres: ["Genre 2"] });
    expect(lookups.get("4")).toEqual({ status: "not_found" });
    expect(summarizeLookups(lookups)).toEqual({ total: 10, found: 3, notFound: 2, failed: 5 });
  });

  it("looks up duplicate ids once", async () => {
    const fetchGenres = vi.fn<GenreFetcher>().mockResolvedValue(["Fiction"]);

    const lookups = await enrichGenres(["7", "7", "8"], { fetchGenres });

    expect(lookups.size).toBe(2);
    expect(fetchGenres).toHaveBeenCalledTimes(2);
  });

  it("never has more than the configured number of lookups in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const fetchGenres: GenreFetcher = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
      return ["Fiction"];
    };

    await enrichGenres(ids(10), { fetchGenres, concurrency: 3 });

    expect(peak).toBe(3);
  });

  it("attributes results by id whatever order they complete in", async () => {
    const table = makeTable(ids(5).map((id) => book(`Book ${id}`, { "Book Id": id })));
    const byDelay =
      (delay: (n: number) => number): GenreFetcher =>
      async (bookId) => {
        await sleep(delay(Number(bookId)));
        return [`Genre ${bookId}`];
      };

    const slowFirst = await enrichGenres(ids(5), { fetchGenres: byDelay((n) => (6 - n) * 4), concurrency: 5 });
    const fastFirst = await enrichGenres(ids(5), { fetchGenres: byDelay((n) => n * 4), concurrency: 5 });

    const merged = mergeGenres(table, slowFirst);
    expect(merged).toEqual(mergeGenres(table, fastFirst));
    expect(merged.records[0].genres).toEqual(["Genre 1"]);
    expect(merged.records[4].genres).toEqual(["Genre 5"]);
  });

  it("treats a lookup that outlives its timeout as failed", async () => {
    const fetchGenres: GenreFetcher = (bookId) =>
      bookId === "2" ? new Promise<string[]>(() => {}) : Promise.resolve(["Fiction"]);

    const lookups = await enrichGenres(ids(3), { fetchGenres, timeoutMs: 20 });

    expect(lookups.get("2")).toEqual({ status: "failed", reason: "timed out after 20ms" });
    expect(lookups.get("1")).toEqual({ status: "found", genres: ["Fiction"] });
    expect(lookups.get("3")).toEqual({ status: "found", genres: ["Fiction"] });
  });

  it("passes an abort signal that fires on timeout", async () => {
    let received: AbortSignal | undefined;
    const fetchGenres: GenreFetcher = (_bookId, signal) => {
      received = signal;
      return new Promise<string[]>(() => {});
    };

    await enrichGenres(["1"], { fetchGenres, timeoutMs: 10 });

    expect(received?.aborted).toBe(true);
  });

  it("stops dispatching once cancelled but keeps every id in the result", async () => {
    const controller = new AbortController();
    const fetchGenres = vi.fn<GenreFetcher>(async () => {
      controller.abort();
      return ["Fiction"];
    });

    const lookups = await enrichGenres(ids(6), { fetchGenres, concurrency: 2, signal: controller.signal });

    expect(fetchGenres).toHaveBeenCalledTimes(1);
    expect(lookups.size).toBe(6);
    expect(lookups.get("1")).toEqual({ status: "found", genres: ["Fiction"] });
    expect(lookups.get("6")).toEqual({ status: "failed", reason: "cancelled" });
  });

  it("reports progress for every id", async () => {
    const onResult = vi.fn();
    await enrichGenres(ids(4), { fetchGenres: async () => ["Fiction"], onResult, concurrency: 2 });

    expect(onResult).toHaveBeenCalledTimes(4);
    expect(onResult.mock.calls.map((call) => call[2])).toEqual([1, 2, 3, 4]);
    expect(onResult.mock.calls.every((call) => call[3] === 4)).toBe(true);
  });

  it("falls back to the default width for an unusable concurrency", async () => {
    const fetchGenres = vi.fn<GenreFetcher>().mockResolvedValue(["Fiction"]);

    const lookups = await enrichGenres(["1", "2"], { fetchGenres, concurrency: NaN });

    expect(fetchGenres).toHaveBeenCalledTimes(2);
    expect(lookups.get("2")).toEqual({ status: "found", genres: ["Fiction"] });
  });

  it("handles an empty batch", async () => {
    const fetchGenres = vi.fn<GenreFetcher>();
    expect((await enrichGenres([], { fetchGenres })).size).toBe(0);
    expect(fetchGenres).not.toHaveBeenCalled();
  });
});

describe("mergeGenres", () => {
  const table = makeTable([
    book("A", { "Book Id": "1" }),
    book("B", { "Book Id": "2" }),
    book("A again", { "Book Id": "1" }),
  ]);

  it("writes found genres into every matching record without touching the input", () => {
    const before = JSON.stringify(table);
    const lookups = new Map<string, GenreLookup>([
      ["1", { status: "found", genres: ["Fantasy", "Fiction"] }],
      ["2", { status: "failed", reason: "HTTP 500" }],
    ]);

    const merged = mergeGenres(table, lookups);

    expect(merged.columns).toEqual([...EXPORT_COLUMNS, "Genres"]);
    expect(merged.records[0].genres).toEqual(["Fantasy", "Fiction"]);
    expect(merged.records[0].row["Genres"]).toBe("Fantasy | Fiction");
    expect(merged.records[2].genres).toEqual(["Fantasy", "Fiction"]);
    expect(merged.records[1]).toBe(table.records[1]);
    expect(JSON.stringify(table)).toBe(before);
  });

  it("does not add the genres column twice", () => {
    const once = mergeGenres(table, new Map());
    expect(mergeGenres(once, new Map()).columns).toEqual(once.columns);
  });
});

describe("booksNeedingGenres", () => {
  it("lists distinct ids without genres", () => {
    const table = makeTable(
      [
        book("A", { "Book Id": "1", Genres: "Fiction" }),
        book("B", { "Book Id": "2" }),
        book("B again", { "Book Id": "2" }),
        book("No id"),
      ],
      [...EXPORT_COLUMNS, "Genres"]
    );
    expect(booksNeedingGenres(table)).toEqual(["2"]);
  });
});

describe("goodreadsFetcher", () => {
  it("skips ids that are not Goodreads ids", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const fetchGenres = goodreadsFetcher({ fetchImpl });

    expect(await fetchGenres("manual-123", new AbortController().signal)).toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("fetches numeric ids from the configured host", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('<a href="/genres/poetry">Poetry</a>', { status: 200 }));
    const fetchGenres = goodreadsFetcher({ baseUrl: "https://example.test", fetchImpl });

    expect(await fetchGenres("42", new AbortController().signal)).toEqual(["Poetry"]);
    expect(fetchImpl.mock.calls[0][0]).toBe("https://example.test/book/show/42");
  });
});

describe("EnrichmentRun", () => {
  it("moves from idle through running to complete", async () => {
    const run = new EnrichmentRun(["1", "2"], { fetchGenres: async () => ["Fiction"] });
    expect(run.state).toBe("idle");

    const finished = run.start();
    expect(run.state).toBe("running");
    await finished;

    expect(run.state).toBe("complete");
    expect(run.done).toBe(2);
    expect(run.total).toBe(2);
    expect(run.summary).toEqual({ total: 2, found: 2, notFound: 0, failed: 0 });
  });

  it("can only be started once", async () => {
    const run = new EnrichmentRun(["1"], { fetchGenres: async () => [] });
    await run.start();
    await expect(run.start()).rejects.toThrow(EnrichmentStateError);
  });

  it("lets in-flight lookups finish after cancel", async () => {
    const release = gate();
    const fetchGenres = vi.fn<GenreFetcher>(async () => {
      await release.promise;
      return ["Fiction"];
    });
    const run = new EnrichmentRun(["1", "2", "3"], { fetchGenres, concurrency: 1 });

    const finished = run.start();
    run.cancel();
    release.open();
    await finished;

    expect(run.state).toBe("cancelled");
    expect(fetchGenres).toHaveBeenCalledTimes(1);
    expect(run.summary).toEqual({ total: 3, found: 1, notFound: 0, failed: 2 });
  });
});
