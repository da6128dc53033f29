import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultConfig } from "../config/loader.js";
import { DownloadError } from "../errors.js";
import { createDownloader, Downloader } from "../fetcher/downloader.js";
import { DownloadQueue } from "../fetcher/queue.js";
import { isRetryable, RetryPolicy } from "../fetcher/retry.js";
import type { Transport, TransportResponse } from "../fetcher/transport.js";
import type { DownloadResult } from "../types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  const encoder = new TextEncoder();
  for (const part of parts) {
    yield encoder.encode(part);
  }
}

async function* failingBody(): AsyncGenerator<Uint8Array> {
  yield new TextEncoder().encode("%PDF-");
  throw new Error("socket hang up");
}

function ok(...parts: string[]): TransportResponse {
  return { statusCode: 200, url: "", headers: {}, body: chunks(...parts) };
}

function status(code: number): TransportResponse {
  return { statusCode: code, url: "", headers: {}, body: null };
}

/**
 * Transport answering each URL from a queue of responses; the last
 * response repeats once the queue is exhausted.
 */
function scriptedTransport(routes: Record<string, Array<() => TransportResponse>>) {
  const calls: string[] = [];
  const get = vi.fn(async (url: string): Promise<TransportResponse> => {
    calls.push(url);
    const script = routes[url];
    if (!script || script.length === 0) return status(404);
    const next = script.length > 1 ? script.shift() : script[0];
    if (!next) return status(404);
    return next();
  });
  const transport: Transport = {
    get,
    head: vi.fn(async () => status(200)),
    close: vi.fn(async () => {}),
  };
  return { transport, get, calls };
}

function makeDownloader(
  dir: string,
  transport: Transport,
  overrides: { overwriteExisting?: boolean; attempts?: number } = {},
  onResult?: (result: DownloadResult) => void,
): Downloader {
  return new Downloader({
    downloadDir: dir,
    transport,
    chunkSize: 8192,
    overwriteExisting: overrides.overwriteExisting ?? false,
    retry: new RetryPolicy({
      attempts: overrides.attempts ?? 3,
      baseDelayMs: 2000,
      maxDelayMs: 10000,
      sleep: async () => {},
    }),
    onResult,
  });
}

// ---------------------------------------------------------------------------
// RetryPolicy
// ---------------------------------------------------------------------------

describe("RetryPolicy", () => {
  it("doubles the delay and caps it", () => {
    const policy = new RetryPolicy({ attempts: 5, baseDelayMs: 2000, maxDelayMs: 10000 });
    expect([1, 2, 3, 4].map((n) => policy.delayFor(n))).toEqual([2000, 4000, 8000, 10000]);
  });

  it("retries network errors until the call succeeds", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const policy = new RetryPolicy({ attempts: 3, baseDelayMs: 2000, maxDelayMs: 10000, sleep });
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new DownloadError("reset", "https://x.test/a.pdf"))
      .mockRejectedValueOnce(new DownloadError("reset", "https://x.test/a.pdf"))
      .mockResolvedValueOnce("ok");

    await expect(policy.execute(fn)).resolves.toBe("ok");
    expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
  });

  it("gives up after the configured attempts with the last error", async () => {
    const policy = new RetryPolicy({ attempts: 2, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => {} });
    const fn = vi.fn(async () => {
      throw new DownloadError("HTTP 502 for u", "u", 502);
    });

    await expect(policy.execute(fn)).rejects.toThrow("HTTP 502 for u");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors or foreign errors", async () => {
    const policy = new RetryPolicy({ attempts: 3, baseDelayMs: 1, maxDelayMs: 1, sleep: async () => {} });
    const notFound = vi.fn(async () => {
      throw new DownloadError("HTTP 404 for u", "u", 404);
    });
    const bug = vi.fn(async () => {
      throw new TypeError("boom");
    });

    await expect(policy.execute(notFound)).rejects.toThrow("HTTP 404 for u");
    await expect(policy.execute(bug)).rejects.toThrow("boom");
    expect(notFound).toHaveBeenCalledTimes(1);
    expect(bug).toHaveBeenCalledTimes(1);
  });

  it("classifies retryable failures", () => {
    expect(isRetryable(new DownloadError("net", "u"))).toBe(true);
    expect(isRetryable(new DownloadError("busy", "u", 429))).toBe(true);
    expect(isRetryable(new DownloadError("down", "u", 503))).toBe(true);
    expect(isRetryable(new DownloadError("gone", "u", 410))).toBe(false);
    expect(isRetryable(new Error("other"))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// DownloadQueue
// ---------------------------------------------------------------------------

describe("DownloadQueue", () => {
  it("never runs more tasks than its concurrency", async () => {
    const queue = new DownloadQueue(2);
    let running = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        queue.add(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 5));
          running--;
          return n * 10;
        }),
      ),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it("propagates task failures to the caller", async () => {
    const queue = new DownloadQueue(1);
    await expect(
      queue.add(async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");
  });
});

// ---------------------------------------------------------------------------
// Downloader
// ---------------------------------------------------------------------------

describe("Downloader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "pdf-harvest-dl-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("streams the body to the destination file", async () => {
    const { transport } = scriptedTransport({
      "https://docs.test/a.pdf": [() => ok("%PDF-1.4 ", "hello")],
    });

    const result = await makeDownloader(dir, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result.success).toBe(true);
    expect(result.status).toBe("completed");
    expect(result.filepath).toBe(join(dir, "a.pdf"));
    expect(result.sizeBytes).toBe(14);
    expect(await readFile(join(dir, "a.pdf"), "utf-8")).toBe("%PDF-1.4 hello");
    expect(await readdir(dir)).toEqual(["a.pdf"]);
  });

  it("creates the download directory on demand", async () => {
    const nested = join(dir, "site", "docs");
    const { transport } = scriptedTransport({ "https://docs.test/a.pdf": [() => ok("x")] });

    const result = await makeDownloader(nested, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result.status).toBe("completed");
    expect(existsSync(join(nested, "a.pdf"))).toBe(true);
  });

  it("skips an existing file without touching the network", async () => {
    await writeFile(join(dir, "a.pdf"), "old");
    const { transport, get } = scriptedTransport({ "https://docs.test/a.pdf": [() => ok("new")] });

    const result = await makeDownloader(dir, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result).toEqual({
      success: true,
      url: "https://docs.test/a.pdf",
      filename: "a.pdf",
      filepath: join(dir, "a.pdf"),
      sizeBytes: 3,
      elapsedSeconds: 0,
      status: "already_exists",
    });
    expect(get).not.toHaveBeenCalled();
    expect(await readFile(join(dir, "a.pdf"), "utf-8")).toBe("old");
  });

  it("replaces an existing file when overwriting is enabled", async () => {
    await writeFile(join(dir, "a.pdf"), "old");
    const { transport } = scriptedTransport({ "https://docs.test/a.pdf": [() => ok("new")] });

    const result = await makeDownloader(dir, transport, { overwriteExisting: true }).downloadOne(
      "https://docs.test/a.pdf",
      "a.pdf",
    );

    expect(result.status).toBe("completed");
    expect(await readFile(join(dir, "a.pdf"), "utf-8")).toBe("new");
  });

  it("fails a 404 on the first attempt and leaves no file", async () => {
    const { transport, get } = scriptedTransport({ "https://docs.test/a.pdf": [() => status(404)] });

    const result = await makeDownloader(dir, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result.success).toBe(false);
    expect(result.status).toBe("failed");
    expect(result.errorMessage).toBe("HTTP 404 for https://docs.test/a.pdf");
    expect(result.filepath).toBeUndefined();
    expect(get).toHaveBeenCalledTimes(1);
    expect(await readdir(dir)).toEqual([]);
  });

  it("retries a 503 and succeeds on the next attempt", async () => {
    const { transport, get } = scriptedTransport({
      "https://docs.test/a.pdf": [() => status(503), () => ok("%PDF")],
    });

    const result = await makeDownloader(dir, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result.status).toBe("completed");
    expect(get).toHaveBeenCalledTimes(2);
  });

  it("discards the body of an error response before retrying", async () => {
    const discard = vi.fn(async () => {});
    const { transport, get } = scriptedTransport({
      "https://docs.test/a.pdf": [
        () => ({ ...status(503), body: chunks("busy"), discard }),
        () => ok("%PDF"),
      ],
    });

    const result = await makeDownloader(dir, transport).downloadOne("https://docs.test/a.pdf", "a.pdf");

    expect(result.status).toBe("completed");
    expect(get).toHaveBeenCalledTimes(2);
    expect(discard).toHaveBeenCalledTimes(1);
  });

  it("removes the partial file when the transfer breaks", async () => {
    const { transport, get } = scriptedTransport({
      "https://docs.test/a.pdf": [
        () => ({ statusCode: 200, url: "", headers: {}, body: failingBody() }),
      ],
    });

    const result = await makeDownloader(dir, transport, { attempts: 2 }).downloadOne(
      "https://docs.test/a.pdf",
      "a.pdf",
    );

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("Transfer of https://docs.test/a.pdf failed: socket hang up");
    expect(get).toHaveBeenCalledTimes(2);
    expect(await readdir(dir)).toEqual([]);
  });

  it("isolates failures within a batch and reports every result", async () => {
    const { transport } = scriptedTransport({
      "https://docs.test/a.pdf": [() => ok("a")],
      "https://docs.test/b.pdf": [() => status(403)],
      "https://docs.test/c.pdf": [() => ok("c")],
    });
    const onResult = vi.fn();

    const results = await makeDownloader(dir, transport, {}, onResult).downloadBatch(
      [
        { url: "https://docs.test/a.pdf", filename: "a.pdf" },
        { url: "https://docs.test/b.pdf", filename: "b.pdf" },
        { url: "https://docs.test/c.pdf", filename: "c.pdf" },
      ],
      2,
    );

    expect(results).toHaveLength(3);
    expect(onResult).toHaveBeenCalledTimes(3);
    expect(results.filter((r) => r.success).map((r) => r.filename).sort()).toEqual(["a.pdf", "c.pdf"]);
    expect(results.find((r) => r.filename === "b.pdf")?.errorMessage).toBe(
      "HTTP 403 for https://docs.test/b.pdf",
    );
    expect((await readdir(dir)).sort()).toEqual(["a.pdf", "c.pdf"]);
  });

  it("returns an empty list for an empty batch", async () => {
    const { transport } = scriptedTransport({});
    expect(await makeDownloader(dir, transport).downloadBatch([], 4)).toEqual([]);
  });

  it("builds a downloader from configuration", () => {
    const { transport } = scriptedTransport({});
    const downloader = createDownloader(defaultConfig(), dir, transport);
    expect(downloader.downloadDir).toBe(dir);
  });
});
