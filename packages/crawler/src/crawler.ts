/**
 * Concurrent tree crawler.
 *
 * A fixed pool of workers lists directories taken from a bounded job
 * channel and publishes one result per job to a bounded results channel.
 * A single control loop consumes the results and is the only writer of
 * the pending-job counter, the job backlog and the collected entries.
 *
 * New jobs that do not fit in the job channel wait in the backlog and are
 * moved over (without blocking) after every processed result, so the
 * control loop never waits on a job send while workers wait on it.
 */

import {
  type ClientError,
  createCancelledError,
  createError,
  type FetchResult,
  type ListChildren,
  type Logger,
  silentLogger,
} from "@dirscope/client";
import type { Entry } from "@dirscope/protocol";
import { createChannel } from "./channel.ts";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 64;
export const DEFAULT_QUEUE_CAPACITY = 100;

// ============================================================================
// Types
// ============================================================================

/** Listing one directory's direct children */
export type CrawlJob = {
  dirId: number;
  dirName: string;
};

export type CrawlResult = {
  dirName: string;
  result: FetchResult<Entry[]>;
};

/**
 * Called after every successfully listed directory with the running number
 * of collected entries. Observational only.
 */
export type ProgressCallback = (dirName: string, total: number) => void;

export type CrawlOptions = {
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
};

export type TreeCrawlerConfig = {
  listChildren: ListChildren;
  /** Worker count, 1..64 (default: 5) */
  concurrency?: number;
  /** Capacity of the job and results channels (default: 100) */
  queueCapacity?: number;
  logger?: Logger;
};

export type TreeCrawler = {
  /**
   * Collect every entry below `rootId` (the root itself excluded).
   * Resolves to the complete set or to the first error, never a partial set.
   * Entry order is unspecified.
   */
  crawl: (rootId: number, rootName: string, options?: CrawlOptions) => Promise<FetchResult<Entry[]>>;
};

// ============================================================================
// Factory
// ============================================================================

export const createTreeCrawler = (config: TreeCrawlerConfig): TreeCrawler => {
  const {
    listChildren,
    concurrency = DEFAULT_CONCURRENCY,
    queueCapacity = DEFAULT_QUEUE_CAPACITY,
    logger = silentLogger,
  } = config;

  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new Error(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
  }
  if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
    throw new Error(`queueCapacity must be a positive integer, got ${queueCapacity}`);
  }

  /** listChildren is not expected to throw; if it does, the crawl fails with it */
  const listSafely = async (dirId: number, signal: AbortSignal): Promise<FetchResult<Entry[]>> => {
    try {
      return await listChildren(dirId, signal);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        error: createError("NETWORK_ERROR", `listing of ${dirId} failed: ${message}`, undefined, err),
      };
    }
  };

  const crawl: TreeCrawler["crawl"] = async (rootId, rootName, options = {}) => {
    const { onProgress, signal } = options;
    if (signal?.aborted) return { ok: false, error: createCancelledError() };

    // Stops the workers on every exit path, and follows the caller's signal.
    const stop = new AbortController();
    const onCallerAbort = () => stop.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const jobs = createChannel<CrawlJob>(queueCapacity);
    const results = createChannel<CrawlResult>(queueCapacity);

    const worker = async (): Promise<void> => {
      for (;;) {
        const job = await jobs.receive(stop.signal);
        if (!job.ok || stop.signal.aborted) return;

        const result = await listSafely(job.value.dirId, stop.signal);
        if (stop.signal.aborted) return;
        if (!(await results.send({ dirName: job.value.dirName, result }, stop.signal))) return;
      }
    };

    const backlog: CrawlJob[] = [];
    const entries: Entry[] = [];
    let pending = 1;
    let firstError: ClientError | undefined;
    let listed = 0;

    const refill = (): void => {
      for (let job = backlog.pop(); job; job = backlog.pop()) {
        if (!jobs.trySend(job)) {
          backlog.push(job);
          return;
        }
      }
    };

    backlog.push({ dirId: rootId, dirName: rootName });
    refill();

    logger.debug("crawl started", { rootId, rootName, concurrency });
    const workers = Array.from({ length: concurrency }, () => worker());

    try {
      while (pending > 0) {
        const received = await results.receive(signal);
        if (!received.ok) break;
        pending--;

        const { dirName, result } = received.value;
        if (firstError) continue;

        if (!result.ok) {
          firstError = result.error;
          const dropped = backlog.length + jobs.drain().length;
          backlog.length = 0;
          pending -= dropped;
          logger.debug("crawl failed, draining in-flight listings", {
            dirName,
            error: result.error.code,
            inFlight: pending,
          });
          continue;
        }

        listed++;
        entries.push(...result.data);
        try {
          onProgress?.(dirName, entries.length);
        } catch (err) {
          // Progress is observational; a failing observer does not fail the crawl.
          logger.debug("progress callback failed", {
            dirName,
            error: err instanceof Error ? err.message : String(err),
          });
        }

        for (const child of result.data) {
          if (child.kind === "dir") {
            pending++;
            backlog.push({ dirId: child.id, dirName: child.name });
          }
        }
        refill();
      }
    } finally {
      jobs.close();
      results.close();
      stop.abort();
      signal?.removeEventListener("abort", onCallerAbort);
      await Promise.all(workers);
    }

    if (signal?.aborted) {
      logger.debug("crawl cancelled", { directories: listed, entries: entries.length });
      return { ok: false, error: createCancelledError() };
    }
    if (firstError) return { ok: false, error: firstError };

    logger.debug("crawl finished", { directories: listed, entries: entries.length });
    return { ok: true, data: entries, status: 200 };
  };

  return { crawl };
};
