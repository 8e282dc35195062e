/**
 * Concurrent batch downloader.
 * Fetches documents in chunks under a concurrency cap, splits each batch response
 * into records, and hands every record to the sink.
 */

import { type Chunk, partition } from "../chunk.js";
import type { CredentialSource } from "../credentials.js";
import { CancelledError, ChunkFailure, ConfigError, errorMessage, SinkFailure } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep, withRetry } from "../retry.js";
import type { ResultSink } from "../sink/types.js";
import type { FetchOutcome } from "../types.js";
import { fetchDocumentBatch } from "./efetch.js";
import { type PairedDocument, pairDocuments, splitRecords } from "./record-splitter.js";

export const CANCELLED_REASON = "cancelled";

export interface DownloadOptions {
  baseUrl: string;
  db: string;
  /** Element name of one record inside the batch response */
  recordTag: string;
  chunkSize: number;
  /** Maximum chunks in flight, retries included */
  concurrency: number;
  /** Attempts per chunk including the first */
  maxAttempts: number;
  timeoutMs: number;
  retryDelayMs: number;
  retryJitterMs: number;
  /** Pause a worker takes before each request after its first */
  requestDelayMs: number;
  tool: string;
  credentials: CredentialSource;
  logger: Logger;
  signal?: AbortSignal;
  onProgress?: (progress: { completed: number; total: number; chunk: number }) => void;
}

function requirePositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

function failAll(ids: readonly string[], error: string): FetchOutcome[] {
  return ids.map((identifier) => ({ identifier, persisted: false, error }));
}

function toChunkFailure(error: unknown): ChunkFailure {
  if (error instanceof ChunkFailure) return error;
  return new ChunkFailure("transport", errorMessage(error), { cause: error });
}

/** Fetch, split and pair one chunk. Any failure here fails the attempt. */
async function fetchChunk(chunk: Chunk<string>, options: DownloadOptions): Promise<PairedDocument[]> {
  const xml = await fetchDocumentBatch(chunk.items, options.credentials.next(), {
    baseUrl: options.baseUrl,
    db: options.db,
    tool: options.tool,
    timeoutMs: options.timeoutMs,
  });
  return pairDocuments(chunk.items, splitRecords(xml, options.recordTag));
}

async function storeDocument(sink: ResultSink, pair: PairedDocument, log: Logger): Promise<FetchOutcome> {
  let failure: SinkFailure;
  try {
    const result = await sink.store(pair.identifier, pair.document);
    if (result.ok) return { identifier: pair.identifier, persisted: true };
    failure = new SinkFailure(pair.identifier, result.error);
  } catch (err) {
    failure = new SinkFailure(pair.identifier, errorMessage(err), { cause: err });
  }
  log.warn({ identifier: failure.identifier, code: failure.code, error: failure.message }, "sink_write_failed");
  return { identifier: failure.identifier, persisted: false, error: `sink: ${failure.message}` };
}

/**
 * Download one chunk, retrying the whole chunk up to `maxAttempts`.
 * Returns exactly one outcome per identifier in the chunk.
 */
async function processChunk(
  chunk: Chunk<string>,
  sink: ResultSink,
  options: DownloadOptions,
  log: Logger
): Promise<FetchOutcome[]> {
  let pairs: PairedDocument[];
  try {
    pairs = await withRetry(() => fetchChunk(chunk, options), {
      policy: {
        maxAttempts: options.maxAttempts,
        delayMs: options.retryDelayMs,
        jitterMs: options.retryJitterMs,
      },
      signal: options.signal,
      onRetry: ({ attempt, error, delayMs }) => {
        log.warn(
          { chunk: chunk.index, attempt, maxAttempts: options.maxAttempts, delayMs, error: errorMessage(error) },
          "download_chunk_attempt_failed"
        );
      },
    });
  } catch (err) {
    if (err instanceof CancelledError) return failAll(chunk.items, CANCELLED_REASON);

    const failure = toChunkFailure(err);
    log.error(
      { chunk: chunk.index, size: chunk.items.length, reason: failure.reason, error: failure.message },
      "download_chunk_exhausted"
    );
    return failAll(chunk.items, `${failure.reason}: ${failure.message}`);
  }

  const outcomes = await Promise.all(pairs.map((pair) => storeDocument(sink, pair, log)));
  const persisted = outcomes.filter((o) => o.persisted).length;
  log.debug({ chunk: chunk.index, size: chunk.items.length, persisted }, "download_chunk_ok");
  return outcomes;
}

/**
 * Download every identifier into the sink.
 *
 * Returns one outcome per input identifier, in completion order. At most
 * `concurrency` chunks are in flight at once; a chunk's retries reuse its slot.
 * After cancellation no new chunk starts, and unstarted chunks are recorded as cancelled.
 *
 * @throws ConfigError when concurrency, maxAttempts or chunkSize is not a positive integer
 */
export async function downloadAll(
  ids: readonly string[],
  sink: ResultSink,
  options: DownloadOptions
): Promise<FetchOutcome[]> {
  requirePositiveInt("concurrency", options.concurrency);
  requirePositiveInt("maxAttempts", options.maxAttempts);

  const log = options.logger.child({ component: "download" });
  const chunks = partition(ids, options.chunkSize);
  const outcomes: FetchOutcome[] = [];
  let nextIndex = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    let issued = false;
    while (nextIndex < chunks.length) {
      const chunk = chunks[nextIndex++];
      if (!chunk) continue;

      if (issued) await sleep(options.requestDelayMs, options.signal);
      if (options.signal?.aborted) {
        outcomes.push(...failAll(chunk.items, CANCELLED_REASON));
        continue;
      }

      issued = true;
      outcomes.push(...(await processChunk(chunk, sink, options, log)));
      completed++;
      options.onProgress?.({ completed, total: chunks.length, chunk: chunk.index });
    }
  }

  const workers = Array.from({ length: Math.min(options.concurrency, chunks.length) }, () => worker());
  await Promise.all(workers);

  const persisted = outcomes.filter((o) => o.persisted).length;
  log.info({ total: ids.length, chunks: chunks.length, persisted, failed: outcomes.length - persisted }, "download_complete");
  return outcomes;
}
