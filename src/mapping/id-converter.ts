/**
 * NCBI ID Converter client.
 * Maps PMIDs to PMCIDs in fixed-size batches, one request per batch.
 *
 * API: https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/?ids={id1,id2,...}&format=json
 */

import { z } from "zod";
import { partition } from "../chunk.js";
import type { CredentialSource } from "../credentials.js";
import { errorMessage, excerpt, TransientUpstreamError } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep, withRetry } from "../retry.js";
import type { MappedId, PrimaryId } from "../types.js";
import { buildUrl, getText, identityParams, parseJsonBody } from "../upstream.js";

/**
 * What to do with a 200 response whose body cannot be understood:
 * - retry: treat it like any other transient failure and retry without limit
 * - fail-chunk: give up on the chunk at once, leaving every id unmapped with an error
 */
export type MalformedPolicy = "retry" | "fail-chunk";

export interface IdMapOptions {
  baseUrl: string;
  chunkSize: number;
  onMalformed: MalformedPolicy;
  tool: string;
  credentials: CredentialSource;
  retryDelayMs: number;
  retryJitterMs: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  logger: Logger;
  signal?: AbortSignal;
}

const IdConvRecordSchema = z
  .object({
    pmid: z.union([z.string(), z.number()]).optional(),
    pmcid: z.string().optional(),
    errmsg: z.string().optional(),
  })
  .passthrough();

const IdConvResponseSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  records: z.array(IdConvRecordSchema).optional(),
});

type IdConvResponse = z.infer<typeof IdConvResponseSchema>;

function isMalformed(error: unknown): boolean {
  return error instanceof TransientUpstreamError && error.kind === "malformed";
}

/** Build the PMID → PMCID lookup from a response; records without a PMCID are skipped. */
function buildLookup(data: IdConvResponse): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const record of data.records ?? []) {
    if (record.errmsg || record.pmid === undefined || !record.pmcid) continue;
    lookup.set(String(record.pmid), record.pmcid);
  }
  return lookup;
}

async function resolveChunk(ids: PrimaryId[], options: IdMapOptions): Promise<Map<string, string>> {
  const credential = options.credentials.next();
  const url = buildUrl(options.baseUrl, {
    ...identityParams(options.tool, credential),
    format: "json",
    ids: ids.join(","),
  });

  const response = await getText(url, {
    headers: { "User-Agent": `${options.tool}/1.0 (mailto:${credential.email})` },
    timeoutMs: options.requestTimeoutMs,
  });

  const parsed = IdConvResponseSchema.safeParse(parseJsonBody(response));
  if (!parsed.success) {
    throw new TransientUpstreamError("malformed", "Unexpected ID converter response shape", {
      status: response.status,
      bodyExcerpt: excerpt(response.text),
    });
  }
  if (parsed.data.status === "error") {
    throw new TransientUpstreamError(
      "malformed",
      `ID converter error: ${parsed.data.message ?? "unknown error"}`,
      { status: response.status, bodyExcerpt: excerpt(response.text) }
    );
  }
  return buildLookup(parsed.data);
}

/**
 * Map every primary id to its secondary id.
 * Output has the same length and order as the input; a missing mapping is not an error.
 *
 * @throws CancelledError when the signal aborts
 */
export async function mapIds(ids: PrimaryId[], options: IdMapOptions): Promise<MappedId[]> {
  const log = options.logger.child({ component: "idmap" });
  const chunks = partition(ids, options.chunkSize);
  const results: MappedId[] = [];
  let mapped = 0;

  for (const chunk of chunks) {
    if (chunk.index > 0) await sleep(options.requestDelayMs, options.signal);

    let lookup: Map<string, string>;
    try {
      lookup = await withRetry(() => resolveChunk(chunk.items, options), {
        policy: {
          maxAttempts: "unbounded",
          delayMs: options.retryDelayMs,
          jitterMs: options.retryJitterMs,
        },
        signal: options.signal,
        shouldRetry: (error) => !(options.onMalformed === "fail-chunk" && isMalformed(error)),
        onRetry: ({ attempt, error, delayMs }) => {
          log.warn(
            { chunk: chunk.index, size: chunk.items.length, attempt, delayMs, error: errorMessage(error) },
            "idmap_chunk_retry"
          );
        },
      });
    } catch (err) {
      if (!isMalformed(err)) throw err;

      const reason = `malformed mapping response: ${errorMessage(err)}`;
      log.warn({ chunk: chunk.index, size: chunk.items.length, error: errorMessage(err) }, "idmap_chunk_malformed");
      for (const primaryId of chunk.items) results.push({ primaryId, error: reason });
      continue;
    }

    for (const primaryId of chunk.items) {
      const secondaryId = lookup.get(primaryId);
      if (secondaryId) {
        results.push({ primaryId, secondaryId });
        mapped++;
      } else {
        results.push({ primaryId });
      }
    }
  }

  log.info({ total: ids.length, mapped, chunks: chunks.length }, "idmap_complete");
  return results;
}
