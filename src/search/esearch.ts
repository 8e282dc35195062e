/**
 * Paginated search client (E-utilities esearch).
 * Walks the result set page by page until an empty page or the upstream offset ceiling.
 *
 * API: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=pubmed&term={term}&retmode=json&retstart={offset}&retmax={pageSize}
 */

import { z } from "zod";
import type { CredentialSource } from "../credentials.js";
import { errorMessage, excerpt, TransientUpstreamError } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep, withRetry } from "../retry.js";
import type { PrimaryId, SearchResult } from "../types.js";
import { buildUrl, getText, identityParams, parseJsonBody } from "../upstream.js";

export interface SearchOptions {
  baseUrl: string;
  db: string;
  pageSize: number;
  /** Stop once the cumulative offset reaches this value */
  maxOffset: number;
  /** Send the subject as an exact phrase */
  quoteTerm: boolean;
  tool: string;
  credentials: CredentialSource;
  retryDelayMs: number;
  retryJitterMs: number;
  /** Pause between successful page requests */
  requestDelayMs: number;
  requestTimeoutMs: number;
  logger: Logger;
  signal?: AbortSignal;
}

const ESearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.union([z.string(), z.number()])),
    ERROR: z.string().optional(),
  }),
});

export function buildSearchTerm(subject: string, quote: boolean): string {
  return quote ? `"${subject}"` : subject;
}

/** Request one page. Any failure is thrown as a TransientUpstreamError. */
async function fetchPage(subject: string, offset: number, options: SearchOptions): Promise<PrimaryId[]> {
  const credential = options.credentials.next();
  const url = buildUrl(options.baseUrl, {
    db: options.db,
    term: buildSearchTerm(subject, options.quoteTerm),
    retmode: "json",
    retmax: String(options.pageSize),
    retstart: String(offset),
    ...identityParams(options.tool, credential),
  });

  const response = await getText(url, { timeoutMs: options.requestTimeoutMs });
  const parsed = ESearchResponseSchema.safeParse(parseJsonBody(response));
  if (!parsed.success) {
    throw new TransientUpstreamError("malformed", "Unexpected esearch response shape", {
      status: response.status,
      bodyExcerpt: excerpt(response.text),
    });
  }

  const result = parsed.data.esearchresult;
  if (result.ERROR) {
    throw new TransientUpstreamError("malformed", `esearch error: ${result.ERROR}`, {
      status: response.status,
      bodyExcerpt: excerpt(response.text),
    });
  }
  return result.idlist.map(String);
}

/**
 * Collect every primary id for a subject, in page order.
 *
 * A failed page is retried without limit and never skipped; each retry is logged
 * so a stalled subject stays visible. Duplicates across pages are kept.
 *
 * @throws CancelledError when the signal aborts
 */
export async function searchAllIds(subject: string, options: SearchOptions): Promise<SearchResult> {
  const log = options.logger.child({ component: "search", subject });
  const ids: PrimaryId[] = [];
  let offset = 0;
  let pages = 0;
  let truncated = false;

  for (;;) {
    const pageOffset = offset;
    const page = await withRetry(() => fetchPage(subject, pageOffset, options), {
      policy: {
        maxAttempts: "unbounded",
        delayMs: options.retryDelayMs,
        jitterMs: options.retryJitterMs,
      },
      signal: options.signal,
      onRetry: ({ attempt, error, delayMs }) => {
        log.warn(
          {
            offset: pageOffset,
            attempt,
            delayMs,
            error: errorMessage(error),
            ...(error instanceof TransientUpstreamError && error.status !== undefined
              ? { status: error.status }
              : {}),
          },
          "search_page_retry"
        );
      },
    });

    if (page.length === 0) break;

    ids.push(...page);
    pages++;
    offset += page.length;
    log.debug({ offset: pageOffset, count: page.length }, "search_page_ok");

    if (offset >= options.maxOffset) {
      truncated = true;
      log.warn({ offset, maxOffset: options.maxOffset }, "search_truncated");
      break;
    }

    await sleep(options.requestDelayMs, options.signal);
  }

  log.info({ total: ids.length, pages, truncated }, "search_complete");
  return { ids, truncated, pages };
}
