/**
 * Thin wrapper over fetch for the rate-limited upstream services.
 * Every failure comes back as a TransientUpstreamError.
 */

import { errorMessage, excerpt, TransientUpstreamError } from "./errors.js";
import type { Credential } from "./types.js";

export interface UpstreamResponse {
  status: number;
  contentType: string | null;
  text: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
}

/** Query parameters that identify the requester to the upstream service. */
export function identityParams(tool: string, credential: Credential): Record<string, string> {
  return { tool, email: credential.email, api_key: credential.apiKey };
}

export function buildUrl(baseUrl: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params);
  return `${baseUrl}?${query.toString()}`;
}

/**
 * GET `url` and return its body.
 * Network errors, timeouts and non-2xx statuses are thrown as TransientUpstreamError.
 */
export async function getText(url: string, options: RequestOptions): Promise<UpstreamResponse> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: options.headers ?? {},
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    const reason = errorMessage(err);
    throw new TransientUpstreamError("transport", reason, { cause: err });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    const reason = errorMessage(err);
    throw new TransientUpstreamError("transport", `Failed to read response body: ${reason}`, {
      status: response.status,
      cause: err,
    });
  }

  if (!response.ok) {
    throw new TransientUpstreamError("status", `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
      bodyExcerpt: excerpt(text),
    });
  }

  return { status: response.status, contentType: response.headers.get("content-type"), text };
}

/** Parse a JSON body, reporting garbage as a malformed response. */
export function parseJsonBody(response: UpstreamResponse): unknown {
  try {
    return JSON.parse(response.text);
  } catch (err) {
    const reason = errorMessage(err);
    throw new TransientUpstreamError("malformed", `Invalid JSON: ${reason}`, {
      status: response.status,
      bodyExcerpt: excerpt(response.text),
      cause: err,
    });
  }
}
