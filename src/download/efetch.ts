/**
 * Batch document fetch via E-utilities efetch.
 *
 * API: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pmc&id={id1,id2,...}&retmode=xml
 */

import type { Credential } from "../types.js";
import { excerpt, TransientUpstreamError } from "../errors.js";
import { buildUrl, getText, identityParams } from "../upstream.js";

/** Content types accepted as valid XML responses */
const VALID_XML_TYPES = ["text/xml", "application/xml"];

export interface EfetchOptions {
  baseUrl: string;
  db: string;
  tool: string;
  timeoutMs: number;
}

function isValidXmlContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const base = (contentType.split(";")[0] ?? "").trim().toLowerCase();
  return VALID_XML_TYPES.includes(base);
}

/** Strip "PMC" prefix if present, returning numeric ID */
export function normalizePmcid(id: string): string {
  return id.trim().replace(/^PMC/i, "");
}

/**
 * Fetch the records for a batch of ids in one request.
 * @returns The raw XML body
 */
export async function fetchDocumentBatch(
  ids: readonly string[],
  credential: Credential,
  options: EfetchOptions
): Promise<string> {
  const url = buildUrl(options.baseUrl, {
    db: options.db,
    id: ids.map(normalizePmcid).join(","),
    retmode: "xml",
    ...identityParams(options.tool, credential),
  });

  const response = await getText(url, { timeoutMs: options.timeoutMs });

  if (!isValidXmlContentType(response.contentType)) {
    throw new TransientUpstreamError(
      "malformed",
      `Unexpected Content-Type: ${response.contentType ?? "none"} (expected XML)`,
      { status: response.status, bodyExcerpt: excerpt(response.text) }
    );
  }

  return response.text;
}
