/**
 * Durable storage for fetched documents, one document per identifier.
 */

export type StoreResult = { ok: true; location: string } | { ok: false; error: string };

/**
 * Implementations must be idempotent (a second store for the same identifier
 * overwrites the first) and must report failures as `{ ok: false }` rather than throw.
 */
export interface ResultSink {
  /** Human-readable target, e.g. a directory or an s3:// URL */
  readonly target: string;
  store(identifier: string, content: string): Promise<StoreResult>;
}

/** Map an identifier to a name safe for paths and object keys. */
export function toStorageName(identifier: string, extension: string): string {
  const safe = identifier.trim().replace(/[^A-Za-z0-9._-]/g, "_") || "_";
  return `${safe}${extension}`;
}
