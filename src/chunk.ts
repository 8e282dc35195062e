/**
 * Deterministic partitioning of identifier lists into request-sized chunks.
 */

import { ConfigError } from "./errors.js";

export interface Chunk<T> {
  /** 0-based position of the chunk in the partition */
  index: number;
  items: T[];
}

/**
 * Split `items` into consecutive chunks of at most `size` elements.
 * Input order is preserved, so the same input and size always give the same boundaries.
 */
export function partition<T>(items: readonly T[], size: number): Chunk<T>[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: Chunk<T>[] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push({ index: chunks.length, items: items.slice(start, start + size) });
  }
  return chunks;
}
