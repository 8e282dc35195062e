/**
 * Shared data model for the bulk fetch pipeline.
 * Values here live for a single run; the sink is the only durable output.
 */

/**
 * Requester identification sent with every upstream request.
 */
export interface Credential {
  /** Contact address registered with the upstream service */
  email: string;
  /** Access token that raises the upstream rate limit */
  apiKey: string;
}

/** Opaque record identifier returned by search (a PMID for PubMed). */
export type PrimaryId = string;

/**
 * A primary identifier paired with its cross-reference, when one exists.
 */
export interface MappedId {
  primaryId: PrimaryId;
  /** Absent when the mapping service has no record for the id */
  secondaryId?: string;
  /** Set when the whole chunk was given up on after a malformed response */
  error?: string;
}

/**
 * Terminal record for one identifier that entered the downloader.
 */
export interface FetchOutcome {
  identifier: string;
  persisted: boolean;
  error?: string;
}

/**
 * Result of paginating a search for one subject.
 */
export interface SearchResult {
  ids: PrimaryId[];
  /** True when the pagination ceiling stopped the loop before an empty page */
  truncated: boolean;
  /** Number of pages that returned ids */
  pages: number;
}

export type SubjectStatus = "completed" | "no_results" | "cancelled" | "failed";

export interface SubjectCounts {
  /** Unique primary ids found by search */
  primaryIds: number;
  /** Repeated ids dropped from the search result */
  duplicates: number;
  mapped: number;
  unmapped: number;
  /** Identifiers handed to the downloader */
  submitted: number;
  persisted: number;
  failed: number;
}

/**
 * Per-subject report.
 * `outcomes` holds one row per submitted identifier in submission order,
 * followed by rows for primary ids that never reached the downloader.
 */
export interface SubjectReport {
  subject: string;
  status: SubjectStatus;
  truncated: boolean;
  counts: SubjectCounts;
  outcomes: FetchOutcome[];
  mappings?: MappedId[];
  /** ISO 8601 timestamps */
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: string;
}

export interface RunTotals {
  subjects: number;
  primaryIds: number;
  submitted: number;
  persisted: number;
  failed: number;
  truncatedSubjects: number;
  noResultSubjects: number;
  cancelledSubjects: number;
  failedSubjects: number;
}

/**
 * Aggregate report across every subject of a run.
 */
export interface RunReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  totals: RunTotals;
  subjects: SubjectReport[];
}
