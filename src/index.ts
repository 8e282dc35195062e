/**
 * # pubmed-bulk-fetch
 *
 * Rate-limited bulk retrieval from NCBI E-utilities: paginated PubMed search,
 * PMID → PMCID mapping, and batch full-text download into local or S3 storage.
 *
 * ## Workflow
 *
 * For every subject (a search term such as a gene symbol):
 *
 * 1. **Search**: Page through esearch until the result set or the offset ceiling is exhausted.
 * 2. **Map**: Resolve PMIDs to PMCIDs in batches with the ID Converter (optional).
 * 3. **Download**: Fetch PMC XML in batches under a concurrency cap and store one document per id.
 * 4. **Report**: Record one outcome row per identifier, per subject and for the whole run.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { CredentialPool, createLogger, createSink, loadConfig, runPipeline } from "pubmed-bulk-fetch";
 *
 * const config = loadConfig("config.json");
 * const pool = new CredentialPool(config.credentials, {
 *   selection: config.credentialSelection,
 *   rotateEvery: config.rotateEvery,
 * });
 * const run = await runPipeline(["EGFR", "AXL"], {
 *   config,
 *   pool,
 *   sink: createSink(config),
 *   logger: createLogger(),
 * });
 * console.log(run.totals);
 * ```
 *
 * ## Modules
 *
 * - **Pipeline**: {@link runPipeline}, {@link runSubject}, {@link runDownloadOnly}
 * - **Stages**: {@link searchAllIds}, {@link mapIds}, {@link downloadAll}
 * - **Storage**: {@link createSink}, {@link FileSystemSink}, {@link S3Sink}
 * - **Support**: {@link CredentialPool}, {@link loadConfig}, {@link createLogger}, {@link withRetry}, {@link partition}
 *
 * @module pubmed-bulk-fetch
 */

// === Pipeline ===
export { runDownloadOnly, runPipeline, runSubject, orderOutcomes, uniqueIds } from "./pipeline/orchestrator.js";
export type { PipelineDeps } from "./pipeline/orchestrator.js";

// === Stages ===
export { searchAllIds, buildSearchTerm } from "./search/esearch.js";
export type { SearchOptions } from "./search/esearch.js";
export { mapIds } from "./mapping/id-converter.js";
export type { IdMapOptions, MalformedPolicy } from "./mapping/id-converter.js";
export { downloadAll } from "./download/batch-downloader.js";
export type { DownloadOptions } from "./download/batch-downloader.js";
export { fetchDocumentBatch, normalizePmcid } from "./download/efetch.js";
export { pairDocuments, splitRecords } from "./download/record-splitter.js";

// === Storage ===
export { createSink, FileSystemSink, S3Sink, toStorageName } from "./sink/index.js";
export type { ResultSink, StoreResult } from "./sink/index.js";

// === Reports ===
export { outcomesToCsv, idMapToCsv, writeRunReport, writeSubjectReport } from "./report.js";

// === Support ===
export { CredentialPool } from "./credentials.js";
export type { CredentialSource, CredentialPoolOptions, CredentialSelection } from "./credentials.js";
export { loadConfig, AppConfigSchema, DEFAULT_CONFIG } from "./config.js";
export type { AppConfig, SinkConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { withRetry, sleep } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { partition } from "./chunk.js";
export type { Chunk } from "./chunk.js";
export * from "./errors.js";

// === Types ===
export type {
  Credential,
  FetchOutcome,
  MappedId,
  PrimaryId,
  RunReport,
  RunTotals,
  SearchResult,
  SubjectCounts,
  SubjectReport,
  SubjectStatus,
} from "./types.js";
