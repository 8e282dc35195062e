/**
 * Pipeline orchestrator.
 * Runs search → id mapping → download for each subject, with subjects processed
 * independently under their own concurrency limit.
 */

import type { AppConfig } from "../config.js";
import type { CredentialPool, CredentialSource } from "../credentials.js";
import { downloadAll } from "../download/batch-downloader.js";
import { CancelledError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { mapIds } from "../mapping/id-converter.js";
import { computeTotals, writeRunReport, writeSubjectReport } from "../report.js";
import { sleep } from "../retry.js";
import { searchAllIds } from "../search/esearch.js";
import type { ResultSink } from "../sink/types.js";
import type { FetchOutcome, MappedId, PrimaryId, RunReport, SubjectReport, SubjectStatus } from "../types.js";

export const UNMAPPED_REASON = "unmapped: no secondary identifier";

export interface PipelineDeps {
  config: AppConfig;
  pool: CredentialPool;
  sink: ResultSink;
  logger: Logger;
  signal?: AbortSignal;
  /** Write CSV/JSON reports under config.reportDir (default: true) */
  writeReports?: boolean;
  onSubjectComplete?: (report: SubjectReport) => void;
}

/** Drop repeated ids, keeping the first occurrence. */
export function uniqueIds(ids: readonly string[]): string[] {
  return [...new Set(ids)];
}

/**
 * Put outcomes back into the order their identifiers were submitted.
 * Every submitted identifier gets a row; one that somehow produced no outcome
 * is reported as failed rather than dropped.
 */
export function orderOutcomes(submitted: readonly string[], outcomes: readonly FetchOutcome[]): FetchOutcome[] {
  const byId = new Map<string, FetchOutcome[]>();
  for (const outcome of outcomes) {
    const queue = byId.get(outcome.identifier) ?? [];
    queue.push(outcome);
    byId.set(outcome.identifier, queue);
  }
  return submitted.map(
    (identifier) =>
      byId.get(identifier)?.shift() ?? { identifier, persisted: false, error: "missing outcome" }
  );
}

function retrySettings(config: AppConfig) {
  return {
    tool: config.tool,
    retryDelayMs: config.retryDelayMs,
    retryJitterMs: config.retryJitterMs,
    requestDelayMs: config.requestDelayMs,
  };
}

interface SubjectDraft {
  status: SubjectStatus;
  truncated: boolean;
  primaryIds: PrimaryId[];
  duplicates: number;
  mappings?: MappedId[];
  submitted: string[];
  outcomes: FetchOutcome[];
  unmapped: FetchOutcome[];
  error?: string;
}

function emptyDraft(): SubjectDraft {
  return {
    status: "completed",
    truncated: false,
    primaryIds: [],
    duplicates: 0,
    submitted: [],
    outcomes: [],
    unmapped: [],
  };
}

function finishReport(subject: string, draft: SubjectDraft, startedAt: Date): SubjectReport {
  const finishedAt = new Date();
  const ordered = [...orderOutcomes(draft.submitted, draft.outcomes), ...draft.unmapped];
  const persisted = ordered.filter((o) => o.persisted).length;

  const report: SubjectReport = {
    subject,
    status: draft.status,
    truncated: draft.truncated,
    counts: {
      primaryIds: draft.primaryIds.length,
      duplicates: draft.duplicates,
      mapped: draft.mappings ? draft.mappings.filter((m) => m.secondaryId).length : 0,
      unmapped: draft.unmapped.length,
      submitted: draft.submitted.length,
      persisted,
      failed: draft.submitted.length - persisted,
    },
    outcomes: ordered,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };
  if (draft.mappings) report.mappings = draft.mappings;
  if (draft.error) report.error = draft.error;
  return report;
}

async function downloadStage(
  ids: string[],
  draft: SubjectDraft,
  deps: PipelineDeps,
  credentials: CredentialSource,
  log: Logger
): Promise<void> {
  const { config } = deps;
  draft.submitted = ids;
  draft.outcomes = await downloadAll(ids, deps.sink, {
    ...config.download,
    ...retrySettings(config),
    credentials,
    logger: log,
    ...(deps.signal ? { signal: deps.signal } : {}),
  });
  if (deps.signal?.aborted) draft.status = "cancelled";
}

/**
 * Run the whole pipeline for one subject.
 * Never throws: cancellation and unexpected errors are reflected in the report status.
 */
export async function runSubject(
  subject: string,
  deps: PipelineDeps,
  credentials: CredentialSource = deps.pool.forSubject()
): Promise<SubjectReport> {
  const { config } = deps;
  const log = deps.logger.child({ subject });
  const startedAt = new Date();
  const draft = emptyDraft();
  const signal = deps.signal ? { signal: deps.signal } : {};

  // Pinned source: next() returns this subject's credential
  const pinned = config.credentialSelection === "per-subject" ? { email: credentials.next().email } : {};
  log.info({ credentialSelection: config.credentialSelection, ...pinned }, "subject_start");

  try {
    const search = await searchAllIds(subject, {
      ...config.search,
      ...retrySettings(config),
      requestTimeoutMs: config.requestTimeoutMs,
      credentials,
      logger: log,
      ...signal,
    });
    draft.truncated = search.truncated;
    draft.primaryIds = uniqueIds(search.ids);
    draft.duplicates = search.ids.length - draft.primaryIds.length;

    if (draft.primaryIds.length === 0) {
      draft.status = "no_results";
      log.info("subject_no_results");
    } else if (config.idMap.enabled) {
      draft.mappings = await mapIds(draft.primaryIds, {
        ...config.idMap,
        ...retrySettings(config),
        requestTimeoutMs: config.requestTimeoutMs,
        credentials,
        logger: log,
        ...signal,
      });
      const secondary: string[] = [];
      for (const m of draft.mappings) {
        if (m.secondaryId) secondary.push(m.secondaryId);
        else draft.unmapped.push({ identifier: m.primaryId, persisted: false, error: m.error ?? UNMAPPED_REASON });
      }
      await downloadStage(uniqueIds(secondary), draft, deps, credentials, log);
    } else {
      await downloadStage(draft.primaryIds, draft, deps, credentials, log);
    }
  } catch (err) {
    if (err instanceof CancelledError) {
      draft.status = "cancelled";
      log.warn("subject_cancelled");
    } else {
      draft.status = "failed";
      draft.error = errorMessage(err);
      log.error({ error: draft.error }, "subject_failed");
    }
  }

  const report = finishReport(subject, draft, startedAt);
  log.info(
    { status: report.status, truncated: report.truncated, ...report.counts, durationMs: report.durationMs },
    "subject_complete"
  );
  return report;
}

/**
 * Download an explicit identifier list, skipping search and mapping.
 * The report is labelled with `label` in place of a subject.
 */
export async function runDownloadOnly(
  ids: readonly string[],
  deps: PipelineDeps,
  label = "download"
): Promise<SubjectReport> {
  const log = deps.logger.child({ subject: label });
  const startedAt = new Date();
  const draft = emptyDraft();
  draft.primaryIds = uniqueIds(ids);
  draft.duplicates = ids.length - draft.primaryIds.length;

  if (draft.primaryIds.length === 0) {
    draft.status = "no_results";
  } else {
    await downloadStage(draft.primaryIds, draft, deps, deps.pool.forSubject(), log);
  }

  const report = finishReport(label, draft, startedAt);
  await persistSubjectReport(report, deps, log);
  return report;
}

async function persistSubjectReport(report: SubjectReport, deps: PipelineDeps, log: Logger): Promise<void> {
  if (deps.writeReports === false) return;
  try {
    const files = await writeSubjectReport(deps.config.reportDir, report);
    log.debug({ files }, "subject_report_written");
  } catch (err) {
    log.error({ error: errorMessage(err) }, "report_write_failed");
  }
}

/**
 * Run every subject and aggregate the results.
 * At most `config.subjectConcurrency` subjects run at once (default: all of them).
 */
export async function runPipeline(subjects: readonly string[], deps: PipelineDeps): Promise<RunReport> {
  const { config, logger } = deps;
  const startedAt = new Date();
  const concurrency = config.subjectConcurrency ?? Math.max(subjects.length, 1);
  const reports: SubjectReport[] = new Array(subjects.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < subjects.length) {
      const index = nextIndex++;
      const subject = subjects[index];
      if (subject === undefined) continue;

      const report = await runSubject(subject, deps);
      reports[index] = report;
      await persistSubjectReport(report, deps, logger.child({ subject }));
      deps.onSubjectComplete?.(report);

      if (nextIndex < subjects.length) await sleep(config.subjectCooldownMs, deps.signal);
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, subjects.length) }, () => worker());
  await Promise.all(workers);

  const finishedAt = new Date();
  const run: RunReport = {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    totals: computeTotals(reports),
    subjects: reports,
  };

  if (deps.writeReports !== false) {
    try {
      await writeRunReport(config.reportDir, run);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, "report_write_failed");
    }
  }

  logger.info({ ...run.totals, durationMs: run.durationMs }, "run_complete");
  return run;
}
