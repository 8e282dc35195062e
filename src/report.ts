/**
 * Outcome reports: CSV tables with one row per identifier, plus JSON summaries.
 */

import { mkdir, writeFile } from "node:fs/promises";
import {
  getIdMapPath,
  getOutcomesPath,
  getRunOutcomesPath,
  getRunSummaryPath,
  getSummaryPath,
} from "./paths.js";
import type { FetchOutcome, MappedId, RunReport, RunTotals, SubjectReport } from "./types.js";

/** Quote a CSV field when it contains a delimiter, quote or line break (RFC 4180). */
export function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [header, ...rows].map((row) => row.map(csvField).join(","));
  return lines.join("\n") + "\n";
}

function outcomeRow(outcome: FetchOutcome): string[] {
  return [outcome.identifier, outcome.persisted ? "yes" : "no", outcome.error ?? ""];
}

export function outcomesToCsv(outcomes: readonly FetchOutcome[]): string {
  return formatCsv(["identifier", "persisted", "error"], outcomes.map(outcomeRow));
}

export function idMapToCsv(mappings: readonly MappedId[]): string {
  return formatCsv(
    ["primary_id", "secondary_id"],
    mappings.map((m) => [m.primaryId, m.secondaryId ?? ""])
  );
}

export function runOutcomesToCsv(subjects: readonly SubjectReport[]): string {
  const rows = subjects.flatMap((s) => s.outcomes.map((o) => [s.subject, ...outcomeRow(o)]));
  return formatCsv(["subject", "identifier", "persisted", "error"], rows);
}

/** Subject report without the per-identifier tables. */
export function summarizeSubject(report: SubjectReport): Omit<SubjectReport, "outcomes" | "mappings"> {
  const { outcomes: _outcomes, mappings: _mappings, ...summary } = report;
  return summary;
}

export function computeTotals(subjects: readonly SubjectReport[]): RunTotals {
  const totals: RunTotals = {
    subjects: subjects.length,
    primaryIds: 0,
    submitted: 0,
    persisted: 0,
    failed: 0,
    truncatedSubjects: 0,
    noResultSubjects: 0,
    cancelledSubjects: 0,
    failedSubjects: 0,
  };
  for (const s of subjects) {
    totals.primaryIds += s.counts.primaryIds;
    totals.submitted += s.counts.submitted;
    totals.persisted += s.counts.persisted;
    totals.failed += s.counts.failed;
    if (s.truncated) totals.truncatedSubjects++;
    if (s.status === "no_results") totals.noResultSubjects++;
    if (s.status === "cancelled") totals.cancelledSubjects++;
    if (s.status === "failed") totals.failedSubjects++;
  }
  return totals;
}

async function writeJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

/**
 * Write the outcome table, the id map (when mapping ran) and the summary for one subject.
 * @returns Paths of the files written
 */
export async function writeSubjectReport(reportDir: string, report: SubjectReport): Promise<string[]> {
  await mkdir(reportDir, { recursive: true });
  const written: string[] = [];

  const outcomesPath = getOutcomesPath(reportDir, report.subject);
  await writeFile(outcomesPath, outcomesToCsv(report.outcomes), "utf-8");
  written.push(outcomesPath);

  if (report.mappings) {
    const idMapPath = getIdMapPath(reportDir, report.subject);
    await writeFile(idMapPath, idMapToCsv(report.mappings), "utf-8");
    written.push(idMapPath);
  }

  const summaryPath = getSummaryPath(reportDir, report.subject);
  await writeJson(summaryPath, summarizeSubject(report));
  written.push(summaryPath);

  return written;
}

/** Write the cross-subject summary and outcome table. */
export async function writeRunReport(reportDir: string, run: RunReport): Promise<string[]> {
  await mkdir(reportDir, { recursive: true });

  const summaryPath = getRunSummaryPath(reportDir);
  await writeJson(summaryPath, {
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    durationMs: run.durationMs,
    totals: run.totals,
    subjects: run.subjects.map(summarizeSubject),
  });

  const outcomesPath = getRunOutcomesPath(reportDir);
  await writeFile(outcomesPath, runOutcomesToCsv(run.subjects), "utf-8");

  return [summaryPath, outcomesPath];
}
