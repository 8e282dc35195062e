import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  computeTotals,
  csvField,
  idMapToCsv,
  outcomesToCsv,
  runOutcomesToCsv,
  writeRunReport,
  writeSubjectReport,
} from "./report.js";
import type { SubjectReport } from "./types.js";

function subjectReport(overrides: Partial<SubjectReport> = {}): SubjectReport {
  return {
    subject: "EGFR",
    status: "completed",
    truncated: false,
    counts: { primaryIds: 2, duplicates: 0, mapped: 2, unmapped: 0, submitted: 2, persisted: 1, failed: 1 },
    outcomes: [
      { identifier: "PMC1", persisted: true },
      { identifier: "PMC2", persisted: false, error: "transport: HTTP 500, retry later" },
    ],
    startedAt: "2026-01-01T00:00:00.000Z",
    finishedAt: "2026-01-01T00:00:01.000Z",
    durationMs: 1000,
    ...overrides,
  };
}

describe("CSV output", () => {
  it("quotes fields with commas, quotes or line breaks", () => {
    expect(csvField("plain")).toBe("plain");
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField("two\nlines")).toBe('"two\nlines"');
  });

  it("writes one outcome row per identifier", () => {
    expect(outcomesToCsv(subjectReport().outcomes)).toBe(
      'identifier,persisted,error\nPMC1,yes,\nPMC2,no,"transport: HTTP 500, retry later"\n'
    );
  });

  it("writes an empty secondary id for unmapped entries", () => {
    expect(idMapToCsv([{ primaryId: "11", secondaryId: "PMC1" }, { primaryId: "12" }])).toBe(
      "primary_id,secondary_id\n11,PMC1\n12,\n"
    );
  });

  it("prefixes run-level rows with the subject", () => {
    const csv = runOutcomesToCsv([
      subjectReport({ outcomes: [{ identifier: "PMC1", persisted: true }] }),
      subjectReport({ subject: "AXL", outcomes: [{ identifier: "PMC9", persisted: false, error: "cancelled" }] }),
    ]);

    expect(csv).toBe("subject,identifier,persisted,error\nEGFR,PMC1,yes,\nAXL,PMC9,no,cancelled\n");
  });
});

describe("computeTotals", () => {
  it("sums counts and tallies subject statuses", () => {
    const totals = computeTotals([
      subjectReport({ truncated: true }),
      subjectReport({
        subject: "NONE",
        status: "no_results",
        counts: { primaryIds: 0, duplicates: 0, mapped: 0, unmapped: 0, submitted: 0, persisted: 0, failed: 0 },
      }),
      subjectReport({ subject: "AXL", status: "cancelled" }),
    ]);

    expect(totals).toEqual({
      subjects: 3,
      primaryIds: 4,
      submitted: 4,
      persisted: 2,
      failed: 2,
      truncatedSubjects: 1,
      noResultSubjects: 1,
      cancelledSubjects: 1,
      failedSubjects: 0,
    });
  });
});

describe("report files", () => {
  let reportDir: string;

  beforeEach(() => {
    reportDir = join(tmpdir(), `report-test-${Date.now()}-${randomUUID()}`);
  });

  afterEach(async () => {
    await rm(reportDir, { recursive: true, force: true });
  });

  it("writes the outcome table and a summary without per-id rows", async () => {
    const written = await writeSubjectReport(reportDir, subjectReport());

    expect(written).toEqual([join(reportDir, "EGFR_outcomes.csv"), join(reportDir, "EGFR_summary.json")]);
    const summary: unknown = JSON.parse(await readFile(join(reportDir, "EGFR_summary.json"), "utf-8"));
    expect(summary).toEqual({
      subject: "EGFR",
      status: "completed",
      truncated: false,
      counts: { primaryIds: 2, duplicates: 0, mapped: 2, unmapped: 0, submitted: 2, persisted: 1, failed: 1 },
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:01.000Z",
      durationMs: 1000,
    });
  });

  it("adds the id map when mapping ran", async () => {
    const written = await writeSubjectReport(
      reportDir,
      subjectReport({ mappings: [{ primaryId: "11", secondaryId: "PMC1" }] })
    );

    expect(written).toContain(join(reportDir, "EGFR_id_map.csv"));
    await expect(readFile(join(reportDir, "EGFR_id_map.csv"), "utf-8")).resolves.toBe(
      "primary_id,secondary_id\n11,PMC1\n"
    );
  });

  it("writes the run summary and combined outcomes", async () => {
    const subjects = [subjectReport()];
    const written = await writeRunReport(reportDir, {
      startedAt: "2026-01-01T00:00:00.000Z",
      finishedAt: "2026-01-01T00:00:02.000Z",
      durationMs: 2000,
      totals: computeTotals(subjects),
      subjects,
    });

    expect(written).toEqual([join(reportDir, "run_summary.json"), join(reportDir, "run_outcomes.csv")]);
    const text = await readFile(join(reportDir, "run_summary.json"), "utf-8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(JSON.parse(text)).toMatchObject({ durationMs: 2000, totals: { subjects: 1, persisted: 1 } });
  });
});
