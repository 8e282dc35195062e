/**
 * Path resolution utilities for run reports.
 */

import anyAscii from 'any-ascii';
import { join } from 'node:path';

/**
 * Turn a subject into a file-name-safe slug.
 * Non-ASCII letters are transliterated (e.g. "IL-1β" → "IL-1b"); case is kept.
 */
export function subjectSlug(subject: string): string {
  const slug = anyAscii(subject.trim())
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'subject';
}

/** Per-subject outcome table. */
export function getOutcomesPath(reportDir: string, subject: string): string {
  return join(reportDir, `${subjectSlug(subject)}_outcomes.csv`);
}

/** Per-subject primary → secondary id table. */
export function getIdMapPath(reportDir: string, subject: string): string {
  return join(reportDir, `${subjectSlug(subject)}_id_map.csv`);
}

/** Per-subject summary. */
export function getSummaryPath(reportDir: string, subject: string): string {
  return join(reportDir, `${subjectSlug(subject)}_summary.json`);
}

export function getRunSummaryPath(reportDir: string): string {
  return join(reportDir, 'run_summary.json');
}

export function getRunOutcomesPath(reportDir: string): string {
  return join(reportDir, 'run_outcomes.csv');
}
