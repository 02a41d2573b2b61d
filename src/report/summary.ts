import { CHECK_STATUSES, CheckOutcome, CheckStatus } from "../types/checkOutcome";
import { RunReport, RunSummary } from "../types/runReport";

export function summarize(outcomes: readonly CheckOutcome[]): RunSummary {
  const counts: Record<CheckStatus, number> = {
    unchanged: 0,
    changed: 0,
    unreachable: 0,
    extraction_failed: 0
  };
  for (const outcome of outcomes) {
    counts[outcome.status] += 1;
  }
  return { ...counts, total: outcomes.length };
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_DRIFT = 2;
export const EXIT_FAILURES = 3;

/**
 * 0 when every source is unchanged, 3 when any source could not be checked,
 * 2 when the only news is drift.
 */
export function exitCodeFor(report: RunReport): number {
  const { summary } = report;
  if (summary.unreachable > 0 || summary.extraction_failed > 0) return EXIT_FAILURES;
  if (summary.changed > 0) return EXIT_DRIFT;
  return EXIT_OK;
}

export function formatSummary(summary: RunSummary): string {
  return CHECK_STATUSES.map((status) => `${status}=${summary[status]}`).join(" ") + ` total=${summary.total}`;
}
