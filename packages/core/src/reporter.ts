/**
 * Batch Reporter
 *
 * Pure aggregation of per-item outcomes. No I/O, cannot fail.
 */

import type { BatchFailure, BatchOutcome, BatchSummary } from "@slo-annotator/types";
import { isFailedOutcome } from "@slo-annotator/types";

export function summarizeOutcomes(outcomes: readonly BatchOutcome[]): BatchSummary {
  const failures: BatchFailure[] = outcomes.filter(isFailedOutcome).map((outcome) => ({
    identity: outcome.request.sloIdentity,
    reason: outcome.result.reason,
  }));

  return {
    total: outcomes.length,
    succeeded: outcomes.length - failures.length,
    failed: failures.length,
    failures,
  };
}

/**
 * One-line rendering, e.g. "14/15 annotations created".
 */
export function formatSummaryLine(summary: BatchSummary): string {
  return `${summary.succeeded}/${summary.total} annotations created`;
}
