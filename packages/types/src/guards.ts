/**
 * Runtime Type Guards
 *
 * Narrowing functions for annotator domain types.
 */

import type { BatchOutcome, SubmissionFailureResult } from "./annotation.js";

/**
 * A batch outcome whose submission failed.
 */
export type FailedOutcome = BatchOutcome & { readonly result: SubmissionFailureResult };

export function isFailedOutcome(outcome: BatchOutcome): outcome is FailedOutcome {
  return outcome.result.status === "failure";
}
