/**
 * @slo-annotator/types — Shared domain types for the annotator stack.
 *
 * These types are used across all packages:
 * - SLO identity and catalog records
 * - Target scope selection
 * - Annotation requests, outcomes and summaries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// SLO types
export type { SloIdentity, SloRecord, SloKey } from "./slo.js";
export { sloKey, parseSloKey } from "./slo.js";

// Scope types
export type {
  TargetScope,
  TargetScopeKind,
  ProjectScope,
  ServiceScope,
  IndividualScope,
  CompositeScope,
} from "./scope.js";

// Annotation types
export type {
  Annotation,
  AnnotationRequest,
  BatchOutcome,
  BatchFailure,
  BatchSummary,
  SubmissionResult,
  SubmissionSuccess,
  SubmissionFailureResult,
} from "./annotation.js";

// Runtime type guards
export { isFailedOutcome } from "./guards.js";
export type { FailedOutcome } from "./guards.js";
