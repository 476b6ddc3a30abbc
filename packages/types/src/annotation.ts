/**
 * Annotation Types
 *
 * An annotation is a time-ranged note attached to exactly one SLO.
 * Requests are built by the submitter, one per resolved SLO, and are
 * consumed exactly once.
 */

import type { SloIdentity } from "./slo.js";

/**
 * A single annotation to be created on the platform.
 */
export interface AnnotationRequest {
  /** Version-4 UUID, fresh for every request */
  readonly id: string;

  readonly sloIdentity: SloIdentity;

  /** Free text; may embed Markdown links */
  readonly description: string;

  /** Wire timestamp (YYYY-MM-DDTHH:MM:SSZ) */
  readonly startTime: string;

  /** Wire timestamp (YYYY-MM-DDTHH:MM:SSZ) */
  readonly endTime: string;
}

export interface SubmissionSuccess {
  readonly status: "success";
}

export interface SubmissionFailureResult {
  readonly status: "failure";
  /** Human-readable reason ("timeout", platform message, ...) */
  readonly reason: string;
  /** Machine-readable code (TIMEOUT, CONFLICT, HTTP_ERROR, ...) */
  readonly code: string;
}

export type SubmissionResult = SubmissionSuccess | SubmissionFailureResult;

/**
 * Outcome of submitting one request. Accumulated in submission order.
 */
export interface BatchOutcome {
  readonly request: AnnotationRequest;
  readonly result: SubmissionResult;
}

export interface BatchFailure {
  readonly identity: SloIdentity;
  readonly reason: string;
}

export interface BatchSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly failures: readonly BatchFailure[];
}

/**
 * Annotation as returned by the platform listing endpoint.
 */
export interface Annotation {
  readonly name: string;
  readonly project: string;
  readonly slo: string;
  readonly description: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly category?: string | undefined;
  readonly objectiveName?: string | undefined;
}
