/**
 * Error taxonomy for the annotation engine.
 *
 * Setup errors (validation, expansion, listing) are thrown before any
 * remote mutation. Per-item submission failures are recorded as
 * outcomes and never cancel sibling items.
 */

import type { SloIdentity } from "@slo-annotator/types";
import { sloKey } from "@slo-annotator/types";

/** Error codes for annotator operations. */
export type AnnotatorErrorCode =
  | "VALIDATION_ERROR"
  | "EXPANSION_ERROR"
  | "INVALID_ARGUMENT"
  | "LISTING_ERROR"
  | "SUBMISSION_FAILURE"
  | "AUTH_ERROR"
  | "CONFIG_ERROR";

/**
 * Base class for structured annotator errors.
 */
export class AnnotatorError extends Error {
  public readonly code: AnnotatorErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: AnnotatorErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "AnnotatorError";
    this.code = code;
    this.details = details;
  }
}

/**
 * A user-supplied value could not be accepted (bad timestamp, empty
 * description).
 */
export class ValidationError extends AnnotatorError {
  public readonly reason: string;
  public readonly input: string;

  constructor(reason: string, input: string) {
    super("VALIDATION_ERROR", `${reason}: "${input}"`, { reason, input });
    this.name = "ValidationError";
    this.reason = reason;
    this.input = input;
  }
}

/**
 * A target scope cannot be resolved to a valid SLO set. Terminal for
 * the batch: nothing is submitted.
 */
export class ExpansionError extends AnnotatorError {
  public readonly missing: readonly SloIdentity[];

  constructor(message: string, missing: readonly SloIdentity[] = []) {
    super("EXPANSION_ERROR", message, { missing: missing.map(sloKey) });
    this.name = "ExpansionError";
    this.missing = missing;
  }
}

/**
 * Programmer-facing misuse of an API.
 */
export class InvalidArgumentError extends AnnotatorError {
  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super("INVALID_ARGUMENT", message, details);
    this.name = "InvalidArgumentError";
  }
}

/**
 * The raw SLO listing is not in the expected shape.
 */
export class ListingError extends AnnotatorError {
  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super("LISTING_ERROR", message, details);
    this.name = "ListingError";
  }
}

/**
 * Remote rejection or transport error for a single annotation.
 *
 * Gateways throw this so the submitter can record a precise reason
 * and code; it is never propagated past the submitter.
 */
export class SubmissionFailure extends AnnotatorError {
  public readonly identity: SloIdentity;
  public readonly reason: string;
  public readonly failureCode: string;

  constructor(identity: SloIdentity, reason: string, failureCode = "SUBMISSION_FAILURE") {
    super("SUBMISSION_FAILURE", `${sloKey(identity)}: ${reason}`, {
      slo: sloKey(identity),
      reason,
      failureCode,
    });
    this.name = "SubmissionFailure";
    this.identity = identity;
    this.reason = reason;
    this.failureCode = failureCode;
  }
}

/**
 * Token acquisition failed. Terminal; raised before any expansion.
 */
export class AuthError extends AnnotatorError {
  public readonly statusCode: number;

  constructor(message: string, statusCode = 0, details: Readonly<Record<string, unknown>> = {}) {
    super("AUTH_ERROR", message, { ...details, statusCode });
    this.name = "AuthError";
    this.statusCode = statusCode;
  }
}
