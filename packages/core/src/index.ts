/**
 * @slo-annotator/core — Annotation target resolution and bulk creation.
 *
 * Expands an operator's scope (project, service, hand-picked SLOs, or a
 * composite with its components) into a deduplicated list of SLOs, then
 * creates one annotation per SLO through a fallible gateway, recording
 * success or failure per item.
 *
 * Design rules:
 * - The catalog is an immutable value built once per session
 * - Setup errors are thrown before any remote mutation
 * - Per-item failures are outcomes, never exceptions
 * - No terminal or file output; callers present the results
 */

// Identifiers and timestamps
export { generateAnnotationId, isAnnotationId } from "./identifier.js";
export { normalizeTimestamp, tryNormalizeTimestamp, toWireTimestamp } from "./timestamp.js";
export type { NormalizeResult } from "./timestamp.js";

// Listing and catalog
export { parseSloListing, toSloRecord, SloDefinitionSchema } from "./listing.js";
export type {
  SloDefinition,
  ListingEntry,
  ParsedListing,
  SkippedListingEntry,
} from "./listing.js";
export { SloCatalog } from "./catalog.js";
export type { ProjectSummary, ServiceSummary } from "./catalog.js";

// Resolution and expansion
export { resolveComponents } from "./composite-resolver.js";
export type { ComponentResolution, CompositeResolution } from "./composite-resolver.js";
export { expandScope, dedupeRecords, describeWarning } from "./target-expander.js";
export type { Expansion, ExpansionWarning } from "./target-expander.js";

// Submission and reporting
export { AnnotationSubmitter } from "./submitter.js";
export type {
  AnnotationGateway,
  AnnotationDetails,
  SubmitterOptions,
  SubmitBatchOptions,
} from "./submitter.js";
export { summarizeOutcomes, formatSummaryLine } from "./reporter.js";

// Errors
export {
  AnnotatorError,
  ValidationError,
  ExpansionError,
  InvalidArgumentError,
  ListingError,
  SubmissionFailure,
  AuthError,
} from "./errors.js";
export type { AnnotatorErrorCode } from "./errors.js";
