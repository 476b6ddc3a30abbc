/**
 * @slo-annotator/sdk — Typed client for the SLO platform API.
 *
 * Uses native fetch; no HTTP dependency.
 *
 * @packageDocumentation
 */

// Types
export type {
  SloPlatformClientConfig,
  PlatformResponse,
  PlatformErrorCode,
  RequestOptions,
} from "./types.js";

export { PlatformError } from "./types.js";

// HTTP Client
export { HttpClient, ACCEPT_HEADER, extractErrorMessage } from "./http-client.js";

// Client
export {
  SloPlatformClient,
  organizationFromToken,
  toAnnotation,
  categoryOf,
  newestFirst,
} from "./client.js";

// Client namespace classes (for type usage)
export { AuthNamespace, SlosNamespace, AnnotationsNamespace } from "./client.js";

export type {
  ClientCredentials,
  CreateAnnotationBody,
  ListAnnotationsParams,
} from "./client.js";

// Gateway
export { PlatformAnnotationGateway } from "./gateway.js";
