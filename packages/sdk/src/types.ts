/**
 * @slo-annotator/sdk — SDK types.
 *
 * Types specific to the platform client layer.
 * Domain types are imported from @slo-annotator/types.
 */

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the platform client.
 */
export interface SloPlatformClientConfig {
  /** Base URL of the platform (e.g., "https://app.nobl9.com") */
  readonly baseUrl: string;
  /** Organization sent in the `Organization` header */
  readonly organization?: string | undefined;
  /** Bearer token; usually installed later by `auth.acquireToken` */
  readonly accessToken?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for GET on 5xx / network errors (default: 3) */
  readonly retries?: number | undefined;
  /** Base delay before the first GET retry, doubled per attempt (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Typed response from the platform.
 */
export interface PlatformResponse<T> {
  /** Parsed body */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Per-request options.
 */
export interface RequestOptions {
  /** Extra headers, merged over the defaults */
  readonly headers?: Readonly<Record<string, string>> | undefined;
  /** Query string parameters */
  readonly query?: Readonly<Record<string, string | undefined>> | undefined;
  /** Caller cancellation; combined with the client timeout */
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Error Types
// =============================================================================

/** Error codes produced by the HTTP layer. */
export type PlatformErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "CLIENT_ERROR"
  | "SERVER_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "NETWORK_ERROR";

/**
 * Structured error from the platform API or the transport.
 */
export class PlatformError extends Error {
  /** Error code (e.g., "CONFLICT", "TIMEOUT") */
  readonly code: PlatformErrorCode;
  /** HTTP status code (0 for transport errors) */
  readonly statusCode: number;
  /** Parsed error body, when there was one */
  readonly details?: unknown;

  constructor(code: PlatformErrorCode, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "PlatformError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
