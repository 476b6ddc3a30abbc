/**
 * @slo-annotator/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Organization and bearer token header injection
 * - Versioned Accept header
 * - Timeout handling and caller cancellation
 * - Retry logic for GET (exponential backoff on 5xx / network errors)
 * - Error normalization
 *
 * POST is never retried: creating an annotation is not idempotent from
 * the client's point of view, and the caller decides what to do with a
 * failed item.
 */

import type { PlatformErrorCode, PlatformResponse, RequestOptions, SloPlatformClientConfig } from "./types.js";
import { PlatformError } from "./types.js";

export const ACCEPT_HEADER = "application/json; version=v1alpha";

// =============================================================================
// Internal Helpers
// =============================================================================

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse a response body as JSON, handling empty and non-JSON responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  const parsed = tryParseJson(text);
  return parsed === undefined ? { raw: text } : parsed;
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = ["content-type", "x-request-id", "retry-after"];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

function codeForStatus(status: number): PlatformErrorCode {
  switch (status) {
    case 400:
      return "BAD_REQUEST";
    case 401:
      return "UNAUTHORIZED";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    case 409:
      return "CONFLICT";
    default:
      return status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
  }
}

function summaryOf(value: unknown): string | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const v = value as Record<string, unknown>;
  if (typeof v.errorSummary === "string" && v.errorSummary !== "") return v.errorSummary;
  if (typeof v.message === "string" && v.message !== "") return v.message;
  return undefined;
}

/**
 * Pull a human-readable message out of an error body.
 *
 * The platform answers with `{message}`, `{error: {...}}`, or
 * `{error: "<text with an embedded JSON object>"}` depending on which
 * layer rejected the request.
 */
export function extractErrorMessage(body: unknown, status: number): string {
  if (body !== null && typeof body === "object") {
    const b = body as Record<string, unknown>;
    if (typeof b.message === "string" && b.message !== "") {
      return b.message;
    }

    if (typeof b.error === "string" && b.error !== "") {
      const embedded = /\{.*\}/s.exec(b.error);
      const nested = embedded === null ? undefined : summaryOf(tryParseJson(embedded[0]));
      return nested ?? b.error;
    }

    const fromObject = summaryOf(b.error);
    if (fromObject !== undefined) {
      return fromObject;
    }

    if (typeof b.raw === "string" && b.raw.trim() !== "") {
      return b.raw.trim().slice(0, 200);
    }
  }
  return `HTTP ${status}`;
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the platform API.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly organization: string | undefined;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;
  private accessToken: string | undefined;

  constructor(config: SloPlatformClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.organization = config.organization;
    this.accessToken = config.accessToken;
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Install the bearer token used by subsequent requests.
   */
  setAccessToken(token: string): void {
    this.accessToken = token;
  }

  get hasAccessToken(): boolean {
    return this.accessToken !== undefined;
  }

  /**
   * Perform a GET request.
   */
  async get<T>(path: string, options: RequestOptions = {}): Promise<PlatformResponse<T>> {
    return this.request<T>("GET", path, undefined, options);
  }

  /**
   * Perform a POST request with a JSON body. Never retried.
   */
  async post<T>(path: string, body: unknown, options: RequestOptions = {}): Promise<PlatformResponse<T>> {
    return this.request<T>("POST", path, body, options);
  }

  private buildUrl(path: string, query: RequestOptions["query"]): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) params.set(key, value);
    }
    const qs = params.toString();
    return qs.length > 0 ? `${this.baseUrl}${path}?${qs}` : `${this.baseUrl}${path}`;
  }

  /**
   * Core request method with retry logic.
   */
  private async request<T>(
    method: "GET" | "POST",
    path: string,
    body: unknown,
    options: RequestOptions,
  ): Promise<PlatformResponse<T>> {
    const url = this.buildUrl(path, options.query);

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": ACCEPT_HEADER,
    };
    if (this.organization !== undefined) {
      headers["Organization"] = this.organization;
    }
    if (this.accessToken !== undefined) {
      headers["Authorization"] = `Bearer ${this.accessToken}`;
    }
    Object.assign(headers, options.headers);

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const maxRetries = method === "GET" ? this.maxRetries : 0;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init, options.signal);
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → success
        if (response.ok) {
          return {
            data: responseBody as T,
            status: response.status,
            headers: responseHeaders,
          };
        }

        // 5xx → retry with backoff
        if (response.status >= 500 && attempt < maxRetries) {
          lastError = new PlatformError("SERVER_ERROR", `HTTP ${response.status}`, response.status);
          await sleep(this.backoff(attempt));
          continue;
        }

        // 4xx, or 5xx on the last attempt
        throw new PlatformError(
          codeForStatus(response.status),
          extractErrorMessage(responseBody, response.status),
          response.status,
          responseBody,
        );
      } catch (error) {
        if (error instanceof PlatformError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(this.backoff(attempt));
          continue;
        }

        throw new PlatformError(
          "NETWORK_ERROR",
          error instanceof Error ? error.message : lastError?.message ?? "Network error",
          0,
        );
      }
    }

    // Should never reach here, but just in case
    throw new PlatformError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), 10000);
  }

  /**
   * Fetch with a timeout using AbortController, honoring the caller's signal.
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
    signal: AbortSignal | undefined,
  ): Promise<Response> {
    if (signal?.aborted === true) {
      throw new PlatformError("ABORTED", "Request was cancelled", 0);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        if (signal?.aborted === true) {
          throw new PlatformError("ABORTED", "Request was cancelled", 0);
        }
        throw new PlatformError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
