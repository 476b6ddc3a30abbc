/**
 * @slo-annotator/sdk — Platform Client.
 *
 * Main entry point for the SDK.
 *
 * Provides typed methods for:
 * - Token acquisition (client credentials)
 * - SLO listing
 * - Annotation creation and retrieval
 *
 * Design:
 * - Delegates to HttpClient for transport
 * - Namespace grouping: client.auth, client.slos, client.annotations
 * - Listing endpoints return data for the caller to validate
 */

import type { Annotation } from "@slo-annotator/types";
import { AuthError } from "@slo-annotator/core";
import type { SloPlatformClientConfig } from "./types.js";
import { PlatformError } from "./types.js";
import { HttpClient } from "./http-client.js";

// =============================================================================
// Request / Response Types
// =============================================================================

export interface ClientCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

/**
 * Body of `POST /api/annotations`. The platform names the identifier
 * field `name`.
 */
export interface CreateAnnotationBody {
  readonly name: string;
  readonly slo: string;
  readonly project: string;
  readonly description: string;
  readonly startTime: string;
  readonly endTime: string;
}

export interface ListAnnotationsParams {
  readonly from: string;
  readonly to: string;
  /** Keep only these categories; missing categories count as "Unknown" */
  readonly categories?: readonly string[] | undefined;
}

const ALL_PROJECTS = { Project: "*" } as const;

// =============================================================================
// Helpers
// =============================================================================

function base64UrlDecode(segment: string): string {
  return Buffer.from(segment.replace(/-/g, "+").replace(/_/g, "/"), "base64").toString("utf8");
}

/**
 * Read `m2mProfile.organization` from a JWT payload without verifying it.
 */
export function organizationFromToken(token: string): string | undefined {
  const payload = token.split(".")[1];
  if (payload === undefined || payload === "") return undefined;

  let claims: unknown;
  try {
    claims = JSON.parse(base64UrlDecode(payload));
  } catch {
    return undefined;
  }
  if (claims === null || typeof claims !== "object") return undefined;

  const profile = (claims as Record<string, unknown>).m2mProfile;
  if (profile === null || typeof profile !== "object") return undefined;

  const organization = (profile as Record<string, unknown>).organization;
  return typeof organization === "string" && organization !== "" ? organization : undefined;
}

function stringField(v: Record<string, unknown>, key: string): string {
  const value = v[key];
  return typeof value === "string" ? value : "";
}

/**
 * Coerce one listing entry into an Annotation. Entries without a name,
 * project or SLO are dropped.
 */
export function toAnnotation(value: unknown): Annotation | undefined {
  if (value === null || typeof value !== "object") return undefined;
  const v = value as Record<string, unknown>;
  const name = stringField(v, "name");
  const project = stringField(v, "project");
  const slo = stringField(v, "slo");
  if (name === "" || project === "" || slo === "") return undefined;

  const category = typeof v.category === "string" ? v.category : undefined;
  const objectiveName = typeof v.objectiveName === "string" ? v.objectiveName : undefined;
  return {
    name,
    project,
    slo,
    description: stringField(v, "description"),
    startTime: stringField(v, "startTime"),
    endTime: stringField(v, "endTime"),
    ...(category !== undefined ? { category } : {}),
    ...(objectiveName !== undefined ? { objectiveName } : {}),
  };
}

export function categoryOf(annotation: Annotation): string {
  return annotation.category ?? "Unknown";
}

/** Unparseable start times sort last. */
function startMillis(annotation: Annotation): number {
  const ms = Date.parse(annotation.startTime);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Comparator: newest `startTime` first.
 */
export function newestFirst(a: Annotation, b: Annotation): number {
  return startMillis(b) - startMillis(a);
}

// =============================================================================
// Namespace Classes
// =============================================================================

/**
 * Token acquisition.
 */
export class AuthNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Exchange client credentials for an access token and install it on
   * the client.
   *
   * @throws {AuthError} on missing credentials, rejection, or a response
   *   without a token
   */
  async acquireToken(credentials: ClientCredentials): Promise<string> {
    if (credentials.clientId === "" || credentials.clientSecret === "") {
      throw new AuthError("Missing client credentials");
    }
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString(
      "base64",
    );

    let data: unknown;
    try {
      const res = await this.http.post<unknown>("/api/accessToken", undefined, {
        headers: { Authorization: `Basic ${basic}` },
      });
      data = res.data;
    } catch (error) {
      if (error instanceof PlatformError) {
        throw new AuthError(`Token request failed: ${error.message}`, error.statusCode, {
          platformCode: error.code,
        });
      }
      throw error;
    }

    const token =
      data !== null && typeof data === "object"
        ? (data as Record<string, unknown>).access_token
        : undefined;
    if (typeof token !== "string" || token === "") {
      throw new AuthError("No access token in response");
    }

    this.http.setAccessToken(token);
    return token;
  }
}

/**
 * SLO listing.
 */
export class SlosNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Every SLO in the organization, unvalidated.
   */
  async list(): Promise<unknown> {
    const res = await this.http.get<unknown>("/api/slos", { headers: ALL_PROJECTS });
    return res.data;
  }
}

/**
 * Annotation operations.
 */
export class AnnotationsNamespace {
  constructor(private readonly http: HttpClient) {}

  /**
   * Create one annotation. A 409 surfaces as PlatformError "CONFLICT".
   */
  async create(body: CreateAnnotationBody, signal?: AbortSignal): Promise<void> {
    await this.http.post<unknown>("/api/annotations", body, { signal });
  }

  /**
   * Annotations whose time range intersects [from, to], across all
   * projects, newest first.
   */
  async list(params: ListAnnotationsParams): Promise<Annotation[]> {
    const res = await this.http.get<unknown>("/api/annotations", {
      headers: ALL_PROJECTS,
      query: { from: params.from, to: params.to },
    });

    let items: unknown = res.data;
    if (items !== null && typeof items === "object" && !Array.isArray(items)) {
      items = (items as Record<string, unknown>).annotations;
    }
    if (!Array.isArray(items)) {
      return [];
    }

    const annotations = items
      .map(toAnnotation)
      .filter((annotation): annotation is Annotation => annotation !== undefined)
      .sort(newestFirst);

    const { categories } = params;
    if (categories === undefined || categories.length === 0) {
      return annotations;
    }
    return annotations.filter((annotation) => categories.includes(categoryOf(annotation)));
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Platform API client.
 *
 * @example
 * ```ts
 * const client = new SloPlatformClient({
 *   baseUrl: "https://app.nobl9.com",
 *   organization: "my-org",
 * });
 *
 * await client.auth.acquireToken({ clientId: "id", clientSecret: "test-secret" });
 * const listing = await client.slos.list();
 * ```
 */
export class SloPlatformClient {
  /** Token acquisition */
  readonly auth: AuthNamespace;

  /** SLO listing */
  readonly slos: SlosNamespace;

  /** Annotation operations */
  readonly annotations: AnnotationsNamespace;

  constructor(config: SloPlatformClientConfig) {
    const http = new HttpClient(config);
    this.auth = new AuthNamespace(http);
    this.slos = new SlosNamespace(http);
    this.annotations = new AnnotationsNamespace(http);
  }
}
