/**
 * @slo-annotator/cli — Configuration.
 *
 * Loads and validates configuration from environment variables and an
 * optional JSON contexts file using Zod.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { AnnotatorError } from "@slo-annotator/core";
import { organizationFromToken } from "@slo-annotator/sdk";

// =============================================================================
// Errors
// =============================================================================

/**
 * Settings are missing or unusable. Terminal; raised before any request.
 */
export class ConfigError extends AnnotatorError {
  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super("CONFIG_ERROR", message, details);
    this.name = "ConfigError";
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

// =============================================================================
// Environment Schema
// =============================================================================

export const DEFAULT_BASE_URL = "https://app.nobl9.com";

export const EnvSchema = z.object({
  // Session
  SLO_CONTEXT: z.string().min(1).optional(),
  SLO_CONFIG_FILE: z.string().min(1).optional(),
  SLO_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),

  // Credentials
  SLO_CLIENT_ID: z.string().min(1).optional(),
  SLO_CLIENT_SECRET: z.string().min(1).optional(),
  SLO_ORGANIZATION: z.string().min(1).optional(),
  SLO_ACCESS_TOKEN: z.string().min(1).optional(),

  // Logging
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FILE: z.string().min(1).optional(),
  LOG_PRETTY: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Submission
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  SUBMIT_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} if an env var is invalid
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError("Invalid environment configuration", {
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

// =============================================================================
// Contexts File
// =============================================================================

const ContextSchema = z
  .object({
    clientId: z.string().optional(),
    client_id: z.string().optional(),
    clientSecret: z.string().optional(),
    client_secret: z.string().optional(),
    url: z.string().optional(),
    organization: z.string().optional(),
    org: z.string().optional(),
    accessToken: z.string().optional(),
    access_token: z.string().optional(),
  })
  .transform((raw) => ({
    clientId: raw.clientId ?? raw.client_id,
    clientSecret: raw.clientSecret ?? raw.client_secret,
    url: raw.url,
    organization: raw.organization ?? raw.org,
    accessToken: raw.accessToken ?? raw.access_token,
  }))
  .pipe(
    z.object({
      clientId: z.string().min(1).optional(),
      clientSecret: z.string().min(1).optional(),
      url: z.string().url().optional(),
      organization: z.string().min(1).optional(),
      accessToken: z.string().min(1).optional(),
    }),
  );

export const ContextsFileSchema = z.object({
  contexts: z.record(ContextSchema),
});

export type ContextEntry = z.infer<typeof ContextSchema>;
export type ContextsFile = z.infer<typeof ContextsFileSchema>;

export function defaultContextsPath(): string {
  return join(homedir(), ".config", "slo-annotator", "contexts.json");
}

/**
 * Parse the text of a contexts file.
 *
 * @throws {ConfigError} if the text is not JSON or does not match the schema
 */
export function parseContextsFile(text: string, path: string): ContextsFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Contexts file is not valid JSON: ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const result = ContextsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid contexts file: ${path}`, {
      path,
      issues: describeIssues(result.error),
    });
  }
  return result.data;
}

// =============================================================================
// Settings Resolution
// =============================================================================

/**
 * Everything needed to open a session against one organization.
 */
export interface SessionSettings {
  /** Context name, or "default" for environment credentials */
  readonly contextName: string;
  readonly baseUrl: string;
  readonly clientId?: string | undefined;
  readonly clientSecret?: string | undefined;
  readonly accessToken?: string | undefined;
  /** Explicit organization, if any */
  readonly organization?: string | undefined;
}

export interface ResolveSettingsOptions {
  /** Context name from `--context`; wins over SLO_CONTEXT */
  readonly context?: string | undefined;
  /** Reads the contexts file */
  readonly readFile: (path: string) => string;
}

function checkCredentials(settings: SessionSettings): SessionSettings {
  const hasClient = settings.clientId !== undefined && settings.clientSecret !== undefined;
  if (!hasClient && settings.accessToken === undefined) {
    throw new ConfigError(`No credentials for context "${settings.contextName}"`, {
      context: settings.contextName,
      hint: "set clientId and clientSecret, or an access token",
    });
  }
  return settings;
}

/**
 * Choose credentials: a named context from the contexts file when one is
 * requested, otherwise the SLO_* environment variables.
 *
 * @throws {ConfigError} on an unreadable file, unknown context, or missing
 *   credentials
 */
export function resolveSettings(env: EnvConfig, options: ResolveSettingsOptions): SessionSettings {
  const contextName = options.context ?? env.SLO_CONTEXT;

  if (contextName === undefined) {
    return checkCredentials({
      contextName: "default",
      baseUrl: env.SLO_BASE_URL,
      clientId: env.SLO_CLIENT_ID,
      clientSecret: env.SLO_CLIENT_SECRET,
      accessToken: env.SLO_ACCESS_TOKEN,
      organization: env.SLO_ORGANIZATION,
    });
  }

  const path = env.SLO_CONFIG_FILE ?? defaultContextsPath();
  let text: string;
  try {
    text = options.readFile(path);
  } catch (error) {
    throw new ConfigError(`Cannot read contexts file: ${path}`, {
      path,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const file = parseContextsFile(text, path);
  const entry = file.contexts[contextName];
  if (entry === undefined) {
    throw new ConfigError(`Unknown context "${contextName}"`, {
      context: contextName,
      available: Object.keys(file.contexts).sort(),
    });
  }

  return checkCredentials({
    contextName,
    baseUrl: entry.url ?? env.SLO_BASE_URL,
    clientId: entry.clientId,
    clientSecret: entry.clientSecret,
    accessToken: entry.accessToken,
    organization: entry.organization,
  });
}

/**
 * Organization fallback order: explicit, then decoded from the access
 * token, then SLO_ORGANIZATION.
 */
export function knownOrganization(
  explicit: string | undefined,
  accessToken: string | undefined,
  envOrganization: string | undefined,
): string | undefined {
  return (
    explicit ??
    (accessToken !== undefined ? organizationFromToken(accessToken) : undefined) ??
    envOrganization
  );
}

/**
 * Like knownOrganization, but an organization is required.
 *
 * @throws {ConfigError} if none yields a value
 */
export function resolveOrganization(
  explicit: string | undefined,
  accessToken: string | undefined,
  envOrganization: string | undefined,
): string {
  const organization = knownOrganization(explicit, accessToken, envOrganization);
  if (organization === undefined) {
    throw new ConfigError("Cannot determine organization", {
      hint: "set organization in the context or SLO_ORGANIZATION",
    });
  }
  return organization;
}
