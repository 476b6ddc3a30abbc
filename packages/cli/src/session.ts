/**
 * Session bootstrap: settings → organization → token → client, and the
 * SLO catalog the commands work against.
 */

import { ListingError, SloCatalog } from "@slo-annotator/core";
import { SloPlatformClient } from "@slo-annotator/sdk";
import type { EnvConfig } from "./config.js";
import { ConfigError, knownOrganization, resolveOrganization, resolveSettings } from "./config.js";
import type { Logger } from "./logger.js";

export interface SessionDeps {
  readonly env: EnvConfig;
  readonly logger: Logger;
  readonly readFile: (path: string) => string;
  readonly fetchFn?: typeof fetch | undefined;
}

export interface Session {
  readonly contextName: string;
  readonly organization: string;
  readonly client: SloPlatformClient;
}

/**
 * Authenticate and build a client bound to one organization.
 *
 * With client credentials a fresh token is always requested; a cached
 * access token then only names the organization. Without them the cached
 * token is the bearer.
 *
 * @throws {ConfigError} on missing credentials or organization
 * @throws {AuthError} if the token request fails
 */
export async function openSession(
  deps: SessionDeps,
  options: { readonly context?: string | undefined } = {},
): Promise<Session> {
  const { env, logger } = deps;
  const settings = resolveSettings(env, { context: options.context, readFile: deps.readFile });
  const { clientId, clientSecret } = settings;

  let token: string;
  let known = settings.organization;
  if (clientId !== undefined && clientSecret !== undefined) {
    known = knownOrganization(settings.organization, settings.accessToken, env.SLO_ORGANIZATION);
    const authClient = new SloPlatformClient({
      baseUrl: settings.baseUrl,
      organization: known,
      timeout: env.REQUEST_TIMEOUT_MS,
      fetchFn: deps.fetchFn,
    });
    token = await authClient.auth.acquireToken({ clientId, clientSecret });
  } else if (settings.accessToken !== undefined) {
    token = settings.accessToken;
  } else {
    throw new ConfigError(`No credentials for context "${settings.contextName}"`, {
      context: settings.contextName,
    });
  }

  const organization = resolveOrganization(known, token, env.SLO_ORGANIZATION);
  logger.info(
    { context: settings.contextName, organization, baseUrl: settings.baseUrl },
    "Session opened",
  );

  return {
    contextName: settings.contextName,
    organization,
    client: new SloPlatformClient({
      baseUrl: settings.baseUrl,
      organization,
      accessToken: token,
      timeout: env.REQUEST_TIMEOUT_MS,
      fetchFn: deps.fetchFn,
    }),
  };
}

/**
 * Build the catalog from a saved listing file, or from the platform.
 *
 * @throws {ListingError} if the file is not JSON or the listing is not an array
 */
export async function loadCatalog(
  deps: Pick<SessionDeps, "logger" | "readFile">,
  source: { readonly client?: SloPlatformClient | undefined; readonly slosFile?: string | undefined },
): Promise<SloCatalog> {
  let raw: unknown;
  if (source.slosFile !== undefined) {
    try {
      raw = JSON.parse(deps.readFile(source.slosFile));
    } catch (error) {
      throw new ListingError(`Cannot read SLO listing file: ${source.slosFile}`, {
        path: source.slosFile,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  } else if (source.client !== undefined) {
    raw = await source.client.slos.list();
  } else {
    throw new ListingError("No SLO source: pass --slos-file or configure credentials");
  }

  const catalog = SloCatalog.build(raw);
  for (const skipped of catalog.skipped) {
    deps.logger.warn({ index: skipped.index, reason: skipped.reason }, "Skipped SLO definition");
  }
  deps.logger.info({ slos: catalog.size, skipped: catalog.skipped.length }, "Catalog built");
  return catalog;
}
