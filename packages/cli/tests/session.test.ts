/**
 * Session bootstrap tests
 *
 * Verifies:
 * - Client credentials always fetch a fresh token
 * - The token request carries the organization when one is known
 * - A cached token is the bearer only without client credentials
 * - Token rejection is a terminal AuthError
 */

import { describe, it, expect } from "vitest";
import { AuthError } from "@slo-annotator/core";
import { openSession } from "../src/session.js";
import { ConfigError } from "../src/config.js";
import { ACME_TOKEN, BASE_ENV, fakeJwt, fakePlatform, harness } from "./helpers.js";

const CONTEXTS_PATH = "/tmp/contexts.json";

const CACHED_TOKEN = fakeJwt({ m2mProfile: { organization: "cached-org" } });

function contextsEnv(): Record<string, string> {
  return {
    LOG_LEVEL: "silent",
    SLO_BASE_URL: "https://slo.example.com",
    SLO_CONFIG_FILE: CONTEXTS_PATH,
  };
}

function contextsFile(entry: Record<string, string>): Record<string, string> {
  return { [CONTEXTS_PATH]: JSON.stringify({ contexts: { prod: entry } }) };
}

describe("openSession", () => {
  it("requests a fresh token even when the context caches one", async () => {
    const { fetchFn, calls } = fakePlatform();
    const h = harness(
      fetchFn,
      contextsEnv(),
      contextsFile({ clientId: "test-client", clientSecret: "test-secret", accessToken: CACHED_TOKEN }),
    );

    const session = await openSession(h.deps, { context: "prod" });
    await session.client.slos.list();

    expect(calls.map((c) => `${c.method} ${c.path}`)).toEqual([
      "POST /api/accessToken",
      "GET /api/slos",
    ]);
    expect(calls[0]?.headers.get("Authorization")).toBe(
      `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`,
    );
    expect(calls[0]?.headers.get("Organization")).toBe("cached-org");
    expect(calls[1]?.headers.get("Authorization")).toBe(`Bearer ${ACME_TOKEN}`);
    expect(calls[1]?.headers.get("Organization")).toBe("cached-org");
    expect(session.organization).toBe("cached-org");
  });

  it("sends SLO_ORGANIZATION with the token request", async () => {
    const { fetchFn, calls } = fakePlatform();
    const h = harness(fetchFn, { ...BASE_ENV, SLO_ORGANIZATION: "env-org" });

    const session = await openSession(h.deps);

    expect(calls[0]?.path).toBe("/api/accessToken");
    expect(calls[0]?.headers.get("Organization")).toBe("env-org");
    expect(session.organization).toBe("env-org");
  });

  it("prefers the context organization over the cached token", async () => {
    const { fetchFn, calls } = fakePlatform();
    const h = harness(
      fetchFn,
      contextsEnv(),
      contextsFile({
        clientId: "test-client",
        clientSecret: "test-secret",
        accessToken: CACHED_TOKEN,
        organization: "explicit-org",
      }),
    );

    const session = await openSession(h.deps, { context: "prod" });

    expect(calls[0]?.headers.get("Organization")).toBe("explicit-org");
    expect(session.organization).toBe("explicit-org");
  });

  it("reads the organization from the fresh token when nothing else names one", async () => {
    const { fetchFn, calls } = fakePlatform();
    const h = harness(fetchFn);

    const session = await openSession(h.deps);

    expect(calls[0]?.headers.get("Organization")).toBeNull();
    expect(session.organization).toBe("acme");
  });

  it("uses a cached token as the bearer when there are no client credentials", async () => {
    const { fetchFn, calls } = fakePlatform();
    const h = harness(fetchFn, {
      LOG_LEVEL: "silent",
      SLO_BASE_URL: "https://slo.example.com",
      SLO_ACCESS_TOKEN: CACHED_TOKEN,
    });

    const session = await openSession(h.deps);
    await session.client.slos.list();

    expect(calls.map((c) => `${c.method} ${c.path}`)).toEqual(["GET /api/slos"]);
    expect(calls[0]?.headers.get("Authorization")).toBe(`Bearer ${CACHED_TOKEN}`);
    expect(calls[0]?.headers.get("Organization")).toBe("cached-org");
  });

  it("fails with AuthError when the token request is rejected", async () => {
    const { fetchFn, calls } = fakePlatform({ tokenStatus: 401 });
    const h = harness(
      fetchFn,
      contextsEnv(),
      contextsFile({ clientId: "test-client", clientSecret: "test-secret", accessToken: CACHED_TOKEN }),
    );

    const error: unknown = await openSession(h.deps, { context: "prod" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty("message", "Token request failed: invalid client");
    expect(calls).toHaveLength(1);
  });

  it("fails with ConfigError when the credentials are missing", async () => {
    const h = harness(fakePlatform().fetchFn, {
      LOG_LEVEL: "silent",
      SLO_BASE_URL: "https://slo.example.com",
    });

    await expect(openSession(h.deps)).rejects.toBeInstanceOf(ConfigError);
  });
});
