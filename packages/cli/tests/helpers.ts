/**
 * Test harness: in-memory files, captured output, and a routed mock
 * platform behind fetch.
 */

import { vi } from "vitest";
import { Chalk } from "chalk";
import pino from "pino";
import { loadConfig } from "../src/config.js";
import { Printer } from "../src/output.js";
import type { CommandDeps } from "../src/commands/shared.js";

export function fakeJwt(claims: unknown): string {
  const encode = (value: unknown): string =>
    Buffer.from(JSON.stringify(value)).toString("base64url");
  return `${encode({ alg: "none" })}.${encode(claims)}.signature`;
}

export const ACME_TOKEN = fakeJwt({ m2mProfile: { organization: "acme" } });

export function sloDefinition(
  project: string,
  name: string,
  extra: { service?: string; components?: Array<[string, string]> } = {},
): unknown {
  return {
    kind: "SLO",
    metadata: { name, project, displayName: name },
    spec: {
      ...(extra.service !== undefined ? { service: extra.service } : {}),
      objectives: [
        extra.components !== undefined
          ? {
              name: "composite",
              composite: {
                components: {
                  objectives: extra.components.map(([p, s]) => ({
                    project: p,
                    slo: s,
                    objective: "good",
                    weight: 1,
                    whenDelayed: "CountAsGood",
                  })),
                },
              },
            }
          : { name: "good" },
      ],
    },
  };
}

export const LISTING = [
  sloDefinition("payments", "checkout-latency", { service: "checkout-api" }),
  sloDefinition("payments", "checkout-availability", { service: "checkout-api" }),
  sloDefinition("search", "query-latency", { service: "search-api" }),
  sloDefinition("payments", "journey", {
    service: "checkout-api",
    components: [
      ["payments", "checkout-latency"],
      ["payments", "ghost"],
    ],
  }),
];

export interface PlatformCall {
  method: string;
  path: string;
  url: string;
  headers: Headers;
  body: Record<string, unknown> | undefined;
}

export interface FakePlatformOptions {
  listing?: unknown;
  annotations?: unknown;
  /** SLO names whose annotation POST answers 409 */
  conflictSlos?: string[];
  tokenStatus?: number;
}

/**
 * A routed fetch standing in for the platform API.
 */
export function fakePlatform(options: FakePlatformOptions = {}): {
  fetchFn: typeof fetch;
  calls: PlatformCall[];
} {
  const calls: PlatformCall[] = [];

  const fetchFn = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(String(input));
    const method = init?.method ?? "GET";
    const parsed: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const body =
      parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)
        ? Object.fromEntries(Object.entries(parsed))
        : undefined;
    calls.push({ method, path: url.pathname, url: url.toString(), headers: new Headers(init?.headers), body });

    const json = (status: number, payload: unknown): Response =>
      new Response(JSON.stringify(payload), {
        status,
        headers: { "content-type": "application/json" },
      });

    if (method === "POST" && url.pathname === "/api/accessToken") {
      const status = options.tokenStatus ?? 200;
      return status === 200
        ? json(200, { access_token: ACME_TOKEN })
        : json(status, { message: "invalid client" });
    }
    if (method === "GET" && url.pathname === "/api/slos") {
      return json(200, options.listing ?? LISTING);
    }
    if (method === "POST" && url.pathname === "/api/annotations") {
      if (typeof body?.slo === "string" && (options.conflictSlos ?? []).includes(body.slo)) {
        return json(409, { message: "annotation already exists" });
      }
      return json(200, body ?? {});
    }
    if (method === "GET" && url.pathname === "/api/annotations") {
      return json(200, options.annotations ?? []);
    }
    return json(404, { message: `No route for ${method} ${url.pathname}` });
  }) as unknown as typeof fetch;

  return { fetchFn, calls };
}

export interface Harness {
  deps: CommandDeps;
  lines: string[];
  files: Map<string, string>;
  written: Map<string, string>;
}

export const BASE_ENV = {
  SLO_CLIENT_ID: "test-client",
  SLO_CLIENT_SECRET: "test-secret",
  SLO_BASE_URL: "https://slo.example.com",
  LOG_LEVEL: "silent",
};

export function harness(
  fetchFn: typeof fetch | undefined,
  env: Record<string, string | undefined> = BASE_ENV,
  files: Record<string, string> = {},
): Harness {
  const lines: string[] = [];
  const fileMap = new Map(Object.entries(files));
  const written = new Map<string, string>();

  return {
    lines,
    files: fileMap,
    written,
    deps: {
      env: loadConfig(env),
      logger: pino({ level: "silent" }),
      printer: new Printer((line) => lines.push(line), new Chalk({ level: 0 })),
      readFile: (path) => {
        const content = fileMap.get(path);
        if (content === undefined) {
          throw new Error(`ENOENT: no such file, open '${path}'`);
        }
        return content;
      },
      writeFile: (path, data) => {
        written.set(path, data);
      },
      now: () => new Date(2025, 0, 27, 9, 5, 3),
      fetchFn,
    },
  };
}
