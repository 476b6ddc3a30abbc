/**
 * `create`: expand a target scope and annotate every SLO in it.
 */

import { z } from "zod";
import type { SloIdentity, SloRecord, TargetScope } from "@slo-annotator/types";
import { isFailedOutcome, parseSloKey, sloKey } from "@slo-annotator/types";
import {
  AnnotationSubmitter,
  InvalidArgumentError,
  ValidationError,
  describeWarning,
  expandScope,
  formatSummaryLine,
  summarizeOutcomes,
  tryNormalizeTimestamp,
} from "@slo-annotator/core";
import { PlatformAnnotationGateway } from "@slo-annotator/sdk";
import { logSummary, logWarnings, outcomeLogger } from "../logger.js";
import { loadCatalog, openSession } from "../session.js";
import type { Session } from "../session.js";
import type { CommandDeps, ExitCode, GlobalOptions } from "./shared.js";
import { EXIT_OK, EXIT_PARTIAL_FAILURE, guarded, parseOptions } from "./shared.js";

// =============================================================================
// Options
// =============================================================================

export const CreateOptionsSchema = z.object({
  description: z.string(),
  start: z.string(),
  end: z.string(),
  project: z.string().min(1).optional(),
  service: z.string().min(1).optional(),
  slo: z.array(z.string().min(1)).min(1).optional(),
  composite: z.string().min(1).optional(),
  linkText: z.string().optional(),
  linkUrl: z.string().url().optional(),
  slosFile: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).max(16).optional(),
  dryRun: z.boolean().default(false),
});

export type CreateOptions = z.infer<typeof CreateOptionsSchema>;

// =============================================================================
// Helpers
// =============================================================================

function requireKey(value: string, option: string): SloIdentity {
  const identity = parseSloKey(value);
  if (identity === undefined) {
    throw new InvalidArgumentError(`${option} expects <project>/<name>, got "${value}"`, {
      option,
      value,
    });
  }
  return identity;
}

/**
 * Turn the mutually exclusive scope options into a TargetScope.
 *
 * @throws {InvalidArgumentError} unless exactly one scope option is set
 */
export function buildScope(options: CreateOptions): TargetScope {
  const chosen = [
    options.project !== undefined ? "--project" : undefined,
    options.service !== undefined ? "--service" : undefined,
    options.slo !== undefined ? "--slo" : undefined,
    options.composite !== undefined ? "--composite" : undefined,
  ].filter((name): name is string => name !== undefined);

  if (chosen.length !== 1) {
    throw new InvalidArgumentError(
      "Choose exactly one of --project, --service, --slo, --composite",
      { chosen },
    );
  }

  if (options.project !== undefined) {
    return { kind: "project", project: options.project.trim() };
  }
  if (options.service !== undefined) {
    const pair = requireKey(options.service, "--service");
    return { kind: "service", project: pair.project, service: pair.name };
  }
  if (options.slo !== undefined) {
    return { kind: "individual", identities: options.slo.map((v) => requireKey(v, "--slo")) };
  }
  return { kind: "composite", identity: requireKey(options.composite ?? "", "--composite") };
}

/**
 * Append a Markdown link paragraph when both parts are present.
 */
export function withLink(
  description: string,
  linkText: string | undefined,
  linkUrl: string | undefined,
): string {
  if (linkUrl === undefined) return description;
  const text = linkText !== undefined && linkText.trim() !== "" ? linkText.trim() : linkUrl;
  return `${description}\n\n[${text}](${linkUrl})`;
}

function normalizeOrThrow(raw: string, option: string, deps: CommandDeps): string {
  const result = tryNormalizeTimestamp(raw);
  if (!result.ok) {
    throw result.error;
  }
  if (result.repaired) {
    deps.printer.warn(`${option} "${raw}" repaired to ${result.value}`);
  }
  return result.value;
}

function printTargets(deps: CommandDeps, records: readonly SloRecord[]): void {
  deps.printer.heading(`Target SLOs (${records.length}):`);
  records.forEach((record, i) => {
    const marker = record.isComposite ? " [composite]" : "";
    deps.printer.line(`${String(i + 1).padStart(3)}. ${sloKey(record.identity)}${marker}`);
  });
}

// =============================================================================
// Command
// =============================================================================

export async function runCreate(
  rawOptions: unknown,
  globals: GlobalOptions,
  deps: CommandDeps,
  signal?: AbortSignal,
): Promise<ExitCode> {
  return guarded(deps, async () => {
    const options = parseOptions(CreateOptionsSchema, rawOptions);
    const { printer, logger, env } = deps;

    const scope = buildScope(options);
    if (options.description.trim() === "") {
      throw new ValidationError("empty description", options.description);
    }
    const startTime = normalizeOrThrow(options.start, "--start", deps);
    const endTime = normalizeOrThrow(options.end, "--end", deps);
    if (options.linkText !== undefined && options.linkUrl === undefined) {
      printer.warn("--link-text ignored without --link-url");
    }
    const description = withLink(options.description, options.linkText, options.linkUrl);

    const offline = options.dryRun && options.slosFile !== undefined;
    const session: Session | undefined = offline
      ? undefined
      : await openSession(deps, { context: globals.context });

    const catalog = await loadCatalog(deps, {
      client: session?.client,
      slosFile: options.slosFile,
    });
    const expansion = expandScope(scope, catalog);
    logWarnings(logger, expansion.warnings);
    for (const warning of expansion.warnings) {
      printer.warn(describeWarning(warning));
    }

    if (expansion.records.length === 0) {
      printer.warn("No SLOs matched; nothing to annotate");
      return EXIT_OK;
    }

    printTargets(deps, expansion.records);
    printer.info("Start", startTime);
    printer.info("End", endTime);

    if (options.dryRun || session === undefined) {
      printer.muted("Dry run: no annotations created");
      return EXIT_OK;
    }

    const submitter = new AnnotationSubmitter(new PlatformAnnotationGateway(session.client), {
      concurrency: options.concurrency ?? env.SUBMIT_CONCURRENCY,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
      onOutcome: outcomeLogger(logger, expansion.records.length),
      onHookError: (err, outcome) => {
        logger.error({ err, slo: sloKey(outcome.request.sloIdentity) }, "Outcome hook failed");
      },
    });

    logger.info(
      { scope: scope.kind, slos: expansion.records.length, organization: session.organization },
      "Batch started",
    );
    const outcomes = await submitter.submitBatch(
      expansion.records,
      { description, startTime, endTime },
      { signal },
    );

    const summary = summarizeOutcomes(outcomes);
    logSummary(logger, summary);

    printer.line();
    for (const outcome of outcomes) {
      const key = sloKey(outcome.request.sloIdentity);
      if (isFailedOutcome(outcome)) {
        printer.fail(`${key}: ${outcome.result.reason}`);
      } else {
        printer.ok(key);
      }
    }
    const skipped = expansion.records.length - outcomes.length;
    if (skipped > 0) {
      printer.warn(`${skipped} SLOs not submitted (cancelled)`);
    }
    printer.line();
    printer.heading(formatSummaryLine(summary));

    return summary.failed > 0 || skipped > 0 ? EXIT_PARTIAL_FAILURE : EXIT_OK;
  });
}
