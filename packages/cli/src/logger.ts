/**
 * Structured logging.
 *
 * Uses pino for JSON-structured batch logging. Logs go to stderr (or
 * LOG_FILE) so stdout stays clean for tables and exports.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BatchOutcome, BatchSummary } from "@slo-annotator/types";
import { isFailedOutcome, sloKey } from "@slo-annotator/types";
import type { ExpansionWarning } from "@slo-annotator/core";
import { describeWarning } from "@slo-annotator/core";
import type { EnvConfig } from "./config.js";

export type { Logger };

export function createLogger(
  config: Pick<EnvConfig, "LOG_LEVEL" | "LOG_FILE" | "LOG_PRETTY">,
): Logger {
  const destination = config.LOG_FILE ?? 2;

  if (config.LOG_PRETTY) {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination } },
    });
  }

  return pino(
    { level: config.LOG_LEVEL },
    pino.destination({ dest: destination, sync: true, mkdir: true }),
  );
}

/**
 * Per-item hook for the submitter: info on success, warn on failure.
 */
export function outcomeLogger(
  logger: Logger,
  total: number,
): (outcome: BatchOutcome, index: number) => void {
  return (outcome: BatchOutcome, index: number): void => {
    const entry = {
      slo: sloKey(outcome.request.sloIdentity),
      annotationId: outcome.request.id,
      item: index + 1,
      total,
    };
    if (isFailedOutcome(outcome)) {
      logger.warn(
        { ...entry, reason: outcome.result.reason, code: outcome.result.code },
        "Annotation failed",
      );
    } else {
      logger.info(entry, "Annotation created");
    }
  };
}

export function logWarnings(logger: Logger, warnings: readonly ExpansionWarning[]): void {
  for (const warning of warnings) {
    logger.warn(
      { kind: warning.kind, composite: sloKey(warning.composite), ref: sloKey(warning.ref) },
      describeWarning(warning),
    );
  }
}

export function logSummary(logger: Logger, summary: BatchSummary): void {
  logger.info(
    {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      failures: summary.failures.map((f) => ({ slo: sloKey(f.identity), reason: f.reason })),
    },
    "Batch finished",
  );
}
