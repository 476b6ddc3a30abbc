/**
 * `list`: fetch annotations in a time range, filter by category, and
 * tabulate or export them, newest first.
 */

import { z } from "zod";
import { InvalidArgumentError, toWireTimestamp, tryNormalizeTimestamp } from "@slo-annotator/core";
import { categoryOf } from "@slo-annotator/sdk";
import {
  countByCategory,
  defaultExportName,
  formatDisplayTime,
  toCsv,
  toJson,
  truncate,
} from "../export.js";
import { openSession } from "../session.js";
import type { CommandDeps, ExitCode, GlobalOptions } from "./shared.js";
import { EXIT_OK, guarded, parseOptions } from "./shared.js";

const HOUR_MS = 60 * 60 * 1000;

/** `--last` presets, in hours */
export const LAST_PRESETS = {
  "24h": 24,
  "7d": 7 * 24,
  "14d": 14 * 24,
  "30d": 30 * 24,
} as const;

export const ListOptionsSchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  last: z.enum(["24h", "7d", "14d", "30d"]).optional(),
  day: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .optional(),
  category: z.array(z.string().min(1)).optional(),
  format: z.enum(["table", "csv", "json"]).default("table"),
  output: z.string().min(1).optional(),
});

export type ListOptions = z.infer<typeof ListOptionsSchema>;

const DESCRIPTION_WIDTH = 50;

function normalize(raw: string, option: string): string {
  const result = tryNormalizeTimestamp(raw);
  if (!result.ok) {
    throw new InvalidArgumentError(`${option}: ${result.error.message}`, { option, value: raw });
  }
  return result.value;
}

export interface TimeRange {
  readonly from: string;
  readonly to: string;
}

/**
 * Turn the range options into wire timestamps. Exactly one of
 * `--from/--to`, `--last` or `--day` must be given.
 *
 * @throws {InvalidArgumentError} on a missing, mixed or invalid range
 */
export function resolveRange(options: ListOptions, now: Date): TimeRange {
  const explicit = options.from !== undefined || options.to !== undefined;
  const forms = [explicit, options.last !== undefined, options.day !== undefined];
  if (forms.filter(Boolean).length !== 1) {
    throw new InvalidArgumentError("Choose exactly one of --from/--to, --last, --day");
  }

  if (options.last !== undefined) {
    const hours = LAST_PRESETS[options.last];
    return {
      from: toWireTimestamp(new Date(now.getTime() - hours * HOUR_MS)),
      to: toWireTimestamp(now),
    };
  }

  if (options.day !== undefined) {
    const start = tryNormalizeTimestamp(`${options.day}T00:00:00Z`);
    if (!start.ok) {
      throw new InvalidArgumentError(`--day: invalid date: "${options.day}"`, {
        option: "--day",
        value: options.day,
      });
    }
    return { from: start.value, to: `${options.day}T23:59:59Z` };
  }

  if (options.from === undefined || options.to === undefined) {
    throw new InvalidArgumentError("--from and --to must be given together");
  }
  const from = normalize(options.from, "--from");
  const to = normalize(options.to, "--to");
  // Wire timestamps of equal shape compare chronologically as strings.
  if (from > to) {
    throw new InvalidArgumentError("--from must not be after --to", { from, to });
  }
  return { from, to };
}

export async function runList(
  rawOptions: unknown,
  globals: GlobalOptions,
  deps: CommandDeps,
): Promise<ExitCode> {
  return guarded(deps, async () => {
    const options = parseOptions(ListOptionsSchema, rawOptions);
    const { printer, logger } = deps;

    const { from, to } = resolveRange(options, deps.now());

    const session = await openSession(deps, { context: globals.context });
    const annotations = await session.client.annotations.list({
      from,
      to,
      categories: options.category,
    });
    logger.info(
      { from, to, categories: options.category ?? [], count: annotations.length },
      "Annotations fetched",
    );

    if (options.format !== "table") {
      const body = options.format === "csv" ? toCsv(annotations) : toJson(annotations);
      const path = options.output ?? defaultExportName(session.contextName, options.format, deps.now());
      deps.writeFile(path, body);
      printer.ok(`Exported ${annotations.length} annotations to ${path}`);
      return EXIT_OK;
    }

    if (annotations.length === 0) {
      printer.warn("No annotations found");
      return EXIT_OK;
    }

    printer.heading("Annotations by category:");
    for (const { category, count } of countByCategory(annotations)) {
      printer.info(category, String(count));
    }
    printer.line();
    printer.heading(`Annotation table (${annotations.length} annotations):`);
    printer.table(
      ["Time", "Category", "SLO", "Description"],
      annotations.map((annotation) => [
        formatDisplayTime(annotation.startTime),
        categoryOf(annotation),
        `${annotation.project}/${annotation.slo}`,
        truncate(annotation.description.replace(/\s+/g, " "), DESCRIPTION_WIDTH),
      ]),
    );
    return EXIT_OK;
  });
}
