/**
 * Plumbing shared by every command.
 */

import type { z } from "zod";
import { InvalidArgumentError } from "@slo-annotator/core";
import type { SessionDeps } from "../session.js";
import type { Printer } from "../output.js";

export const EXIT_OK = 0;
export const EXIT_SETUP_ERROR = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_SETUP_ERROR | typeof EXIT_PARTIAL_FAILURE;

export interface CommandDeps extends SessionDeps {
  readonly printer: Printer;
  readonly writeFile: (path: string, data: string) => void;
  readonly now: () => Date;
}

/** Options every command accepts from the root program. */
export interface GlobalOptions {
  readonly context?: string | undefined;
}

/**
 * Validate raw commander options.
 *
 * @throws {InvalidArgumentError} listing every rejected option
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new InvalidArgumentError(`Invalid options: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Run a command body, printing setup errors and mapping them to exit 1.
 */
export async function guarded(
  deps: Pick<CommandDeps, "printer" | "logger">,
  body: () => Promise<ExitCode>,
): Promise<ExitCode> {
  try {
    return await body();
  } catch (error) {
    deps.logger.error(
      { err: error instanceof Error ? error : new Error(String(error)) },
      "Command failed",
    );
    deps.printer.error(error);
    return EXIT_SETUP_ERROR;
  }
}
