/**
 * Command-line program (commander).
 */

import { Command, CommanderError } from "commander";
import { runCreate } from "./commands/create.js";
import { runList } from "./commands/list.js";
import { runSlos } from "./commands/slos.js";
import type { CommandDeps, ExitCode, GlobalOptions } from "./commands/shared.js";
import { EXIT_OK, EXIT_SETUP_ERROR } from "./commands/shared.js";

/**
 * Parse `argv` (user arguments only, without node and script) and run
 * the selected command.
 */
export async function runProgram(
  argv: readonly string[],
  deps: CommandDeps,
  signal?: AbortSignal,
): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_OK;

  const program = new Command()
    .name("slo-annotate")
    .description("Create and retrieve SLO annotations in bulk")
    .option("--context <name>", "Named context from the contexts file")
    .exitOverride();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command("slos")
    .description("List the SLO catalog")
    .option("--project <project>", "Only SLOs in this project")
    .option("--service <service>", "Only SLOs of this service")
    .option("--slos-file <path>", "Read the SLO listing from a JSON file")
    .action(async (options: unknown) => {
      exitCode = await runSlos(options, globals(), deps);
    });

  program
    .command("create")
    .description("Annotate every SLO in a target scope")
    .requiredOption("--description <text>", "Annotation text (Markdown allowed)")
    .requiredOption("--start <timestamp>", "Start time, UTC (YYYY-MM-DDTHH:MM:SSZ)")
    .requiredOption("--end <timestamp>", "End time, UTC (YYYY-MM-DDTHH:MM:SSZ)")
    .option("--project <project>", "Every SLO in a project")
    .option("--service <project/service>", "Every SLO of a service")
    .option("--slo <project/name...>", "Specific SLOs")
    .option("--composite <project/name>", "A composite SLO and its components")
    .option("--link-text <text>", "Text of a link appended to the description")
    .option("--link-url <url>", "URL of a link appended to the description")
    .option("--slos-file <path>", "Read the SLO listing from a JSON file")
    .option("--concurrency <n>", "Annotations in flight at once (1-16)")
    .option("--dry-run", "Show the target SLOs without creating anything", false)
    .action(async (options: unknown) => {
      exitCode = await runCreate(options, globals(), deps, signal);
    });

  program
    .command("list")
    .description("Retrieve annotations in a time range")
    .option("--from <timestamp>", "Range start, UTC")
    .option("--to <timestamp>", "Range end, UTC")
    .option("--last <period>", "Preset range ending now: 24h, 7d, 14d or 30d")
    .option("--day <date>", "One whole UTC day, YYYY-MM-DD")
    .option("--category <category...>", "Only these categories (missing counts as Unknown)")
    .option("--format <format>", "table, csv or json", "table")
    .option("--output <path>", "Export file (default: annotations_<context>_<time>.<ext>)")
    .action(async (options: unknown) => {
      exitCode = await runList(options, globals(), deps);
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_SETUP_ERROR;
    }
    throw error;
  }
  return exitCode;
}
