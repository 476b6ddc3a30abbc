#!/usr/bin/env node
/**
 * @slo-annotator/cli — Entry point.
 *
 * Loads config, builds the logger and printer, wires Ctrl-C to batch
 * cancellation, and runs the program.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { loadConfig } from "./config.js";
import type { EnvConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { Printer } from "./output.js";
import { runProgram } from "./program.js";
import { EXIT_SETUP_ERROR } from "./commands/shared.js";

async function main(): Promise<void> {
  const printer = new Printer((line) => console.log(line));

  let config: EnvConfig;
  try {
    config = loadConfig();
  } catch (error) {
    printer.error(error);
    process.exitCode = EXIT_SETUP_ERROR;
    return;
  }
  const logger = createLogger(config);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; cancelling batch");
    controller.abort();
  });

  process.exitCode = await runProgram(
    process.argv.slice(2),
    {
      env: config,
      logger,
      printer,
      readFile: (path) => readFileSync(path, "utf8"),
      writeFile: (path, data) => writeFileSync(path, data, "utf8"),
      now: () => new Date(),
    },
    controller.signal,
  );
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
