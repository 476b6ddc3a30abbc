/**
 * @slo-annotator/cli — Programmatic surface of the command-line tool.
 *
 * @packageDocumentation
 */

export { runProgram } from "./program.js";
export {
  loadConfig,
  resolveSettings,
  resolveOrganization,
  knownOrganization,
  parseContextsFile,
  defaultContextsPath,
  EnvSchema,
  ContextsFileSchema,
  ConfigError,
  DEFAULT_BASE_URL,
} from "./config.js";
export type { EnvConfig, ContextEntry, ContextsFile, SessionSettings } from "./config.js";
export { createLogger, outcomeLogger, logWarnings, logSummary } from "./logger.js";
export { Printer } from "./output.js";
export type { LineWriter } from "./output.js";
export {
  toCsv,
  toJson,
  defaultExportName,
  countByCategory,
  formatDisplayTime,
  truncate,
} from "./export.js";
export type { ExportFormat, CategoryCount } from "./export.js";
export { openSession, loadCatalog } from "./session.js";
export type { Session, SessionDeps } from "./session.js";
export { buildScope, withLink, runCreate } from "./commands/create.js";
export { runList, resolveRange, LAST_PRESETS } from "./commands/list.js";
export type { ListOptions, TimeRange } from "./commands/list.js";
export { runSlos } from "./commands/slos.js";
export { EXIT_OK, EXIT_SETUP_ERROR, EXIT_PARTIAL_FAILURE } from "./commands/shared.js";
export type { CommandDeps, ExitCode } from "./commands/shared.js";
