/**
 * @tableparity/cli
 *
 * Argument parsing, configuration loading and command execution
 */

export { run } from './run.js';
export type { CliIO } from './run.js';
export { USAGE, UsageError, parseArgs, toBatchOptions, toReportDate, toVerificationRequest } from './args.js';
export type { CliOptions, Command, ParsedArgs } from './args.js';
export {
  ConfigError,
  applyEnvOverrides,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions } from './config.js';
export { ExitCode, exitCodeForBatch, exitCodeForRun } from './exit-code.js';
export { formatBatchSummary, formatRunSummary, formatStatusReport } from './report.js';
