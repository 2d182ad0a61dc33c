/**
 * Command execution
 *
 * Parses arguments, loads configuration, opens both pools and runs one
 * command. Returns the process exit code; never calls process.exit.
 */

import {
  Logger,
  createRunId,
  errorMessage,
  isVerificationError,
  type VerificationRequestInput,
} from '@tableparity/core';
import { PoolManager } from '@tableparity/connector-db';
import { VerificationOrchestrator, runBatch, type BatchOptions } from '@tableparity/verification';
import {
  USAGE,
  UsageError,
  parseArgs,
  toBatchOptions,
  toReportDate,
  toVerificationRequest,
  type CliOptions,
  type Command,
} from './args.js';
import { loadConfig, type ConfigFile } from './config.js';
import { ExitCode, exitCodeForBatch, exitCodeForRun } from './exit-code.js';
import { formatBatchSummary, formatRunSummary, formatStatusReport } from './report.js';

/** Rows listed by the report command */
const REPORT_DIFFERENCE_LIMIT = 10;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
};

type Task =
  | { command: 'verify'; request: VerificationRequestInput }
  | { command: 'batch'; batch: BatchOptions }
  | { command: 'report'; operationDate: string };

function planTask(command: Command, options: CliOptions): Task {
  switch (command) {
    case 'verify':
      return { command, request: toVerificationRequest(options) };
    case 'batch':
      return { command, batch: toBatchOptions(options) };
    case 'report':
      return { command, operationDate: toReportDate(options) };
    default: {
      const exhaustive: never = command;
      throw new UsageError(`Unknown command: ${String(exhaustive)}`);
    }
  }
}

function describeError(error: unknown): string {
  return isVerificationError(error) ? error.toActionableMessage() : `Error: ${errorMessage(error)}`;
}

async function bootstrapStore(pools: PoolManager, logger: Logger): Promise<void> {
  try {
    await pools.sink.ensureTable();
  } catch (error) {
    logger.warn('Could not create result table; continuing', { error: errorMessage(error) });
  }
}

async function execute(
  task: Task,
  pools: PoolManager,
  config: ConfigFile,
  logger: Logger,
  io: CliIO
): Promise<ExitCode> {
  if (task.command === 'report') {
    const statuses = await pools.sink.summarizeByStatus(task.operationDate);
    const differences = await pools.sink.listDifferences(task.operationDate, REPORT_DIFFERENCE_LIMIT);
    formatStatusReport(task.operationDate, statuses, differences).forEach(io.out);
    return ExitCode.OK;
  }

  await bootstrapStore(pools, logger);
  const orchestrator = new VerificationOrchestrator({
    engine: pools.engine,
    sink: pools.sink,
    settings: config.verification,
    logger,
  });

  if (task.command === 'verify') {
    const metrics = await orchestrator.verifyTable(task.request);
    formatRunSummary(task.request.table, metrics.snapshot()).forEach(io.out);
    return exitCodeForRun(metrics);
  }

  const summary = await runBatch(orchestrator, task.batch, logger);
  formatBatchSummary(summary).forEach(io.out);
  return exitCodeForBatch(summary);
}

export async function run(argv: readonly string[], io: CliIO = processIO): Promise<ExitCode> {
  let task: Task;
  let configPath: string | undefined;
  try {
    const parsed = parseArgs(argv);
    if (parsed.kind === 'help') {
      io.out(USAGE);
      return ExitCode.OK;
    }
    task = planTask(parsed.command, parsed.options);
    configPath = parsed.options.configPath;
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`Error: ${error.message}`);
    io.err(USAGE);
    return ExitCode.USAGE;
  }

  let config: ConfigFile;
  try {
    config = await loadConfig(configPath, io.env);
  } catch (error) {
    io.err(describeError(error));
    return ExitCode.ERROR;
  }

  const logger = new Logger({
    level: config.logging.level,
    format: config.logging.format,
  }).child({ runId: createRunId(), command: task.command });

  const pools = new PoolManager(
    { engine: config.engine, resultStore: config.resultStore },
    logger
  );
  try {
    return await execute(task, pools, config, logger, io);
  } catch (error) {
    logger.error('Command failed', { error: errorMessage(error) });
    io.err(describeError(error));
    return ExitCode.ERROR;
  } finally {
    await pools.close();
  }
}
