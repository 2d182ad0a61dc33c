/**
 * Command-line arguments
 *
 *   tableparity verify -t <table> -d <baseDb> -a <targetDb> -o <odate> -m <mid> [options]
 *   tableparity batch --tables a,b,c -d <baseDb> -a <targetDb> -o <odate> -m <mid> [options]
 *   tableparity report -o <odate>
 */

import type { VerificationMode, VerificationRequestInput } from '@tableparity/core';
import type { BatchOptions } from '@tableparity/verification';

export const USAGE = `Usage:
  tableparity verify -t <table> -d <baseDb> -a <targetDb> -o <odate> -m <mid> [options]
  tableparity batch --tables <t1,t2,...> -d <baseDb> -a <targetDb> -o <odate> -m <mid> [options]
  tableparity report -o <odate>

Options:
  -t, --table <name>        Table to verify
  -d, --base-db <name>      Base (source) database
  -a, --target-db <name>    Target (migrated) database
  -o, --odate <date>        Operation date, e.g. 20250101
  -m, --mid <id>            Migration id
  -w, --where <predicate>   SQL filter applied to both sides (default: 1=1)
  -e, --exclude <cols>      Comma-separated columns left out of the comparison
      --mode <mode>         FAST (default) or DETAILED
      --tables <list>       Comma-separated tables (batch only)
      --config <file>       JSON config file (default: $TABLEPARITY_CONFIG)
  -h, --help                Show this help

Exit codes: 0 no differences, 1 differences found, 2 errors, 64 usage error`;

export type Command = 'verify' | 'batch' | 'report';

const COMMANDS: readonly Command[] = ['verify', 'batch', 'report'];

export interface CliOptions {
  table?: string;
  baseDatabase?: string;
  targetDatabase?: string;
  operationDate?: string;
  migrationId?: string;
  whereCondition?: string;
  excludeColumns: string[];
  tables: string[];
  mode?: VerificationMode;
  configPath?: string;
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'command'; command: Command; options: CliOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ValueFlag = Exclude<keyof CliOptions, 'excludeColumns' | 'tables' | 'mode'> | 'exclude' | 'tables' | 'mode';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-t': 'table',
  '--table': 'table',
  '-d': 'baseDatabase',
  '--base-db': 'baseDatabase',
  '-a': 'targetDatabase',
  '--target-db': 'targetDatabase',
  '-o': 'operationDate',
  '--odate': 'operationDate',
  '-m': 'migrationId',
  '--mid': 'migrationId',
  '-w': 'whereCondition',
  '--where': 'whereCondition',
  '-e': 'exclude',
  '--exclude': 'exclude',
  '--tables': 'tables',
  '--mode': 'mode',
  '--config': 'configPath',
};

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseMode(value: string): VerificationMode {
  const mode = value.trim().toUpperCase();
  if (mode === 'FAST' || mode === 'DETAILED') return mode;
  throw new UsageError(`Invalid mode: ${value} (expected FAST or DETAILED)`);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('-h') || argv.includes('--help')) return { kind: 'help' };

  let command: Command | undefined;
  const options: CliOptions = { excludeColumns: [], tables: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (!arg.startsWith('-')) {
      if (command !== undefined) throw new UsageError(`Unexpected argument: ${arg}`);
      if (!isCommand(arg)) throw new UsageError(`Unknown command: ${arg}`);
      command = arg;
      continue;
    }

    const flag = VALUE_FLAGS[arg];
    if (flag === undefined) throw new UsageError(`Unknown option: ${arg}`);

    const value = argv[i + 1];
    if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
    i++;

    switch (flag) {
      case 'exclude':
        options.excludeColumns.push(...splitList(value));
        break;
      case 'tables':
        options.tables.push(...splitList(value));
        break;
      case 'mode':
        options.mode = parseMode(value);
        break;
      default:
        options[flag] = value;
    }
  }

  if (command === undefined) throw new UsageError('Missing command (verify, batch or report)');
  return { kind: 'command', command, options };
}

function requireOptions(
  options: CliOptions,
  required: readonly (readonly [keyof CliOptions, string])[]
): void {
  const missing = required.filter(([key]) => !options[key]).map(([, flag]) => flag);
  if (missing.length > 0) {
    throw new UsageError(`Missing required option(s): ${missing.join(', ')}`);
  }
}

const RUN_OPTIONS = [
  ['baseDatabase', '-d'],
  ['targetDatabase', '-a'],
  ['operationDate', '-o'],
  ['migrationId', '-m'],
] as const;

export function toVerificationRequest(options: CliOptions): VerificationRequestInput {
  requireOptions(options, [['table', '-t'], ...RUN_OPTIONS]);
  return {
    table: options.table ?? '',
    baseDatabase: options.baseDatabase ?? '',
    targetDatabase: options.targetDatabase ?? '',
    operationDate: options.operationDate ?? '',
    migrationId: options.migrationId ?? '',
    whereCondition: options.whereCondition,
    excludeColumns: options.excludeColumns,
    mode: options.mode ?? 'FAST',
  };
}

export function toBatchOptions(options: CliOptions): BatchOptions {
  requireOptions(options, RUN_OPTIONS);
  if (options.tables.length === 0) {
    throw new UsageError('Missing required option(s): --tables');
  }
  return {
    tables: options.tables,
    baseDatabase: options.baseDatabase ?? '',
    targetDatabase: options.targetDatabase ?? '',
    operationDate: options.operationDate ?? '',
    migrationId: options.migrationId ?? '',
    whereCondition: options.whereCondition,
    excludeColumns: options.excludeColumns,
  };
}

export function toReportDate(options: CliOptions): string {
  requireOptions(options, [['operationDate', '-o']]);
  return options.operationDate ?? '';
}
