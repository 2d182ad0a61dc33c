import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { verificationSettingsSchema } from '@tableparity/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

export const engineSchema = z
  .object({
    connectionString: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    max: z.number().int().min(1).max(1000).optional(),
    statementTimeoutMs: z.number().int().min(1).optional(),
    connectionTimeoutMs: z.number().int().min(1).optional(),
  })
  .strict();

export const resultStoreSchema = z
  .object({
    uri: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    connectionLimit: z.number().int().min(1).max(1000).optional(),
    table: z.string().min(1).optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    engine: engineSchema.default({}),
    resultStore: resultStoreSchema.default({}),
    verification: verificationSettingsSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid configuration:\n${issues}`;
}

type Override = readonly [section: string, key: string, variable: string, kind: 'string' | 'number'];

const ENV_OVERRIDES: readonly Override[] = [
  ['engine', 'connectionString', 'ENGINE_URL', 'string'],
  ['engine', 'user', 'ENGINE_USER', 'string'],
  ['engine', 'password', 'ENGINE_PASSWORD', 'string'],
  ['resultStore', 'uri', 'RESULT_STORE_URL', 'string'],
  ['resultStore', 'user', 'RESULT_STORE_USER', 'string'],
  ['resultStore', 'password', 'RESULT_STORE_PASSWORD', 'string'],
  ['verification', 'maxParallelPartitions', 'VERIFICATION_MAX_PARALLEL', 'number'],
  ['verification', 'sampleLimit', 'VERIFICATION_SAMPLE_LIMIT', 'number'],
  ['verification', 'retryAttempts', 'VERIFICATION_RETRY_ATTEMPTS', 'number'],
  ['verification', 'retryDelayMs', 'VERIFICATION_RETRY_DELAY_MS', 'number'],
  ['verification', 'fanOutTimeoutMs', 'VERIFICATION_FANOUT_TIMEOUT_MS', 'number'],
  ['logging', 'level', 'LOG_LEVEL', 'string'],
  ['logging', 'format', 'LOG_FORMAT', 'string'],
];

/**
 * Environment variables win over values from the config file
 */
export function applyEnvOverrides(config: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isPlainObject(config)) return config;

  const out: Record<string, unknown> = { ...config };
  for (const [section, key, variable, kind] of ENV_OVERRIDES) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;

    const current = out[section];
    const target: Record<string, unknown> = isPlainObject(current) ? { ...current } : {};
    target[key] = kind === 'number' ? Number(raw.trim()) : raw.trim();
    out[section] = target;
  }
  return out;
}

/**
 * Expand, override and validate an already-parsed config document
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): ConfigFile {
  const expanded = expandEnvVars(raw, { env });
  const result = configFileSchema.safeParse(applyEnvOverrides(expanded, env));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Load the config file named by `configPath` or TABLEPARITY_CONFIG.
 * Without either, the configuration comes from the environment alone.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ConfigFile> {
  const path = configPath ?? env.TABLEPARITY_CONFIG;
  if (!path) return parseConfig({}, env);

  const absolutePath = resolve(process.cwd(), path);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Config file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parsed, env);
}
