/**
 * Zod schemas for run settings and verification requests
 */

import { z } from 'zod';
import { VerificationError } from '../errors/index.js';
import { VALID_IDENTIFIER } from '../utils/sql.js';
import type { VerificationRequest } from '../types/index.js';

const identifier = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .regex(VALID_IDENTIFIER, `${label} must be a plain SQL identifier`);

/** Tunables of one verification run */
export const verificationSettingsSchema = z
  .object({
    maxParallelPartitions: z.number().int().min(1).max(10_000).default(100),
    sampleLimit: z.number().int().min(1).max(10_000).default(5),
    retryAttempts: z.number().int().min(1).max(100).default(3),
    retryDelayMs: z.number().int().min(0).max(600_000).default(1000),
    fanOutTimeoutMs: z.number().int().min(1).default(1_800_000),
    shutdownGraceMs: z.number().int().min(0).max(600_000).default(5000),
  })
  .strict();

export type VerificationSettings = z.infer<typeof verificationSettingsSchema>;
export type VerificationSettingsInput = z.input<typeof verificationSettingsSchema>;

export const verificationModeSchema = z.enum(['FAST', 'DETAILED']);

export const verificationRequestSchema = z.object({
  table: identifier('table'),
  baseDatabase: identifier('baseDatabase'),
  targetDatabase: identifier('targetDatabase'),
  operationDate: z.string().trim().min(1, 'operationDate is required'),
  migrationId: z.string().trim().min(1, 'migrationId is required'),
  whereCondition: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() ? value.trim() : '1=1')),
  excludeColumns: z
    .array(z.string())
    .default([])
    .transform((cols) => cols.map((c) => c.trim()).filter((c) => c.length > 0)),
  mode: verificationModeSchema.default('FAST'),
});

export type VerificationRequestInput = z.input<typeof verificationRequestSchema>;

function describeIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function parseVerificationSettings(input: unknown): VerificationSettings {
  const result = verificationSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new VerificationError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid verification settings: ${describeIssues(result.error)}`,
    });
  }
  return result.data;
}

export function parseVerificationRequest(input: unknown): VerificationRequest {
  const result = verificationRequestSchema.safeParse(input);
  if (!result.success) {
    throw new VerificationError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid verification request: ${describeIssues(result.error)}`,
      suggestion: 'Provide table, base database, target database, operation date and migration id.',
    });
  }
  return result.data;
}
