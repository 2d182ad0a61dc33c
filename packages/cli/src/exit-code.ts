import type { BatchSummary } from '@tableparity/verification';

export const ExitCode = {
  OK: 0,
  DIFFERENCES: 1,
  ERROR: 2,
  USAGE: 64,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForRun(metrics: { hasErrors: boolean; differencesFound: number }): ExitCode {
  if (metrics.hasErrors) return ExitCode.ERROR;
  if (metrics.differencesFound > 0) return ExitCode.DIFFERENCES;
  return ExitCode.OK;
}

export function exitCodeForBatch(summary: Pick<BatchSummary, 'failed' | 'differences'>): ExitCode {
  if (summary.failed > 0) return ExitCode.ERROR;
  if (summary.differences > 0) return ExitCode.DIFFERENCES;
  return ExitCode.OK;
}
