/**
 * VerificationMetrics
 *
 * Run-level aggregate for one table. Concurrent partition tasks fold their
 * outcomes in here; every mutator is synchronous, so a fold never
 * interleaves with another task's fold.
 */

import type { ComparisonOutcome, MetricsSnapshot } from '@tableparity/core';

export class VerificationMetrics {
  readonly startedAt: Date;
  private endedAtMs?: number;
  private rowsProcessed = 0;
  private differences = 0;
  private partitions = 0;
  private readonly errors: string[] = [];
  private readonly durations = new Map<string, number>();

  constructor(private readonly clock: () => number = Date.now) {
    this.startedAt = new Date(clock());
  }

  addRowsProcessed(rows: number): void {
    this.rowsProcessed += rows;
  }

  addDifferences(differences: number): void {
    this.differences += differences;
  }

  incrementPartitionsProcessed(): void {
    this.partitions++;
  }

  addError(message: string): void {
    this.errors.push(message);
  }

  recordPartitionTime(partition: string, durationMs: number): void {
    this.durations.set(partition, durationMs);
  }

  /**
   * Fold one finished outcome into the aggregate
   */
  recordOutcome(outcome: ComparisonOutcome): void {
    this.addRowsProcessed(outcome.baseRowCount);
    this.addDifferences(outcome.status === 'ERROR' ? 0 : outcome.differencesFound);
    this.incrementPartitionsProcessed();
    this.recordPartitionTime(outcome.partition, outcome.durationMs);
    if (outcome.status === 'ERROR') {
      this.addError(`${outcome.partition}: ${outcome.message}`);
    }
  }

  /** Freeze the total duration */
  complete(): void {
    if (this.endedAtMs === undefined) {
      this.endedAtMs = this.clock();
    }
  }

  get totalRowsProcessed(): number {
    return this.rowsProcessed;
  }

  get differencesFound(): number {
    return this.differences;
  }

  get partitionsProcessed(): number {
    return this.partitions;
  }

  get errorMessages(): string[] {
    return [...this.errors];
  }

  get partitionDurations(): Map<string, number> {
    return new Map(this.durations);
  }

  get hasErrors(): boolean {
    return this.errors.length > 0;
  }

  get totalDurationMs(): number {
    return (this.endedAtMs ?? this.clock()) - this.startedAt.getTime();
  }

  get totalDurationSeconds(): number {
    return this.totalDurationMs / 1000;
  }

  snapshot(): MetricsSnapshot {
    return {
      startedAt: this.startedAt,
      totalDurationMs: this.totalDurationMs,
      totalRowsProcessed: this.rowsProcessed,
      differencesFound: this.differences,
      partitionsProcessed: this.partitions,
      errorMessages: this.errorMessages,
      partitionDurations: Object.fromEntries(this.durations),
    };
  }
}
