/**
 * VerificationOrchestrator
 *
 * Verifies one table: resolves its metadata, then either compares it as a
 * whole or fans out one bounded, retried task per partition. Every finished
 * comparison is persisted and folded into the run metrics.
 *
 * A fan-out that outlives `fanOutTimeoutMs` does not throw: unfinished
 * partitions are cancelled, `verifyTable` resolves with the partial metrics,
 * and a `Fan-out timed out ...` entry is added to their errors, so callers
 * mapping errors to an exit status report the run as failed.
 */

import {
  Logger,
  NO_PARTITION,
  Semaphore,
  cancelledError,
  errorMessage,
  finalizeOutcome,
  isVerificationError,
  parseVerificationRequest,
  parseVerificationSettings,
  settlesWithin,
  startOutcome,
  withRetries,
  wrapError,
  type ComparisonOutcome,
  type CorrelationIds,
  type EngineConnectionProvider,
  type ResultSink,
  type SleepFn,
  type TableMetadata,
  type VerificationRequest,
  type VerificationRequestInput,
  type VerificationSettings,
  type VerificationSettingsInput,
} from '@tableparity/core';
import { TableMetadataService, buildPartitionFilter } from '../metadata/index.js';
import { runComparison } from '../strategies/index.js';
import { VerificationMetrics } from '../metrics/index.js';

export interface VerificationOrchestratorOptions {
  engine: EngineConnectionProvider;
  sink: ResultSink;
  settings?: VerificationSettingsInput;
  logger?: Logger;
  /** Backoff wait between retries (default: abortable setTimeout) */
  sleep?: SleepFn;
  metadataService?: TableMetadataService;
  /** Millisecond clock for run metrics */
  clock?: () => number;
}

/** Everything a comparison task needs about the run it belongs to */
interface RunContext {
  request: VerificationRequest;
  metadata: TableMetadata;
  correlation: CorrelationIds;
  metrics: VerificationMetrics;
  log: Logger;
}

export class VerificationOrchestrator {
  readonly settings: VerificationSettings;
  private readonly engine: EngineConnectionProvider;
  private readonly sink: ResultSink;
  private readonly logger: Logger;
  private readonly sleep?: SleepFn;
  private readonly metadataService: TableMetadataService;
  private readonly clock?: () => number;

  constructor(options: VerificationOrchestratorOptions) {
    this.settings = parseVerificationSettings(options.settings ?? {});
    this.engine = options.engine;
    this.sink = options.sink;
    this.logger = options.logger ?? new Logger();
    this.sleep = options.sleep;
    this.metadataService = options.metadataService ?? new TableMetadataService(this.logger);
    this.clock = options.clock;
  }

  async verifyTable(input: VerificationRequestInput): Promise<VerificationMetrics> {
    const request = parseVerificationRequest(input);
    const log = this.logger.child({ table: request.table, mode: request.mode });
    const metrics = new VerificationMetrics(this.clock);
    const correlation: CorrelationIds = {
      operationDate: request.operationDate,
      migrationId: request.migrationId,
    };

    log.info('=== Starting Data Verification ===');
    log.info(`Table: ${request.baseDatabase}.${request.table} -> ${request.targetDatabase}.${request.table}`);
    log.info(`Where: ${request.whereCondition}`);

    try {
      const { metadata, partitions } = await this.analyze(request);
      const ctx: RunContext = { request, metadata, correlation, metrics, log };

      if (metadata.partitioned) {
        await this.verifyPartitioned(ctx, partitions);
      } else {
        await this.verifyWholeTable(ctx);
      }
    } catch (error) {
      const failure = wrapError(error, 'UNKNOWN', { table: request.table });
      log.error('Verification failed', { error: failure.message });
      metrics.addError(failure.message);
      metrics.complete();
      throw failure;
    }

    metrics.complete();
    this.logSummary(log, request, metrics);
    return metrics;
  }

  private async analyze(
    request: VerificationRequest
  ): Promise<{ metadata: TableMetadata; partitions: string[] }> {
    const conn = await this.engine.acquire();
    try {
      const metadata = await this.metadataService.analyzeTable(
        conn,
        request.baseDatabase,
        request.table,
        request.excludeColumns
      );
      const partitions = metadata.partitioned
        ? await this.metadataService.getPartitions(conn, metadata, request.whereCondition)
        : [];
      return { metadata, partitions };
    } finally {
      conn.release();
    }
  }

  private async verifyWholeTable(ctx: RunContext): Promise<void> {
    ctx.log.info('Processing non-partitioned table');

    const outcome = await withRetries(() => this.compareOnce(ctx, NO_PARTITION), {
      operationName: `Verify table: ${ctx.request.table}`,
      attempts: this.settings.retryAttempts,
      baseDelayMs: this.settings.retryDelayMs,
      sleep: this.sleep,
      logger: ctx.log,
    });

    await this.persist(ctx, outcome);
    ctx.metrics.recordOutcome(outcome);
    ctx.log.info(`Table verification completed: ${outcome.status} (${outcome.durationMs}ms)`);
  }

  private async verifyPartitioned(ctx: RunContext, partitions: string[]): Promise<void> {
    ctx.log.info(`Found ${partitions.length} partitions to process`);
    if (partitions.length === 0) {
      ctx.log.warn('No partitions match the filter; nothing to compare');
      return;
    }

    const poolSize = Math.min(this.settings.maxParallelPartitions, partitions.length);
    ctx.log.info(`Using concurrency limit: ${poolSize}`);

    const semaphore = new Semaphore(poolSize);
    const controller = new AbortController();

    const tasks = partitions.map((partition) =>
      this.verifyPartition(ctx, partition, semaphore, controller.signal).catch((error: unknown) => {
        if (isVerificationError(error, 'CANCELLED')) return;
        ctx.log.error(`Partition task crashed: ${partition}`, { error: errorMessage(error) });
        ctx.metrics.addError(`${partition}: ${errorMessage(error)}`);
      })
    );
    const allDone = Promise.all(tasks);

    if (await settlesWithin(allDone, this.settings.fanOutTimeoutMs)) return;

    const processed = ctx.metrics.partitionsProcessed;
    ctx.log.warn('Some partition tasks did not complete within timeout', {
      timeoutMs: this.settings.fanOutTimeoutMs,
      processed,
      total: partitions.length,
    });
    ctx.metrics.addError(
      `Fan-out timed out after ${this.settings.fanOutTimeoutMs}ms: ${processed} of ${partitions.length} partitions processed`
    );
    controller.abort();

    if (!(await settlesWithin(allDone, this.settings.shutdownGraceMs))) {
      ctx.log.warn('Partition tasks still running after shutdown grace period', {
        graceMs: this.settings.shutdownGraceMs,
      });
    }
  }

  /**
   * One partition: wait for a permit, compare under retry, then persist and
   * fold exactly once. Tasks cut off by the fan-out timeout do neither.
   */
  private async verifyPartition(
    ctx: RunContext,
    partition: string,
    semaphore: Semaphore,
    signal: AbortSignal
  ): Promise<void> {
    const release = await semaphore.acquire(signal);
    try {
      const startedAt = new Date();
      let outcome: ComparisonOutcome;
      try {
        outcome = await withRetries(() => this.compareOnce(ctx, partition, signal), {
          operationName: `Verify partition: ${partition}`,
          attempts: this.settings.retryAttempts,
          baseDelayMs: this.settings.retryDelayMs,
          sleep: this.sleep,
          signal,
          logger: ctx.log,
        });
      } catch (error) {
        if (signal.aborted) return;
        ctx.log.error(`Failed to verify partition: ${partition}`, { error: errorMessage(error) });
        outcome = finalizeOutcome(
          startOutcome(
            {
              table: ctx.request.table,
              baseDatabase: ctx.request.baseDatabase,
              targetDatabase: ctx.request.targetDatabase,
              partition,
              mode: ctx.request.mode,
              whereCondition: ctx.request.whereCondition,
            },
            startedAt
          ),
          { status: 'ERROR', message: `Error: ${errorMessage(error)}` }
        );
      }

      if (signal.aborted) return;
      await this.persist(ctx, outcome);
      ctx.metrics.recordOutcome(outcome);

      if (outcome.status === 'MATCH') {
        ctx.log.info(`Partition ${partition} verification: MATCH (${outcome.durationMs}ms)`);
      } else {
        ctx.log.warn(`Partition ${partition} verification: ${outcome.status}`, {
          message: outcome.message,
        });
      }
    } finally {
      release();
    }
  }

  /**
   * A single attempt on its own connection. An abort tears the connection
   * down so the statement in flight stops; a checkout that completes after
   * the abort is handed back unused.
   */
  private async compareOnce(
    ctx: RunContext,
    partition: string,
    signal?: AbortSignal
  ): Promise<ComparisonOutcome> {
    const whereCondition = buildPartitionFilter(partition, ctx.request.whereCondition);
    const conn = await this.engine.acquire();
    if (signal?.aborted) {
      // the deadline passed while this task waited for a checkout
      conn.release();
      throw cancelledError(`Verify partition: ${partition}`);
    }
    const onAbort = () => conn.destroy();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await runComparison(
        ctx.request.mode,
        conn,
        {
          baseDatabase: ctx.request.baseDatabase,
          targetDatabase: ctx.request.targetDatabase,
          table: ctx.request.table,
          columns: ctx.metadata.columns,
          whereCondition,
          sampleLimit: this.settings.sampleLimit,
          partition,
        },
        ctx.log
      );
    } finally {
      signal?.removeEventListener('abort', onAbort);
      conn.release();
    }
  }

  private async persist(ctx: RunContext, outcome: ComparisonOutcome): Promise<void> {
    try {
      await this.sink.save(outcome, ctx.correlation);
    } catch (error) {
      ctx.log.error('Failed to save verification result', {
        partition: outcome.partition,
        error: errorMessage(error),
      });
    }
  }

  private logSummary(log: Logger, request: VerificationRequest, metrics: VerificationMetrics): void {
    log.info(`=== Verification Complete for ${request.table} ===`);
    log.info(`Duration: ${metrics.totalDurationSeconds.toFixed(2)} seconds`);
    log.info(`Partitions processed: ${metrics.partitionsProcessed}`);
    log.info(`Total rows processed: ${metrics.totalRowsProcessed}`);
    log.info(`Differences found: ${metrics.differencesFound}`);

    const errors = metrics.errorMessages;
    if (errors.length > 0) {
      log.warn(`Errors encountered: ${errors.length}`);
      for (const message of errors) {
        log.warn(`  - ${message}`);
      }
    }
  }
}
