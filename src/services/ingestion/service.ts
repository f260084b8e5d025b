/**
 * Ingestion Service - Main Implementation
 * Runs COLLECT -> WRITE cycles against one bound transport until the total
 * budget is used up or the service is stopped.
 */

import { Batch, PipelineConfig, RunOptions } from '../../shared/types';
import { logger } from '../../shared/logger';
import { RecordStore } from '../database/interfaces';
import { BatchedSink, ImmediateSink, RecordSink } from '../sink';
import { Transport } from '../transport/interfaces';
import { BatchCollector } from './collector';
import { createFieldFilter } from './filter';
import {
  AcceptanceFilter,
  IngestionCounters,
  IngestionState,
  IngestionStats,
  IngestionSummary,
  StopReason,
} from './interfaces';

export type IngestionConfig = Pick<PipelineConfig, 'insert' | 'defaults' | 'batch' | 'filter' | 'maxFrameBytes'>;

export class IngestionService {
  private state: IngestionState = 'idle';
  private counters: IngestionCounters = { totalAccepted: 0, batchAccepted: 0 };
  private sink: RecordSink | null = null;
  private collector: BatchCollector | null = null;
  private stopRequested = false;
  private filter: AcceptanceFilter;

  constructor(
    private readonly transport: Transport,
    private readonly store: RecordStore,
    private readonly config: IngestionConfig,
    filter?: AcceptanceFilter
  ) {
    if (!Number.isInteger(config.batch) || config.batch < 0) {
      throw new RangeError(`Batch size must be a non-negative integer, got ${config.batch}`);
    }
    this.filter = filter ?? createFieldFilter(config.filter);
  }

  /**
   * Ingest until the total budget is exhausted or stop() is called.
   * Store and transport failures are rethrown.
   */
  async run(options: RunOptions = {}): Promise<IngestionSummary> {
    if (this.state !== 'idle') {
      throw new Error(`Ingestion cannot start from state '${this.state}'`);
    }

    const total = options.total;
    if (total !== undefined && (!Number.isInteger(total) || total < 0)) {
      throw new RangeError(`Total must be a non-negative integer, got ${total}`);
    }

    const startTime = Date.now();
    this.counters = { totalAccepted: 0, batchAccepted: 0 };
    this.sink = null;
    this.collector = new BatchCollector({
      filter: this.filter,
      maxFrameBytes: this.config.maxFrameBytes,
      verbose: options.verbose,
      counters: this.counters,
    });

    logger.info(
      this.config.batch === 0
        ? 'Writing records immediately as they arrive'
        : `Writing records in batches of ${this.config.batch}`
    );
    if (total !== undefined) {
      logger.info(`Stopping after ${total} records`);
    }

    let reason: StopReason;
    try {
      if (total === 0) {
        reason = 'budget-exhausted';
      } else if (this.config.batch === 0) {
        reason = await this.streamImmediately(this.collector, total);
      } else {
        reason = await this.writeInBatches(this.collector, this.config.batch, total);
      }
    } finally {
      this.state = 'stopped';
    }

    const summary = this.createSummary(reason, startTime);
    this.logCompletion(summary);
    return summary;
  }

  /**
   * Single unbounded cycle. The total budget, if any, is checked per record.
   */
  private async streamImmediately(collector: BatchCollector, total: number | undefined): Promise<StopReason> {
    const sink = new ImmediateSink(this.store, this.config);
    this.sink = sink;
    this.state = 'collecting';

    const records = collector.collect(this.transport.source, total ?? 0);
    for await (const record of records) {
      this.state = 'writing';
      await sink.write(record);
      this.state = 'collecting';
    }

    return total !== undefined && this.counters.totalAccepted >= total ? 'budget-exhausted' : 'stopped';
  }

  /**
   * The budget is checked only before each batch, so the last batch can
   * overshoot it by up to batch - 1 records.
   */
  private async writeInBatches(
    collector: BatchCollector,
    batchSize: number,
    total: number | undefined
  ): Promise<StopReason> {
    const sink = new BatchedSink(this.store, this.config);
    this.sink = sink;

    while (total === undefined || this.counters.totalAccepted < total) {
      this.state = 'collecting';
      this.counters.batchAccepted = 0;

      const { records, complete } = await collector.collectBatch(this.transport.source, batchSize);
      if (!complete) {
        this.logDiscardedBatch(records);
        return 'stopped';
      }

      this.state = 'writing';
      await sink.write(records);
      logger.debug(`Wrote batch ${sink.getStats().batchesWritten} (${records.length} records)`);
    }

    return 'budget-exhausted';
  }

  private logDiscardedBatch(records: Batch): void {
    if (records.length > 0) {
      logger.warn(`Stopped mid-batch, ${records.length} collected records were not written`);
    }
  }

  /**
   * Close the transport. A batch still being collected is dropped.
   */
  async stop(): Promise<void> {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    logger.info('Stopping ingestion...');
    await this.transport.close();
  }

  private createSummary(reason: StopReason, startTime: number): IngestionSummary {
    const collectorStats = this.collector?.getStats();
    const sinkStats = this.sink?.getStats();
    return {
      accepted: this.counters.totalAccepted,
      written: sinkStats?.recordsWritten ?? 0,
      batches: sinkStats?.batchesWritten ?? 0,
      statements: sinkStats?.statementsExecuted ?? 0,
      discarded: collectorStats?.discarded ?? 0,
      dropped: this.transport.getStats().dropped,
      elapsedMs: Date.now() - startTime,
      reason,
    };
  }

  private logCompletion(summary: IngestionSummary): void {
    const elapsed = summary.elapsedMs / 1000;
    const rate = elapsed > 0 ? summary.accepted / elapsed : 0;
    logger.info(
      `Ingestion ${summary.reason === 'stopped' ? 'stopped' : 'completed'}: ` +
        `${summary.accepted} records accepted, ${summary.written} written with ${summary.statements} statements, ` +
        `${summary.discarded} discarded, ${summary.dropped} dropped ` +
        `in ${elapsed.toFixed(2)}s (${rate.toFixed(2)} records/sec)`
    );
  }

  getStats(): IngestionStats {
    return {
      state: this.state,
      totalAccepted: this.counters.totalAccepted,
      batchAccepted: this.counters.batchAccepted,
      batchesWritten: this.sink?.getStats().batchesWritten ?? 0,
      discarded: this.collector?.getStats().discarded ?? 0,
    };
  }

  isRunning(): boolean {
    return this.state === 'collecting' || this.state === 'writing';
  }
}
