/**
 * Batch Collector
 * Pulls frames from a FrameSource, decodes and filters them, and yields
 * accepted records until the requested count is reached.
 */

import { FrameSource } from '../../queue/frame-queue';
import { LogRecord } from '../../shared/types';
import { logger } from '../../shared/logger';
import { decodeFrame } from './decoder';
import { acceptAll } from './filter';
import {
  AcceptanceFilter,
  CollectedBatch,
  CollectorOptions,
  CollectorStats,
  IngestionCounters,
} from './interfaces';

export class BatchCollector {
  private filter: AcceptanceFilter;
  private maxFrameBytes?: number;
  private verbose: boolean;
  private counters: IngestionCounters;
  private accepted = 0;
  private discarded = 0;

  constructor(options: CollectorOptions = {}) {
    this.filter = options.filter ?? acceptAll;
    this.maxFrameBytes = options.maxFrameBytes;
    this.verbose = options.verbose ?? false;
    this.counters = options.counters ?? { totalAccepted: 0, batchAccepted: 0 };
  }

  /**
   * Yield exactly `limit` accepted records, or records without end when
   * `limit` is 0. Stops early only if the source is closed.
   */
  async *collect(source: FrameSource, limit: number): AsyncGenerator<LogRecord, void, undefined> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`Collector limit must be a non-negative integer, got ${limit}`);
    }

    let count = 0;
    while (limit === 0 || count < limit) {
      const frame = await source.next();
      if (frame === null) {
        return;
      }

      const decoded = decodeFrame(frame, { maxFrameBytes: this.maxFrameBytes });
      if (!decoded.ok) {
        this.discarded++;
        continue;
      }

      if (!this.filter(decoded.record)) {
        this.discarded++;
        continue;
      }

      count++;
      this.accepted++;
      this.counters.totalAccepted++;
      this.counters.batchAccepted++;

      if (this.verbose) {
        logger.info('Processing record', { record: decoded.record });
      }

      yield decoded.record;
    }
  }

  /**
   * Drain `collect` into an array.
   */
  async collectBatch(source: FrameSource, limit: number): Promise<CollectedBatch> {
    if (limit === 0) {
      throw new RangeError('A batch needs a positive limit; use collect() to stream');
    }

    const records: LogRecord[] = [];
    for await (const record of this.collect(source, limit)) {
      records.push(record);
    }
    return { records, complete: records.length === limit };
  }

  getStats(): CollectorStats {
    return {
      accepted: this.accepted,
      discarded: this.discarded,
    };
  }
}
