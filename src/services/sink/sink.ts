/**
 * Record Sinks
 * ImmediateSink writes and commits each record before the next one is read.
 * BatchedSink writes a whole batch per statement in one transaction, so an
 * interrupted batch is lost as a whole.
 */

import { LogRecord } from '../../shared/types';
import { RecordStore } from '../database/interfaces';
import { PreparedStatement, prepareStatement } from '../database/statement';
import { mergeDefaults } from './merge';
import { SinkConfig, SinkStats, WritePolicy } from './interfaces';

export abstract class RecordSink {
  protected readonly statements: PreparedStatement[];
  protected readonly defaults: LogRecord;
  protected recordsWritten = 0;
  protected batchesWritten = 0;
  protected statementsExecuted = 0;

  constructor(
    protected readonly store: RecordStore,
    config: SinkConfig,
    readonly policy: WritePolicy
  ) {
    if (config.insert.length === 0) {
      throw new RangeError('A sink needs at least one insert statement');
    }
    this.statements = config.insert.map(prepareStatement);
    this.defaults = config.defaults;
  }

  getStats(): SinkStats {
    return {
      policy: this.policy,
      recordsWritten: this.recordsWritten,
      batchesWritten: this.batchesWritten,
      statementsExecuted: this.statementsExecuted,
    };
  }
}

export class ImmediateSink extends RecordSink {
  constructor(store: RecordStore, config: SinkConfig) {
    super(store, config, 'immediate');
  }

  async write(record: LogRecord): Promise<void> {
    for (const statement of this.statements) {
      await this.store.execute(statement, mergeDefaults(this.defaults, record));
      this.statementsExecuted++;
    }
    this.recordsWritten++;
  }
}

export class BatchedSink extends RecordSink {
  constructor(store: RecordStore, config: SinkConfig) {
    super(store, config, 'batched');
  }

  async write(batch: readonly LogRecord[]): Promise<void> {
    if (batch.length === 0) {
      return;
    }

    for (const statement of this.statements) {
      const merged = batch.map((record) => mergeDefaults(this.defaults, record));
      await this.store.executeMany(statement, merged);
      this.statementsExecuted++;
    }
    this.recordsWritten += batch.length;
    this.batchesWritten++;
  }
}
