/**
 * Sink Interfaces
 */

import { LogRecord } from '../../shared/types';

export type WritePolicy = 'immediate' | 'batched';

export interface SinkConfig {
  insert: readonly string[];
  defaults: LogRecord;
}

export interface SinkStats {
  policy: WritePolicy;
  recordsWritten: number;
  batchesWritten: number;
  statementsExecuted: number;
}
