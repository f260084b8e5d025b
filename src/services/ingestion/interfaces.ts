/**
 * Ingestion Interfaces and Types
 * Decoder results, filters, counters and the loop's summary.
 */

import { Batch, LogRecord } from '../../shared/types';

export type DecodeFailureReason = 'invalid-utf8' | 'malformed-json' | 'not-an-object' | 'oversized';

export type DecodeResult =
  | { ok: true; record: LogRecord }
  | { ok: false; reason: DecodeFailureReason };

export type AcceptanceFilter = (record: LogRecord) => boolean;

/**
 * Accepted-record counts owned by one ingestion run. Discarded frames never
 * touch either counter.
 */
export interface IngestionCounters {
  totalAccepted: number;
  batchAccepted: number;
}

export interface CollectorOptions {
  filter?: AcceptanceFilter;
  maxFrameBytes?: number;
  verbose?: boolean;
  counters?: IngestionCounters;
}

export interface CollectorStats {
  accepted: number;
  discarded: number;
}

export interface CollectedBatch {
  records: Batch;
  complete: boolean; // false when the source closed before the batch filled
}

export type IngestionState = 'idle' | 'collecting' | 'writing' | 'stopped';

export type StopReason = 'budget-exhausted' | 'stopped';

export interface IngestionSummary {
  accepted: number;
  written: number;
  batches: number;
  statements: number;
  discarded: number;
  dropped: number;
  elapsedMs: number;
  reason: StopReason;
}

export interface IngestionStats {
  state: IngestionState;
  totalAccepted: number;
  batchAccepted: number;
  batchesWritten: number;
  discarded: number;
}
