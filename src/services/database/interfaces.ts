/**
 * Store Interfaces
 * The sink only sees RecordStore; PgRecordStore is the PostgreSQL implementation.
 */

import { LogRecord } from '../../shared/types';
import { PreparedStatement } from './statement';

export interface RecordStore {
  /** Run schema statements once, in order, before ingestion starts. */
  bootstrap(statements: readonly string[]): Promise<void>;
  /** Run one statement for one record and commit it. */
  execute(statement: PreparedStatement, record: LogRecord): Promise<void>;
  /** Run one statement for every record in a single transaction. */
  executeMany(statement: PreparedStatement, records: readonly LogRecord[]): Promise<void>;
  close(): Promise<void>;
}

export interface StoreConfig {
  connectionString: string;
  max?: number; // max connections in pool
}
