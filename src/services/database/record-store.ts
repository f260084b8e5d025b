/**
 * PostgreSQL-based record store
 * Executes configured statements against a pg Pool. Failures are wrapped in
 * StoreError and rethrown; nothing is retried.
 */

import { Pool, PoolClient } from 'pg';
import { LogRecord } from '../../shared/types';
import { StoreError, describeError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { RecordStore, StoreConfig } from './interfaces';
import { PreparedStatement, bindParameters } from './statement';

export class PgRecordStore implements RecordStore {
  private pool: Pool;

  constructor(config: StoreConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      max: config.max || 4,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    this.pool.on('error', (err) => {
      logger.error('Unexpected error on idle client', err);
    });
  }

  async bootstrap(statements: readonly string[]): Promise<void> {
    await this.withTransaction(async (client) => {
      for (const statement of statements) {
        try {
          await client.query(statement);
        } catch (error) {
          throw new StoreError(`Schema statement failed: ${describeError(error)}`, statement, error);
        }
      }
    });
    logger.info(`Database schema initialized (${statements.length} statements)`);
  }

  async execute(statement: PreparedStatement, record: LogRecord): Promise<void> {
    const values = bindParameters(statement, record);
    try {
      await this.pool.query(statement.text, values);
    } catch (error) {
      throw new StoreError(`Insert failed: ${describeError(error)}`, statement.source, error);
    }
  }

  async executeMany(statement: PreparedStatement, records: readonly LogRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await this.withTransaction(async (client) => {
      for (const record of records) {
        const values = bindParameters(statement, record);
        try {
          await client.query(statement.text, values);
        } catch (error) {
          throw new StoreError(`Batch insert failed: ${describeError(error)}`, statement.source, error);
        }
      }
    });
    logger.debug(`Wrote ${records.length} records with: ${statement.source}`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async withTransaction(work: (client: PoolClient) => Promise<void>): Promise<void> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreError(`Cannot connect to database: ${describeError(error)}`, undefined, error);
    }

    try {
      await client.query('BEGIN');
      await work(client);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Rollback failed', { error: describeError(rollbackError) });
      });
      throw error instanceof StoreError
        ? error
        : new StoreError(`Transaction failed: ${describeError(error)}`, undefined, error);
    } finally {
      client.release();
    }
  }
}
