#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { createServiceLogger } from './shared/logger';
import { PipelineConfig, RunOptions } from './shared/types';
import { CollectorError, describeError } from './shared/errors';
import { ConfigFile, ConfigOverrides, loadConfigFile, resolveConfig } from './config/config';
import { formatBinding } from './config/bind';
import { PgRecordStore } from './services/database';
import { IngestionService, IngestionSummary } from './services/ingestion';
import { createTransport } from './services/transport';

const logger = createServiceLogger('collector-main');

export interface CliOptions {
  createStatement?: string[];
  insertStatement?: string[];
  database?: string;
  batch?: number;
  total?: number;
  verbose: boolean;
  exporter?: string;
  bind?: string;
}

function parseInteger(minimum: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected an integer >= ${minimum}, got '${value}'.`);
    }
    return parsed;
  };
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildProgram(): Command {
  return new Command()
    .name('log-collector')
    .description('Receive JSON log records over a datagram socket and write them to PostgreSQL')
    .version('1.0.0')
    .argument('[config]', 'Path to a JSON configuration file')
    .option('-c, --create-statement <sql>', 'Schema statement to run at startup (repeatable)', collect)
    .option('-i, --insert-statement <sql>', 'Insert statement to run per record (repeatable)', collect)
    .option('-D, --database <url>', 'PostgreSQL connection string')
    .option('--batch <size>', 'Records per batch; 0 writes each record immediately', parseInteger(0))
    .option('-t, --total <count>', 'Stop after this many accepted records', parseInteger(0))
    .option('-v, --verbose', 'Log every accepted record', false)
    .addOption(
      new Option('-e, --exporter <name>', 'Detect the bind address from a log exporter').conflicts('bind')
    )
    .addOption(new Option('-b, --bind <address>', 'Address to listen on (ip://host:port or unix://path)'));
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    database: options.database,
    create: options.createStatement,
    insert: options.insertStatement,
    batch: options.batch,
    exporter: options.exporter,
    bind: options.bind,
  };
}

/**
 * Open the store, bootstrap the schema, bind and ingest until done or signalled.
 */
export async function runCollector(config: PipelineConfig, runOptions: RunOptions): Promise<IngestionSummary> {
  const store = new PgRecordStore({ connectionString: config.database });
  try {
    await store.bootstrap(config.create);

    const transport = createTransport(config.binding, {
      queueCapacity: config.queueCapacity,
      maxLineBytes: config.maxFrameBytes,
    });
    await transport.bind();

    const service = new IngestionService(transport, store, config);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      service.stop().catch((error: unknown) => {
        logger.error(`Failed to stop cleanly: ${describeError(error)}`);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    try {
      return await service.run(runOptions);
    } finally {
      await transport.close();
    }
  } finally {
    await store.close();
  }
}

async function main() {
  const program = buildProgram();
  await program.parseAsync(process.argv);

  const options = program.opts<CliOptions>();
  const [configPath] = program.args;

  const file: ConfigFile = configPath ? loadConfigFile(configPath) : {};
  const config = resolveConfig(toOverrides(options), file);

  logger.info(`Binding ${formatBinding(config.binding)}, batch size ${config.batch}`);

  const summary = await runCollector(config, { total: options.total, verbose: options.verbose });
  logger.info(`Done: ${summary.written} of ${summary.accepted} records written in ${summary.batches} batches`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof CollectorError) {
      logger.error(`${error.name}: ${error.message}`);
    } else {
      logger.error('Collector failed:', error);
    }
    process.exit(1);
  });
}
