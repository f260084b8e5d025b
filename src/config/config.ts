/**
 * Pipeline configuration
 * Merges command-line overrides over the JSON config file and validates the
 * result into a frozen PipelineConfig. Every failure here is fatal and
 * happens before anything is bound.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  FieldFilterRules,
  JsonValueSchema,
  LogRecord,
  LogRecordSchema,
  PipelineConfig,
  TransportBinding,
} from '../shared/types';
import { ConfigurationError, UnsupportedFeatureError, describeError } from '../shared/errors';
import { DEFAULT_MAX_FRAME_BYTES } from '../services/ingestion/decoder';
import { parseJson, stringifyJson } from '../shared/json';
import { parseBind } from './bind';

export const DEFAULT_QUEUE_CAPACITY = 1024;

// database, create, insert and batch are typed in resolveConfig, after the
// command-line overrides have been applied.
export const ConfigFileSchema = z
  .object({
    database: z.unknown().optional(),
    create: z.unknown().optional(),
    insert: z.unknown().optional(),
    defaults: LogRecordSchema.optional(),
    batch: z.unknown().optional(),
    exporter: z.string().optional(),
    bind: z.string().optional(),
    filter: z
      .object({
        include: z.record(JsonValueSchema).optional(),
        exclude: z.record(JsonValueSchema).optional(),
      })
      .optional(),
    queueCapacity: z.number().int().positive().optional(),
    maxFrameBytes: z.number().int().positive().optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Values given on the command line. Each one wins over the file.
 */
export interface ConfigOverrides {
  database?: string;
  create?: string[];
  insert?: string[];
  batch?: number;
  exporter?: string;
  bind?: string;
}

const StatementListSchema = z.array(z.string());
const BatchSizeSchema = z.number().int().nonnegative();

export function loadConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseJson(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${describeError(error)}`);
  }
  return parseConfigFile(raw, filePath);
}

export function parseConfigFile(raw: unknown, source = 'config'): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(
      `Invalid ${source}: ${field ? `${field}: ` : ''}${issue.message}`,
      field || undefined
    );
  }
  return result.data;
}

function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
  return values.find((value) => value !== undefined);
}

export function resolveConfig(overrides: ConfigOverrides, file: ConfigFile = {}): PipelineConfig {
  const database = firstDefined<unknown>(overrides.database, file.database);
  if (typeof database !== 'string' || database.trim() === '') {
    throw new ConfigurationError('No database configured!', 'database');
  }

  const create = StatementListSchema.safeParse(firstDefined<unknown>(overrides.create, file.create));
  if (!create.success) {
    throw new ConfigurationError('No create statement list configured!', 'create');
  }

  const insert = StatementListSchema.min(1).safeParse(
    firstDefined<unknown>(overrides.insert, file.insert)
  );
  if (!insert.success) {
    throw new ConfigurationError('No insert statement list configured!', 'insert');
  }

  const rawBatch = firstDefined<unknown>(overrides.batch, file.batch, 0);
  const batch = BatchSizeSchema.safeParse(rawBatch);
  if (!batch.success) {
    throw new ConfigurationError(`Invalid batch size: ${stringifyJson(rawBatch)}`, 'batch');
  }

  const binding = resolveBinding(
    firstDefined(overrides.bind, file.bind),
    firstDefined(overrides.exporter, file.exporter)
  );

  const defaults: LogRecord = file.defaults ?? {};
  const filter: FieldFilterRules | undefined = file.filter;

  return Object.freeze({
    database,
    create: Object.freeze([...create.data]),
    insert: Object.freeze([...insert.data]),
    defaults: Object.freeze({ ...defaults }),
    batch: batch.data,
    binding,
    filter,
    queueCapacity: file.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
    maxFrameBytes: file.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES,
  });
}

function resolveBinding(bind: string | undefined, exporter: string | undefined): TransportBinding {
  if (bind !== undefined) {
    return parseBind(bind);
  }
  if (exporter === undefined) {
    throw new ConfigurationError('Neither bind nor exporter configured!', 'bind');
  }
  return exporterToBinding(exporter);
}

/**
 * Discovering the bind address from a running log exporter is not supported.
 */
export function exporterToBinding(exporter: string): never {
  throw new UnsupportedFeatureError(
    `Automatic bind detection for exporter '${exporter}' is not implemented; configure bind instead`
  );
}
