import { z } from 'zod';

// Integers too large for a double are decoded as bigint.
export type JsonPrimitive = string | number | bigint | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * One decoded event. Schema-less; any keys are allowed.
 */
export type LogRecord = Readonly<Record<string, JsonValue>>;

export type Batch = LogRecord[];

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.bigint(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const LogRecordSchema = z.record(JsonValueSchema);

export type TransportBinding =
  | { family: 'ipv4' | 'ipv6'; host: string; port: number }
  | { family: 'local'; path: string };

export interface FieldFilterRules {
  include?: LogRecord;
  exclude?: LogRecord;
}

export interface PipelineConfig {
  database: string;
  create: readonly string[];
  insert: readonly string[];
  defaults: LogRecord;
  batch: number; // 0 = write each record as it arrives
  binding: TransportBinding;
  filter?: FieldFilterRules;
  queueCapacity: number;
  maxFrameBytes: number;
}

export interface RunOptions {
  total?: number; // absent = run until stopped
  verbose?: boolean;
}

export function isLogRecord(value: unknown): value is LogRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
