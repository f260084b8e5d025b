import { LogRecord } from '../../shared/types';

/**
 * Record fields win over defaults on key collision.
 */
export function mergeDefaults(defaults: LogRecord, record: LogRecord): LogRecord {
  return { ...defaults, ...record };
}
