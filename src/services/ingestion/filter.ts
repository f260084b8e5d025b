/**
 * Acceptance Filters
 * Records rejected here are discarded before they count toward any limit.
 */

import { FieldFilterRules, JsonValue, LogRecord } from '../../shared/types';
import { AcceptanceFilter } from './interfaces';

export const acceptAll: AcceptanceFilter = () => true;

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) {
    return true;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return (
      Array.isArray(a) &&
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, index) => jsonEquals(item, b[index]))
    );
  }
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  const keys = Object.keys(a);
  return (
    keys.length === Object.keys(b).length &&
    keys.every((key) => key in b && jsonEquals(a[key], b[key]))
  );
}

function fieldMatches(record: LogRecord, field: string, expected: JsonValue): boolean {
  return Object.prototype.hasOwnProperty.call(record, field) && jsonEquals(record[field], expected);
}

/**
 * Build a filter from config rules. A record passes when it matches every
 * `include` field and none of the `exclude` fields.
 */
export function createFieldFilter(rules: FieldFilterRules = {}): AcceptanceFilter {
  const include = Object.entries(rules.include ?? {});
  const exclude = Object.entries(rules.exclude ?? {});

  if (include.length === 0 && exclude.length === 0) {
    return acceptAll;
  }

  return (record) =>
    include.every(([field, value]) => fieldMatches(record, field, value)) &&
    !exclude.some(([field, value]) => fieldMatches(record, field, value));
}
