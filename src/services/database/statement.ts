/**
 * Named-parameter statements
 * Configured statements name their parameters `:field`. PostgreSQL only
 * takes positional `$n`, so each statement is rewritten once and its
 * parameters are bound from the merged record on every execution.
 */

import { JsonValue, LogRecord } from '../../shared/types';
import { StoreError } from '../../shared/errors';
import { stringifyJson } from '../../shared/json';

export interface PreparedStatement {
  source: string;
  text: string;
  parameters: string[];
}

export type ParameterValue = string | number | boolean | null;

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

export function prepareStatement(source: string): PreparedStatement {
  const parameters: string[] = [];
  const positions = new Map<string, number>();
  let text = '';
  let i = 0;

  while (i < source.length) {
    const char = source[i];

    // Literal regions are copied untouched.
    const skipTo = findVerbatimEnd(source, i);
    if (skipTo > i) {
      text += source.slice(i, skipTo);
      i = skipTo;
      continue;
    }

    if (char === ':' && source[i + 1] === ':') {
      text += '::';
      i += 2;
      continue;
    }

    if (char === ':' && IDENTIFIER_START.test(source[i + 1] ?? '')) {
      let j = i + 1;
      while (j < source.length && IDENTIFIER_PART.test(source[j])) {
        j++;
      }
      const name = source.slice(i + 1, j);
      let position = positions.get(name);
      if (position === undefined) {
        parameters.push(name);
        position = parameters.length;
        positions.set(name, position);
      }
      text += `$${position}`;
      i = j;
      continue;
    }

    text += char;
    i++;
  }

  return { source, text, parameters };
}

const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

/**
 * End of the quoted, commented or dollar-quoted region starting at `start`,
 * or `start` itself when none starts there. Unterminated regions run to the
 * end of the statement.
 */
function findVerbatimEnd(source: string, start: number): number {
  const char = source[start];
  if (char === "'" || char === '"') {
    return findClosingQuote(source, start, char);
  }
  if (char === '-' && source[start + 1] === '-') {
    const newline = source.indexOf('\n', start + 2);
    return newline === -1 ? source.length : newline;
  }
  if (char === '/' && source[start + 1] === '*') {
    return findBlockCommentEnd(source, start);
  }
  if (char === '$') {
    const tag = DOLLAR_TAG.exec(source.slice(start))?.[0];
    if (tag) {
      const close = source.indexOf(tag, start + tag.length);
      return close === -1 ? source.length : close + tag.length;
    }
  }
  return start;
}

// Block comments nest.
function findBlockCommentEnd(source: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < source.length) {
    if (source[i] === '/' && source[i + 1] === '*') {
      depth++;
      i += 2;
    } else if (source[i] === '*' && source[i + 1] === '/') {
      depth--;
      i += 2;
      if (depth === 0) {
        return i;
      }
    } else {
      i++;
    }
  }
  return source.length;
}

function findClosingQuote(source: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < source.length) {
    if (source[i] === quote) {
      // A doubled quote is an escaped quote.
      if (source[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return source.length;
}

export function toParameterValue(value: JsonValue): ParameterValue {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  return stringifyJson(value);
}

export function bindParameters(statement: PreparedStatement, record: LogRecord): ParameterValue[] {
  return statement.parameters.map((name) => {
    if (!Object.prototype.hasOwnProperty.call(record, name)) {
      throw new StoreError(
        `No value supplied for parameter :${name}`,
        statement.source
      );
    }
    return toParameterValue(record[name]);
  });
}
