/**
 * JSON text codec
 * Integers beyond Number.MAX_SAFE_INTEGER are kept exact as bigint; every
 * other number is a plain number.
 */

import { isInteger, isSafeNumber, parse, stringify } from 'lossless-json';

export function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number(text);
}

export function parseJson(text: string): unknown {
  return parse(text, undefined, parseNumber);
}

export function stringifyJson(value: unknown): string {
  const text = stringify(value);
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
  }
  return text;
}

/**
 * JSON.stringify replacer for values that may hold bigint.
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
