/**
 * Record Decoder
 * Parses one transport frame into a LogRecord. Failures are returned, not thrown.
 */

import { TextDecoder } from 'util';
import { LogRecord, isLogRecord } from '../../shared/types';
import { parseJson, stringifyJson } from '../../shared/json';
import { DecodeResult } from './interfaces';

export const DEFAULT_MAX_FRAME_BYTES = 4096;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface DecodeOptions {
  maxFrameBytes?: number;
}

export function decodeFrame(frame: Buffer, options: DecodeOptions = {}): DecodeResult {
  const maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  if (frame.length > maxFrameBytes) {
    return { ok: false, reason: 'oversized' };
  }

  let text: string;
  try {
    text = utf8.decode(frame);
  } catch {
    return { ok: false, reason: 'invalid-utf8' };
  }

  let payload: unknown;
  try {
    payload = parseJson(text);
  } catch {
    return { ok: false, reason: 'malformed-json' };
  }

  if (!isLogRecord(payload)) {
    return { ok: false, reason: 'not-an-object' };
  }

  return { ok: true, record: payload };
}

export function encodeRecord(record: LogRecord): Buffer {
  return Buffer.from(stringifyJson(record), 'utf-8');
}
