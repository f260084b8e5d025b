/**
 * Test Utilities
 * In-memory frame sources, a recording store and record fixtures.
 */

import { Frame, FrameQueueStats, FrameSource } from '../queue/frame-queue';
import { LogRecord, TransportBinding } from '../shared/types';
import { RecordStore } from './database/interfaces';
import { PreparedStatement } from './database/statement';
import { Transport } from './transport/interfaces';

export function frameOf(value: unknown): Frame {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

export function rawFrame(text: string): Frame {
  return Buffer.from(text, 'utf-8');
}

/**
 * Serves a fixed list of frames, then reports the source as closed.
 */
export class ArrayFrameSource implements FrameSource {
  private index = 0;

  constructor(private readonly frames: Frame[]) {}

  async next(): Promise<Frame | null> {
    if (this.index >= this.frames.length) {
      return null;
    }
    return this.frames[this.index++];
  }

  get consumed(): number {
    return this.index;
  }
}

/**
 * A transport over an ArrayFrameSource that never touches a socket.
 */
export class FakeTransport implements Transport {
  readonly binding: TransportBinding = { family: 'ipv4', host: '127.0.0.1', port: 9999 };
  readonly source: ArrayFrameSource;
  closed = false;

  constructor(frames: Frame[]) {
    this.source = new ArrayFrameSource(frames);
  }

  async bind(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }

  getStats(): FrameQueueStats {
    return { buffered: 0, received: this.source.consumed, dropped: 0, closed: this.closed };
  }
}

export type StoreCall =
  | { kind: 'execute'; statement: string; record: LogRecord }
  | { kind: 'executeMany'; statement: string; records: LogRecord[] };

export class RecordingStore implements RecordStore {
  readonly calls: StoreCall[] = [];
  readonly bootstrapped: string[] = [];
  closed = false;

  async bootstrap(statements: readonly string[]): Promise<void> {
    this.bootstrapped.push(...statements);
  }

  async execute(statement: PreparedStatement, record: LogRecord): Promise<void> {
    this.calls.push({ kind: 'execute', statement: statement.source, record });
  }

  async executeMany(statement: PreparedStatement, records: readonly LogRecord[]): Promise<void> {
    this.calls.push({ kind: 'executeMany', statement: statement.source, records: [...records] });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  batches(): LogRecord[][] {
    return this.calls.flatMap((call) => (call.kind === 'executeMany' ? [call.records] : []));
  }

  executedRecords(): LogRecord[] {
    return this.calls.flatMap((call) => (call.kind === 'execute' ? [call.record] : []));
  }
}

export function createLogRecord(seq: number, overrides: LogRecord = {}): LogRecord {
  return {
    seq,
    level: 'info',
    msg: `event ${seq}`,
    ...overrides,
  };
}
