/**
 * Bounded FIFO frame queue
 * Sits between a socket's event callbacks and the collector's pull loop.
 * Frames that arrive while the queue is full are dropped; senders get no
 * back-pressure.
 */

import { EventEmitter } from 'events';
import { logger } from '../shared/logger';

export type Frame = Buffer;

/**
 * Pull side of a transport. `next()` resolves with `null` once the source
 * has been closed.
 */
export interface FrameSource {
  next(): Promise<Frame | null>;
}

interface PendingReader {
  resolve: (frame: Frame | null) => void;
  reject: (error: Error) => void;
}

export interface FrameQueueStats {
  buffered: number;
  received: number;
  dropped: number;
  closed: boolean;
}

export class FrameQueue extends EventEmitter implements FrameSource {
  private frames: Frame[] = [];
  private waiting: PendingReader[] = [];
  private failure: Error | null = null;
  private received = 0;
  private dropped = 0;
  private closed = false;

  constructor(public readonly name: string, private readonly capacity: number = 1024) {
    super();
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Offer a frame. Returns false if it was dropped.
   */
  push(frame: Frame): boolean {
    if (this.closed) {
      return false;
    }

    this.received++;

    const reader = this.waiting.shift();
    if (reader) {
      reader.resolve(frame);
      return true;
    }

    if (this.frames.length >= this.capacity) {
      this.dropped++;
      this.emit('frame-dropped', frame);
      if (this.dropped === 1 || this.dropped % 1000 === 0) {
        logger.warn(`Queue ${this.name} is full, ${this.dropped} frames dropped so far`);
      }
      return false;
    }

    this.frames.push(frame);
    return true;
  }

  next(): Promise<Frame | null> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  /**
   * Stop accepting frames, discard anything buffered and release waiting readers.
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    const discarded = this.frames.length;
    this.frames.length = 0;

    for (const reader of this.waiting.splice(0)) {
      reader.resolve(null);
    }

    if (discarded > 0) {
      logger.debug(`Queue ${this.name} closed with ${discarded} unread frames`);
    }
    this.emit('closed');
  }

  /**
   * Close the queue because the underlying socket failed. Waiting and later
   * readers get the error instead of `null`.
   */
  fail(error: Error): void {
    if (this.closed) {
      return;
    }

    this.failure = error;
    this.closed = true;
    this.frames.length = 0;

    for (const reader of this.waiting.splice(0)) {
      reader.reject(error);
    }
    this.emit('closed', error);
  }

  isClosed(): boolean {
    return this.closed;
  }

  getStats(): FrameQueueStats {
    return {
      buffered: this.frames.length,
      received: this.received,
      dropped: this.dropped,
      closed: this.closed,
    };
  }
}
