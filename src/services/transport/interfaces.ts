/**
 * Transport Interfaces
 */

import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { FrameQueueStats, FrameSource } from '../../queue/frame-queue';
import { TransportBinding } from '../../shared/types';

export interface Transport {
  readonly binding: TransportBinding;
  readonly source: FrameSource;
  /** Resolves once listening; rejects with TransportError if the bind fails. */
  bind(): Promise<void>;
  close(): Promise<void>;
  getStats(): FrameQueueStats;
}

export interface TransportOptions {
  queueCapacity?: number;
}

export interface LocalTransportOptions extends TransportOptions {
  /** Longest unterminated line a connection may hold before it is closed. */
  maxLineBytes?: number;
}

/**
 * The part of a dgram socket the transport uses.
 */
export interface DatagramSocket extends EventEmitter {
  bind(port: number, address: string): unknown;
  close(callback?: () => void): unknown;
}

export type DatagramSocketFactory = (type: 'udp4' | 'udp6') => DatagramSocket;

/**
 * The part of a net server the transport uses. 'connection' listeners
 * receive a readable stream.
 */
export interface LocalServer extends EventEmitter {
  listen(path: string): unknown;
  close(callback?: () => void): unknown;
}

export type LocalServerFactory = () => LocalServer;

export type ConnectionStream = Readable;
