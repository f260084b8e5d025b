/**
 * UDP transport
 * Each received datagram is one frame.
 */

import dgram from 'dgram';
import { FrameQueue, FrameQueueStats, FrameSource } from '../../queue/frame-queue';
import { TransportBinding } from '../../shared/types';
import { TransportError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { formatBinding } from '../../config/bind';
import {
  DatagramSocket,
  DatagramSocketFactory,
  Transport,
  TransportOptions,
} from './interfaces';

type IpBinding = Extract<TransportBinding, { family: 'ipv4' | 'ipv6' }>;

const defaultSocketFactory: DatagramSocketFactory = (type) => dgram.createSocket(type);

export class DatagramTransport implements Transport {
  private queue: FrameQueue;
  private socket: DatagramSocket | null = null;

  constructor(
    readonly binding: IpBinding,
    options: TransportOptions = {},
    private readonly createSocket: DatagramSocketFactory = defaultSocketFactory
  ) {
    this.queue = new FrameQueue(formatBinding(binding), options.queueCapacity);
  }

  get source(): FrameSource {
    return this.queue;
  }

  async bind(): Promise<void> {
    if (this.socket) {
      throw new TransportError(`Transport ${formatBinding(this.binding)} is already bound`);
    }

    const socket = this.createSocket(this.binding.family === 'ipv6' ? 'udp6' : 'udp4');
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        socket.removeListener('listening', onListening);
        this.socket = null;
        reject(new TransportError(`Cannot bind ${formatBinding(this.binding)}: ${error.message}`, error));
      };
      const onListening = () => {
        socket.removeListener('error', onError);
        resolve();
      };
      socket.once('error', onError);
      socket.once('listening', onListening);
      socket.bind(this.binding.port, this.binding.host);
    });

    socket.on('message', (message: Buffer) => {
      this.queue.push(message);
    });
    socket.on('error', (error: Error) => {
      logger.error(`Socket error on ${formatBinding(this.binding)}`, { error: error.message });
      this.queue.fail(new TransportError(`Socket failed: ${error.message}`, error));
    });

    logger.info(`Listening for datagrams on ${formatBinding(this.binding)}`);
  }

  async close(): Promise<void> {
    this.queue.close();
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
  }

  getStats(): FrameQueueStats {
    return this.queue.getStats();
  }
}
