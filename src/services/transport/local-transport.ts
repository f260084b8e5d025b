/**
 * Local socket transport
 * Node has no Unix datagram sockets, so this listens on a stream socket at
 * the bound path and treats every newline-terminated line as one frame.
 */

import net from 'net';
import readline from 'readline';
import { FrameQueue, FrameQueueStats, FrameSource } from '../../queue/frame-queue';
import { TransportBinding } from '../../shared/types';
import { TransportError } from '../../shared/errors';
import { logger } from '../../shared/logger';
import { formatBinding } from '../../config/bind';
import { DEFAULT_MAX_FRAME_BYTES } from '../ingestion/decoder';
import {
  ConnectionStream,
  LocalServer,
  LocalServerFactory,
  LocalTransportOptions,
  Transport,
} from './interfaces';

type LocalBinding = Extract<TransportBinding, { family: 'local' }>;

const defaultServerFactory: LocalServerFactory = () => net.createServer();

export class LocalSocketTransport implements Transport {
  private queue: FrameQueue;
  private server: LocalServer | null = null;
  private connections = new Set<ConnectionStream>();
  private maxLineBytes: number;

  constructor(
    readonly binding: LocalBinding,
    options: LocalTransportOptions = {},
    private readonly createServer: LocalServerFactory = defaultServerFactory
  ) {
    this.queue = new FrameQueue(formatBinding(binding), options.queueCapacity);
    this.maxLineBytes = options.maxLineBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  get source(): FrameSource {
    return this.queue;
  }

  async bind(): Promise<void> {
    if (this.server) {
      throw new TransportError(`Transport ${formatBinding(this.binding)} is already bound`);
    }

    const server = this.createServer();
    this.server = server;
    server.on('connection', (stream: ConnectionStream) => this.handleConnection(stream));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.removeListener('listening', onListening);
        this.server = null;
        reject(new TransportError(`Cannot bind ${formatBinding(this.binding)}: ${error.message}`, error));
      };
      const onListening = () => {
        server.removeListener('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.binding.path);
    });

    server.on('error', (error: Error) => {
      logger.error(`Server error on ${formatBinding(this.binding)}`, { error: error.message });
      this.queue.fail(new TransportError(`Socket failed: ${error.message}`, error));
    });

    logger.info(`Listening for records on ${formatBinding(this.binding)}`);
  }

  private handleConnection(stream: ConnectionStream): void {
    this.connections.add(stream);

    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    lines.on('line', (line: string) => {
      if (line.trim() !== '') {
        this.queue.push(Buffer.from(line, 'utf-8'));
      }
    });

    // Bytes received since the last newline on this connection.
    let pendingBytes = 0;
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
      const newline = bytes.lastIndexOf(0x0a);
      pendingBytes = newline === -1 ? pendingBytes + bytes.length : bytes.length - newline - 1;

      if (pendingBytes > this.maxLineBytes) {
        logger.warn(
          `Closing connection on ${formatBinding(this.binding)}: line exceeds ${this.maxLineBytes} bytes`
        );
        stream.destroy();
      }
    });

    stream.on('error', (error: Error) => {
      logger.warn(`Connection error on ${formatBinding(this.binding)}`, { error: error.message });
    });
    stream.on('close', () => {
      this.connections.delete(stream);
      lines.close();
    });
  }

  async close(): Promise<void> {
    this.queue.close();
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    for (const stream of this.connections) {
      stream.destroy();
    }
    this.connections.clear();

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }

  getStats(): FrameQueueStats {
    return this.queue.getStats();
  }
}
