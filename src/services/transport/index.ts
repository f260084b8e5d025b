/**
 * Transport Module
 */

import { TransportBinding } from '../../shared/types';
import { DatagramTransport } from './datagram-transport';
import { LocalSocketTransport } from './local-transport';
import { LocalTransportOptions, Transport } from './interfaces';

/**
 * `maxLineBytes` applies to local bindings only; a datagram is already one
 * bounded frame.
 */
export function createTransport(binding: TransportBinding, options: LocalTransportOptions = {}): Transport {
  if (binding.family === 'local') {
    return new LocalSocketTransport(binding, options);
  }
  return new DatagramTransport(binding, { queueCapacity: options.queueCapacity });
}

export { DatagramTransport, LocalSocketTransport };
export * from './interfaces';
