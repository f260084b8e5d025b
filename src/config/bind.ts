/**
 * Bind address parsing
 * Turns `ip://host:port` and `unix://path` strings into a TransportBinding.
 * Strings without a scheme are treated as `ip://`.
 */

import { isIP } from 'net';
import { TransportBinding } from '../shared/types';
import { ConfigurationError } from '../shared/errors';

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/(.*)$/s;
const BRACKETED_HOST = /^\[([^\]]*)\](?::(\d*))?$/;
const PLAIN_HOST = /^([^:[\]]*)(?::(\d*))?$/;

export const DEFAULT_SCHEME = 'ip';

export function parseBind(input: string): TransportBinding {
  const match = SCHEME_PATTERN.exec(input);
  const scheme = match ? match[1].toLowerCase() : DEFAULT_SCHEME;
  const rest = match ? match[2] : input;

  switch (scheme) {
    case 'ip':
      return parseIpBind(rest, input);
    case 'unix':
      if (rest === '') {
        throw new ConfigurationError(`No socket path in bind address: ${input}`, 'bind');
      }
      return { family: 'local', path: rest };
    default:
      throw new ConfigurationError(`Unsupported bind scheme '${scheme}': ${input}`, 'bind');
  }
}

function parseIpBind(authority: string, input: string): TransportBinding {
  const trimmed = authority.endsWith('/') ? authority.slice(0, -1) : authority;
  const parts = BRACKETED_HOST.exec(trimmed) ?? PLAIN_HOST.exec(trimmed);

  if (!parts) {
    throw new ConfigurationError(`Malformed ip bind address: ${input}`, 'bind');
  }

  const [, rawHost, rawPort] = parts;

  if (rawPort === undefined || rawPort === '') {
    throw new ConfigurationError(`No port for ip socket: ${input}`, 'bind');
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Port out of range in bind address: ${input}`, 'bind');
  }

  if (rawHost === '' || rawHost.toLowerCase() === 'localhost') {
    return { family: 'ipv4', host: '127.0.0.1', port };
  }

  const version = isIP(rawHost);
  if (version === 0) {
    throw new ConfigurationError(
      `Bind host must be an IP address or localhost, got '${rawHost}'`,
      'bind'
    );
  }

  return { family: version === 6 ? 'ipv6' : 'ipv4', host: rawHost, port };
}

export function formatBinding(binding: TransportBinding): string {
  if (binding.family === 'local') {
    return `unix://${binding.path}`;
  }
  const host = binding.family === 'ipv6' ? `[${binding.host}]` : binding.host;
  return `ip://${host}:${binding.port}`;
}
