import { formatBinding, parseBind } from '../bind';
import { ConfigurationError } from '../../shared/errors';

describe('parseBind', () => {
  describe('ip scheme', () => {
    it('should resolve localhost to the IPv4 loopback address', () => {
      expect(parseBind('ip://localhost:9999')).toEqual({ family: 'ipv4', host: '127.0.0.1', port: 9999 });
    });

    it('should resolve an empty host to the IPv4 loopback address', () => {
      expect(parseBind('ip://:5140')).toEqual({ family: 'ipv4', host: '127.0.0.1', port: 5140 });
    });

    it('should keep an IPv4 literal', () => {
      expect(parseBind('ip://0.0.0.0:5140')).toEqual({ family: 'ipv4', host: '0.0.0.0', port: 5140 });
    });

    it('should parse a bracketed IPv6 literal', () => {
      expect(parseBind('ip://[::1]:5140')).toEqual({ family: 'ipv6', host: '::1', port: 5140 });
    });

    it('should treat an address without a scheme as ip', () => {
      expect(parseBind('10.0.0.5:7000')).toEqual({ family: 'ipv4', host: '10.0.0.5', port: 7000 });
    });

    it('should accept an upper-case scheme and a trailing slash', () => {
      expect(parseBind('IP://127.0.0.1:9999/')).toEqual({ family: 'ipv4', host: '127.0.0.1', port: 9999 });
    });

    it('should reject an address with no port', () => {
      expect(() => parseBind('ip://host-with-no-port')).toThrow(ConfigurationError);
      expect(() => parseBind('ip://host-with-no-port')).toThrow('No port for ip socket: ip://host-with-no-port');
      expect(() => parseBind('ip://127.0.0.1:')).toThrow('No port for ip socket');
    });

    it('should reject a port out of range', () => {
      expect(() => parseBind('ip://127.0.0.1:65536')).toThrow(
        'Port out of range in bind address: ip://127.0.0.1:65536'
      );
    });

    it('should reject a host name that is not an IP address', () => {
      expect(() => parseBind('ip://logs.internal:9999')).toThrow(
        "Bind host must be an IP address or localhost, got 'logs.internal'"
      );
    });

    it('should reject an unbracketed IPv6 address', () => {
      expect(() => parseBind('ip://::1:9999')).toThrow('Malformed ip bind address: ip://::1:9999');
    });
  });

  describe('unix scheme', () => {
    it('should resolve to a local path binding', () => {
      expect(parseBind('unix:///tmp/sock')).toEqual({ family: 'local', path: '/tmp/sock' });
    });

    it('should keep a relative path', () => {
      expect(parseBind('unix://run/collector.sock')).toEqual({ family: 'local', path: 'run/collector.sock' });
    });

    it('should reject an empty path', () => {
      expect(() => parseBind('unix://')).toThrow('No socket path in bind address: unix://');
    });
  });

  it('should reject an unsupported scheme', () => {
    expect(() => parseBind('ftp://example.org/logs')).toThrow(
      "Unsupported bind scheme 'ftp': ftp://example.org/logs"
    );
  });

  it('should tag errors with the bind field', () => {
    let caught: unknown;
    try {
      parseBind('ftp://example.org');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ field: 'bind', code: 'CONFIGURATION' });
  });
});

describe('formatBinding', () => {
  it('should format each binding family', () => {
    expect(formatBinding({ family: 'ipv4', host: '127.0.0.1', port: 9999 })).toBe('ip://127.0.0.1:9999');
    expect(formatBinding({ family: 'ipv6', host: '::1', port: 9999 })).toBe('ip://[::1]:9999');
    expect(formatBinding({ family: 'local', path: '/tmp/sock' })).toBe('unix:///tmp/sock');
  });

  it('should produce an address that parses back to the same binding', () => {
    const binding = parseBind('ip://[fe80::1]:5140');

    expect(parseBind(formatBinding(binding))).toEqual(binding);
  });
});
