import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  loadConfig,
  parseListenAddress,
} from '../../src/infrastructure/config/index.js';

describe('parseListenAddress', () => {
  it('treats an empty host as all interfaces', () => {
    expect(parseListenAddress(':8080')).toEqual({ host: '0.0.0.0', port: 8080 });
  });

  it('keeps a named host', () => {
    expect(parseListenAddress('localhost:9000')).toEqual({ host: 'localhost', port: 9000 });
  });

  it('strips brackets from an IPv6 host', () => {
    expect(parseListenAddress('[::1]:8080')).toEqual({ host: '::1', port: 8080 });
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(parseListenAddress('127.0.0.1:0')).toEqual({ host: '127.0.0.1', port: 0 });
  });

  it.each([
    ['8080', 'missing port'],
    ['::1:8080', 'IPv6 host must be in brackets'],
    [':99999', 'invalid port'],
    [':http', 'invalid port'],
    ['localhost:', 'invalid port'],
  ])('rejects %s', (addr, reason) => {
    expect(() => parseListenAddress(addr)).toThrow(ConfigError);
    expect(() => parseListenAddress(addr)).toThrow(reason);
  });
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      listen: { host: '0.0.0.0', port: 8080 },
      logLevel: 'info',
    });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({ HTTP_ADDR: '', LOG_LEVEL: '' })).toEqual({
      listen: { host: '0.0.0.0', port: 8080 },
      logLevel: 'info',
    });
  });

  it('reads HTTP_ADDR and LOG_LEVEL', () => {
    expect(loadConfig({ HTTP_ADDR: '127.0.0.1:3000', LOG_LEVEL: 'debug' })).toEqual({
      listen: { host: '127.0.0.1', port: 3000 },
      logLevel: 'debug',
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });

  it('rejects a malformed HTTP_ADDR', () => {
    expect(() => loadConfig({ HTTP_ADDR: 'nowhere' })).toThrow(ConfigError);
  });
});
