// This test suite verifies environment parsing and defaults for the server configuration.

import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadServerConfig } from '../src/config/env.js';
import { captureAppError } from './helpers.js';

describe('server config', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadServerConfig({})).toEqual({
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'info',
      dataDir: './data',
      dbPath: join('./data', 'calendar.db'),
      bodyLimitBytes: 1_048_576,
      maxPending: 256,
      waiterTimeoutMs: 120_000,
      pairing: 'fifo'
    });
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadServerConfig({
      HOST: '0.0.0.0',
      PORT: '9000',
      LOG_LEVEL: 'debug',
      DATA_DIR: '/srv/calendar',
      MCP_BODY_LIMIT_BYTES: '',
      MCP_WAITER_TIMEOUT_MS: '0',
      MCP_CORRELATION: 'id'
    });

    expect(config).toMatchObject({
      host: '0.0.0.0',
      port: 9000,
      logLevel: 'debug',
      dbPath: join('/srv/calendar', 'calendar.db'),
      bodyLimitBytes: 1_048_576,
      waiterTimeoutMs: 0,
      pairing: 'id'
    });
  });

  it('prefers an explicit database path', () => {
    expect(loadServerConfig({ STATE_DB_PATH: '/tmp/other.db' }).dbPath).toBe('/tmp/other.db');
  });

  it('rejects invalid values', () => {
    const badPort = captureAppError(() => loadServerConfig({ PORT: 'eighty' }));
    expect(badPort.statusCode).toBe(500);
    expect(badPort.code).toBe('invalid_config');
    expect(badPort.details).toHaveProperty('PORT');

    expect(captureAppError(() => loadServerConfig({ MCP_CORRELATION: 'random' })).code).toBe('invalid_config');
    expect(captureAppError(() => loadServerConfig({ MCP_MAX_PENDING: '0' })).code).toBe('invalid_config');
  });
});
