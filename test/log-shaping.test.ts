// This test suite verifies how tool arguments and errors are shaped before they reach the log.

import { describe, expect, it } from 'vitest';
import { AppError } from '../src/utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from '../src/utils/logger.js';

describe('log shaping', () => {
  it('logs only the length of free-text notes', () => {
    expect(sanitizeForLog({ title: 'Call', notes: 'private text' })).toEqual({
      title: 'Call',
      notes: '[text:12 chars]'
    });
  });

  it('bounds long strings, long lists and deep nesting', () => {
    expect(sanitizeForLog('x'.repeat(600))).toBe(`${'x'.repeat(512)}...[+88 chars]`);

    const list = sanitizeForLog(Array.from({ length: 25 }, (_, index) => index));
    expect(Array.isArray(list) ? list.slice(-2) : list).toEqual([19, '[+5 items]']);

    expect(sanitizeForLog({ a: { b: { c: { d: { e: { f: 1 } } } } } })).toEqual({
      a: { b: { c: { d: { e: '[nested]' } } } }
    });
  });

  it('keeps the application error code', () => {
    expect(errorForLog(new AppError(404, 'event_not_found', 'Event evt-1 not found.'))).toMatchObject({
      name: 'AppError',
      message: 'Event evt-1 not found.',
      code: 'event_not_found'
    });
    expect(errorForLog('boom')).toEqual({ message: 'boom' });
  });

  it('drops forwarded credentials from request logs', () => {
    expect(buildLoggerOptions('debug')).toMatchObject({
      level: 'debug',
      base: { service: 'calendar-mcp' },
      redact: { paths: ['req.headers.authorization', 'req.headers.cookie'], remove: true }
    });
  });
});
