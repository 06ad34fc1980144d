// This test suite verifies reply correlation, timeouts, backpressure, and cancellation in the pending-response registry.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { PendingResponseRegistry } from '../src/transport/pending-registry.js';
import { captureAppError, silentLogger } from './helpers.js';

describe('pending response registry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves waiters in registration order under fifo pairing', async () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger() });
    const first = registry.register(1);
    const second = registry.register(2);
    const third = registry.register(3);

    expect([first.sequence, second.sequence, third.sequence]).toEqual([1, 2, 3]);
    expect(registry.pendingCount).toBe(3);

    // Fifo ignores the reply id and pairs strictly by position.
    expect(registry.deliver({ id: 'x', body: 'a' })).toBe(true);
    expect(registry.deliver({ id: 'y', body: 'b' })).toBe(true);
    expect(registry.deliver({ id: 'z', body: 'c' })).toBe(true);

    await expect(registry.awaitResolution(first)).resolves.toEqual({ kind: 'reply', body: 'a' });
    await expect(registry.awaitResolution(second)).resolves.toEqual({ kind: 'reply', body: 'b' });
    await expect(registry.awaitResolution(third)).resolves.toEqual({ kind: 'reply', body: 'c' });
    expect(registry.pendingCount).toBe(0);
  });

  it('drops a reply when nobody is waiting', () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger() });

    expect(registry.deliver({ id: 1, body: '{}' })).toBe(false);
    expect(registry.pendingCount).toBe(0);
  });

  it('keeps a timed-out waiter as an abandoned slot so later replies stay aligned', async () => {
    vi.useFakeTimers();
    const registry = new PendingResponseRegistry({ logger: silentLogger(), waiterTimeoutMs: 50 });

    const first = registry.register(1);
    vi.advanceTimersByTime(30);
    const second = registry.register(2);
    vi.advanceTimersByTime(20);

    await expect(registry.awaitResolution(first)).resolves.toEqual({ kind: 'timed_out', afterMs: 50 });
    expect(registry.pendingCount).toBe(2);

    expect(registry.deliver({ id: 1, body: 'late-first' })).toBe(false);
    expect(registry.deliver({ id: 2, body: 'second' })).toBe(true);
    await expect(registry.awaitResolution(second)).resolves.toEqual({ kind: 'reply', body: 'second' });
    expect(registry.pendingCount).toBe(0);
  });

  it('rejects registration beyond the pending cap', () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger(), maxPending: 2 });
    registry.register(1);
    registry.register(2);

    const error = captureAppError(() => registry.register(3));
    expect(error.statusCode).toBe(503);
    expect(error.code).toBe('too_many_pending');
    expect(registry.pendingCount).toBe(2);
  });

  it('cancels every unresolved waiter and refuses new ones afterwards', async () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger() });
    const first = registry.register(1);
    const second = registry.register(2);

    expect(registry.cancelAll('session_terminated')).toBe(2);
    expect(registry.isAccepting).toBe(false);
    expect(registry.pendingCount).toBe(0);

    await expect(registry.awaitResolution(first)).resolves.toEqual({ kind: 'cancelled', reason: 'session_terminated' });
    await expect(registry.awaitResolution(second)).resolves.toEqual({ kind: 'cancelled', reason: 'session_terminated' });

    const error = captureAppError(() => registry.register(3));
    expect(error.statusCode).toBe(410);
    expect(error.code).toBe('session_closed');
    expect(registry.deliver({ id: 1, body: 'late' })).toBe(false);
  });

  it('does not count abandoned slots as cancelled', async () => {
    vi.useFakeTimers();
    const registry = new PendingResponseRegistry({ logger: silentLogger(), waiterTimeoutMs: 10 });
    const first = registry.register(1);
    vi.advanceTimersByTime(10);
    const second = registry.register(2);

    expect(registry.cancelAll('server_shutdown')).toBe(1);
    await expect(registry.awaitResolution(first)).resolves.toEqual({ kind: 'timed_out', afterMs: 10 });
    await expect(registry.awaitResolution(second)).resolves.toEqual({ kind: 'cancelled', reason: 'server_shutdown' });
  });

  it('routes replies by id under id pairing', async () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger(), pairing: 'id' });
    const first = registry.register('a');
    const second = registry.register('b');

    expect(registry.deliver({ id: 'b', body: 'for-b' })).toBe(true);
    expect(registry.deliver({ id: 'missing', body: 'nobody' })).toBe(false);
    expect(registry.deliver({ id: 'a', body: 'for-a' })).toBe(true);

    await expect(registry.awaitResolution(first)).resolves.toEqual({ kind: 'reply', body: 'for-a' });
    await expect(registry.awaitResolution(second)).resolves.toEqual({ kind: 'reply', body: 'for-b' });
  });

  it('rejects a duplicate in-flight id under id pairing but keeps numbers and strings apart', () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger(), pairing: 'id' });
    registry.register(1);
    registry.register('1');

    const error = captureAppError(() => registry.register(1));
    expect(error.statusCode).toBe(409);
    expect(error.code).toBe('duplicate_request_id');
    expect(registry.pendingCount).toBe(2);
  });

  it('refuses handles it did not issue', () => {
    const registry = new PendingResponseRegistry({ logger: silentLogger() });

    const error = captureAppError(() => registry.awaitResolution({ sequence: 1, correlationId: 1 }));
    expect(error.code).toBe('unknown_waiter');
  });
});
