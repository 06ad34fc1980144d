// This test suite verifies the session state machine and the register-then-publish step.

import { describe, expect, it } from 'vitest';
import { McpSession } from '../src/transport/session.js';
import { captureAppError, silentLogger } from './helpers.js';

function openSession(): McpSession {
  const session = new McpSession({ logger: silentLogger() });
  session.open();
  return session;
}

describe('mcp session', () => {
  it('exposes its id only once opened', () => {
    const session = new McpSession({ logger: silentLogger() });
    expect(session.state).toBe('new');
    expect(captureAppError(() => session.id).code).toBe('session_not_opened');

    const id = session.open();
    expect(session.id).toBe(id);
    expect(session.state).toBe('open');
    expect(captureAppError(() => session.open()).code).toBe('session_already_opened');
  });

  it('registers a waiter and publishes a request in one step', async () => {
    const session = openSession();
    const handle = session.submit({ kind: 'request', id: 5, method: 'ping', payload: { id: 5, method: 'ping' } });

    expect(handle?.correlationId).toBe(5);
    expect(session.registry.pendingCount).toBe(1);
    await expect(session.inbound.next()).resolves.toEqual({
      kind: 'request',
      id: 5,
      method: 'ping',
      payload: { id: 5, method: 'ping' }
    });
  });

  it('publishes notifications and responses without a waiter', () => {
    const session = openSession();

    expect(session.submit({ kind: 'notification', method: 'notifications/initialized', payload: {} })).toBeNull();
    expect(session.submit({ kind: 'response', id: 9, payload: { id: 9, result: {} } })).toBeNull();
    expect(session.registry.pendingCount).toBe(0);
    expect(session.inbound.bufferedCount).toBe(2);
  });

  it('drains pending waiters on close and treats later closes as no-ops', async () => {
    const session = openSession();
    const first = session.submit({ kind: 'request', id: 1, method: 'ping', payload: {} });
    const second = session.submit({ kind: 'request', id: 2, method: 'ping', payload: {} });
    if (!first || !second) {
      throw new Error('Expected waiter handles for requests.');
    }

    expect(session.close('session_terminated')).toEqual({ alreadyClosed: false, cancelled: 2 });
    expect(session.state).toBe('closed');
    expect(session.inbound.isFinished).toBe(true);
    await expect(session.registry.awaitResolution(first)).resolves.toEqual({
      kind: 'cancelled',
      reason: 'session_terminated'
    });
    await expect(session.registry.awaitResolution(second)).resolves.toEqual({
      kind: 'cancelled',
      reason: 'session_terminated'
    });

    expect(session.close('session_terminated')).toEqual({ alreadyClosed: true, cancelled: 0 });
  });

  it('refuses submissions after close', () => {
    const session = openSession();
    session.close('session_terminated');

    const error = captureAppError(() => session.submit({ kind: 'request', id: 1, method: 'ping', payload: {} }));
    expect(error.statusCode).toBe(410);
    expect(error.code).toBe('session_closed');
  });

  it('enforces lifecycle transitions', () => {
    const session = openSession();
    expect(captureAppError(() => session.finalize()).code).toBe('invalid_session_transition');

    session.submit({ kind: 'request', id: 1, method: 'ping', payload: {} });
    session.beginClose();
    expect(session.state).toBe('closing');
    expect(captureAppError(() => session.finalize()).code).toBe('session_not_drained');
  });
});
