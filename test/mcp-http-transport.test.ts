// This test suite verifies the streamable HTTP endpoint end to end through Fastify inject with a stub processor.

import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ServerConfig } from '../src/config/env.js';
import { createServer } from '../src/server.js';
import type { McpSession } from '../src/transport/session.js';
import { StubProcessor, testConfig } from './helpers.js';

const JSON_HEADERS = { 'content-type': 'application/json' };

describe('mcp http transport', () => {
  let app: FastifyInstance;
  let session: McpSession;
  let processor: StubProcessor;

  function start(overrides: Partial<ServerConfig> = {}): void {
    processor = new StubProcessor();
    const resources = createServer({ config: testConfig(overrides), processor, logger: false });
    app = resources.app;
    session = resources.session;
  }

  function post(payload: string, headers: Record<string, string> = {}) {
    return app.inject({
      method: 'POST',
      url: '/mcp',
      headers: { ...JSON_HEADERS, ...headers },
      payload
    });
  }

  beforeEach(async () => {
    start();
    await app.ready();
  });

  afterEach(async () => {
    processor.release();
    await app.close();
  });

  it('round-trips a ping and tags the response with the session id', async () => {
    const response = await post('{"id":1,"method":"ping"}');

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('application/json');
    expect(response.headers['mcp-session-id']).toBe(session.id);
    expect(response.body).toBe('{"id":1,"result":"pong"}');
  });

  it('accepts a notification with 202 even while the processor is busy', async () => {
    processor.hold();
    const response = await post('{"jsonrpc":"2.0","method":"notifications/initialized"}');

    expect(response.statusCode).toBe(202);
    expect(response.body).toBe('');
    expect(response.headers['mcp-session-id']).toBe(session.id);
    expect(session.registry.pendingCount).toBe(0);
  });

  it('accepts a client response with 202', async () => {
    const response = await post('{"jsonrpc":"2.0","id":"srv-1","result":{}}');

    expect(response.statusCode).toBe(202);
    expect(session.registry.pendingCount).toBe(0);
  });

  it('pairs concurrent requests with their own replies in arrival order', async () => {
    processor.hold();
    const first = post('{"id":1,"method":"first"}');
    await vi.waitFor(() => {
      expect(session.registry.pendingCount).toBe(1);
    });
    const second = post('{"id":2,"method":"second"}');
    await vi.waitFor(() => {
      expect(session.registry.pendingCount).toBe(2);
    });

    processor.release();
    const [firstResponse, secondResponse] = await Promise.all([first, second]);

    expect(firstResponse.body).toBe('{"id":1,"result":"first"}');
    expect(secondResponse.body).toBe('{"id":2,"result":"second"}');
  });

  it('terminates the session and answers every parked request with 410', async () => {
    processor.hold();
    const first = post('{"id":1,"method":"ping"}');
    const second = post('{"id":2,"method":"ping"}');
    await vi.waitFor(() => {
      expect(session.registry.pendingCount).toBe(2);
    });

    const terminated = await app.inject({ method: 'DELETE', url: '/mcp' });
    expect(terminated.statusCode).toBe(200);
    expect(terminated.json()).toEqual({ ok: true, sessionId: session.id, alreadyClosed: false, cancelled: 2 });

    const [firstResponse, secondResponse] = await Promise.all([first, second]);
    expect(firstResponse.statusCode).toBe(410);
    expect(firstResponse.json().id).toBe(1);
    expect(firstResponse.json().error.code).toBe(-32000);
    expect(secondResponse.statusCode).toBe(410);
    expect(secondResponse.json().id).toBe(2);
  });

  it('treats a repeated DELETE as a successful no-op', async () => {
    await app.inject({ method: 'DELETE', url: '/mcp' });
    const again = await app.inject({ method: 'DELETE', url: '/mcp' });

    expect(again.statusCode).toBe(200);
    expect(again.json()).toEqual({ ok: true, sessionId: session.id, alreadyClosed: true, cancelled: 0 });
  });

  it('refuses new requests after the session is terminated', async () => {
    await app.inject({ method: 'DELETE', url: '/mcp' });
    const response = await post('{"id":7,"method":"ping"}');

    expect(response.statusCode).toBe(410);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: { code: -32000, message: 'Session has been terminated.' }
    });
    expect(processor.seen).toHaveLength(0);
  });

  it('rejects an oversized body before it is registered or processed', async () => {
    await app.close();
    start({ bodyLimitBytes: 64 });
    await app.ready();

    const payload = JSON.stringify({ id: 1, method: 'ping', params: { padding: 'x'.repeat(200) } });
    const response = await post(payload);

    expect(response.statusCode).toBe(413);
    expect(response.headers['mcp-session-id']).toBe(session.id);
    expect(response.json().error.code).toBe(-32000);
    expect(session.registry.pendingCount).toBe(0);
    expect(processor.seen).toHaveLength(0);
  });

  it('answers malformed JSON with a parse error', async () => {
    const response = await post('{"id":1,');

    expect(response.statusCode).toBe(400);
    expect(response.json().id).toBeNull();
    expect(response.json().error.code).toBe(-32700);
    expect(processor.seen).toHaveLength(0);
  });

  it('rejects batches and unclassifiable messages as invalid requests', async () => {
    const batch = await post('[{"id":1,"method":"ping"}]');
    expect(batch.statusCode).toBe(400);
    expect(batch.json().error.code).toBe(-32600);

    const unclassifiable = await post('{"id":1}');
    expect(unclassifiable.statusCode).toBe(400);
    expect(unclassifiable.json().error.code).toBe(-32600);

    const badId = await post('{"id":{"nested":true},"method":"ping"}');
    expect(badId.statusCode).toBe(400);
    expect(badId.json().error.code).toBe(-32600);
  });

  it('rejects a session header that names another session', async () => {
    const response = await post('{"id":1,"method":"ping"}', { 'mcp-session-id': 'other-session' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe(-32001);
    expect(processor.seen).toHaveLength(0);
  });

  it('accepts a session header that matches', async () => {
    const response = await post('{"id":1,"method":"ping"}', { 'mcp-session-id': session.id });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"id":1,"result":"pong"}');
  });

  it('answers 503 when too many requests are parked', async () => {
    await app.close();
    start({ maxPending: 1 });
    await app.ready();
    processor.hold();

    const first = post('{"id":1,"method":"ping"}');
    await vi.waitFor(() => {
      expect(session.registry.pendingCount).toBe(1);
    });

    const rejected = await post('{"id":2,"method":"ping"}');
    expect(rejected.statusCode).toBe(503);
    expect(rejected.json().id).toBe(2);

    processor.release();
    expect((await first).body).toBe('{"id":1,"result":"pong"}');
  });

  it('answers 504 when a request outlives the waiter timeout', async () => {
    await app.close();
    start({ waiterTimeoutMs: 50 });
    await app.ready();
    processor.hold();

    const response = await post('{"id":"slow","method":"ping"}');
    expect(response.statusCode).toBe(504);
    expect(response.json().id).toBe('slow');
    expect(response.json().error.code).toBe(-32001);
  });

  it('describes the transport on GET /mcp', async () => {
    const response = await app.inject({ method: 'GET', url: '/mcp' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ transport: 'streamable-http', sessionId: session.id, state: 'open' });
  });

  it('serves health as plain text without touching the session', async () => {
    processor.hold();
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.body).toBe('OK');
    expect(response.headers['mcp-session-id']).toBeUndefined();
  });

  it('reads the body when the content type is missing or not JSON', async () => {
    const bare = await app.inject({ method: 'POST', url: '/mcp', payload: '{"id":1,"method":"ping"}' });
    expect(bare.statusCode).toBe(200);
    expect(bare.body).toBe('{"id":1,"result":"pong"}');

    const plain = await post('{"id":2,"method":"ping"}', { 'content-type': 'text/plain' });
    expect(plain.statusCode).toBe(200);
    expect(plain.body).toBe('{"id":2,"result":"pong"}');
  });

  it('applies the body limit to bodies without a JSON content type', async () => {
    await app.close();
    start({ bodyLimitBytes: 64 });
    await app.ready();

    const payload = JSON.stringify({ id: 1, method: 'ping', params: { padding: 'x'.repeat(200) } });
    const response = await post(payload, { 'content-type': 'text/plain' });

    expect(response.statusCode).toBe(413);
    expect(processor.seen).toHaveLength(0);
  });
});

describe('mcp http transport shutdown', () => {
  it('cancels parked requests when the server closes', async () => {
    const processor = new StubProcessor();
    const { app, session } = createServer({ config: testConfig(), processor, logger: false });
    await app.ready();
    processor.hold();

    session.submit({ kind: 'request', id: 1, method: 'ping', payload: {} });
    const parked = session.submit({ kind: 'request', id: 2, method: 'ping', payload: {} });
    if (!parked) {
      throw new Error('Expected a waiter handle for a request.');
    }

    const closing = app.close();
    await expect(session.registry.awaitResolution(parked)).resolves.toEqual({
      kind: 'cancelled',
      reason: 'server_shutdown'
    });

    processor.release();
    await closing;
    expect(session.state).toBe('closed');
  });
});
