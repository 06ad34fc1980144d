// This test suite verifies that the message loop answers every request exactly once and stops when the stream ends.

import { describe, expect, it } from 'vitest';
import { runMessageLoop, type MessageProcessor } from '../src/transport/message-loop.js';
import { McpSession } from '../src/transport/session.js';
import type { InboundMessage } from '../src/types/mcp.js';
import { StubProcessor, silentLogger } from './helpers.js';

function openSession(): McpSession {
  const session = new McpSession({ logger: silentLogger() });
  session.open();
  return session;
}

function submitRequest(session: McpSession, id: number, method: string) {
  const handle = session.submit({ kind: 'request', id, method, payload: { id, method } });
  if (!handle) {
    throw new Error('Expected a waiter handle for a request.');
  }
  return handle;
}

describe('message loop', () => {
  it('delivers processor replies to the waiting callers in order', async () => {
    const session = openSession();
    const processor = new StubProcessor();
    const loop = runMessageLoop(session, processor, silentLogger());

    const first = submitRequest(session, 1, 'ping');
    session.submit({ kind: 'notification', method: 'notifications/initialized', payload: {} });
    const second = submitRequest(session, 2, 'tools/list');

    await expect(session.registry.awaitResolution(first)).resolves.toEqual({
      kind: 'reply',
      body: '{"id":1,"result":"pong"}'
    });
    await expect(session.registry.awaitResolution(second)).resolves.toEqual({
      kind: 'reply',
      body: '{"id":2,"result":"tools/list"}'
    });

    session.close('test_done');
    await loop;
    expect(processor.seen.map((message) => message.kind)).toEqual(['request', 'notification', 'request']);
  });

  it('answers with an internal error when the processor throws', async () => {
    const session = openSession();
    const failing: MessageProcessor = {
      process: async () => {
        throw new Error('boom');
      }
    };
    const loop = runMessageLoop(session, failing, silentLogger());

    const handle = submitRequest(session, 3, 'ping');
    await expect(session.registry.awaitResolution(handle)).resolves.toEqual({
      kind: 'reply',
      body: '{"jsonrpc":"2.0","id":3,"error":{"code":-32603,"message":"Internal error while processing request."}}'
    });

    session.close('test_done');
    await loop;
  });

  it('answers with an internal error when a request gets no reply', async () => {
    const session = openSession();
    const silent: MessageProcessor = {
      process: async (_message: InboundMessage) => null
    };
    const loop = runMessageLoop(session, silent, silentLogger());

    const handle = submitRequest(session, 3, 'ping');
    await expect(session.registry.awaitResolution(handle)).resolves.toEqual({
      kind: 'reply',
      body: '{"jsonrpc":"2.0","id":3,"error":{"code":-32603,"message":"Request produced no reply."}}'
    });

    session.close('test_done');
    await loop;
  });

  it('finishes after close once buffered messages are drained', async () => {
    const session = openSession();
    const processor = new StubProcessor();
    session.submit({ kind: 'notification', method: 'notifications/initialized', payload: {} });
    session.close('test_done');

    await runMessageLoop(session, processor, silentLogger());
    expect(processor.seen).toHaveLength(1);
  });
});
