// This module implements the streamable HTTP JSON-RPC endpoint that bridges each HTTP call to the session.

import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { McpSession } from '../transport/session.js';
import type { WaiterHandle } from '../transport/pending-registry.js';
import type { InboundMessage, JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { decodeJson, isJsonObject } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import { MCP_SERVER_NAME, MCP_SESSION_HEADER } from '../version.js';

export interface McpRouteDeps {
  session: McpSession;
  bodyLimitBytes: number;
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: {
      code,
      message,
      data
    }
  };
}

function hasOwn(value: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Decodes just enough of one envelope to classify it.
 *
 * A message with a method and an `id` key is a request (reply expected); with
 * a method and no `id` it is a notification; with an `id` and a result or
 * error but no method it is a client response. Anything else is rejected
 * before it can reach the registry or the processor.
 */
export function decodeInboundMessage(raw: string): InboundMessage {
  const decoded = decodeJson(raw);
  if (!decoded.ok) {
    throw new AppError(400, 'parse_error', 'Parse error: body is not valid JSON.', { reason: decoded.message });
  }

  const value = decoded.value;
  if (Array.isArray(value)) {
    throw new AppError(400, 'invalid_request', 'Batch requests are not supported; send one message per request.');
  }

  if (!isJsonObject(value)) {
    throw new AppError(400, 'invalid_request', 'JSON-RPC message must be an object.');
  }

  let id: JsonRpcId | undefined;
  if (hasOwn(value, 'id')) {
    const candidate = value.id;
    if (!isJsonRpcId(candidate)) {
      throw new AppError(400, 'invalid_request', 'JSON-RPC id must be a string, a number, or null.');
    }
    id = candidate;
  }

  const method = value.method;
  if (typeof method === 'string') {
    return id === undefined
      ? { kind: 'notification', method, payload: value }
      : { kind: 'request', id, method, payload: value };
  }

  if (id !== undefined && (hasOwn(value, 'result') || hasOwn(value, 'error'))) {
    return { kind: 'response', id, payload: value };
  }

  throw new AppError(400, 'invalid_request', 'JSON-RPC message must carry a method, or a result or error.');
}

// This helper maps transport-level failures onto JSON-RPC error codes.
function transportErrorCode(error: AppError): number {
  switch (error.code) {
    case 'parse_error':
      return -32700;
    case 'invalid_request':
    case 'duplicate_request_id':
      return -32600;
    case 'session_not_found':
    case 'request_timeout':
      return -32001;
    default:
      return -32000;
  }
}

function sendTransportError(reply: FastifyReply, id: JsonRpcId, error: AppError): void {
  reply.code(error.statusCode).send(rpcError(id, transportErrorCode(error), error.message, error.details));
}

// This helper rejects calls that name a different session than the one this server holds.
function rejectForeignSession(
  request: FastifyRequest,
  reply: FastifyReply,
  session: McpSession,
  logger: FastifyBaseLogger
): boolean {
  const claimed = request.headers[MCP_SESSION_HEADER];
  if (typeof claimed !== 'string' || claimed === session.id) {
    return false;
  }

  logger.warn(
    {
      event: 'mcp_session_mismatch',
      claimedSessionId: claimed
    },
    'mcp_session_mismatch'
  );
  sendTransportError(reply, null, new AppError(404, 'session_not_found', 'Session not found.'));
  return true;
}

// This function registers streamable HTTP MCP routes bound to one session.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  const { session, bodyLimitBytes } = deps;

  void fastify.register(async (scope) => {
    // Bodies of any content type, or none, stay raw strings under one limit so malformed JSON maps to a JSON-RPC parse error.
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser('*', { parseAs: 'string', bodyLimit: bodyLimitBytes }, (_request, body, done) => {
      done(null, body);
    });

    scope.addHook('onRequest', async (_request, reply) => {
      reply.header(MCP_SESSION_HEADER, session.id);
    });

    // Failures raised before a handler runs, such as an oversized body, still answer in JSON-RPC shape.
    scope.setErrorHandler((error, request, reply) => {
      const appError = normalizeError(error);
      request.log.warn(
        {
          event: 'mcp_transport_request_failed',
          code: appError.code,
          statusCode: appError.statusCode,
          error: errorForLog(error)
        },
        'mcp_transport_request_failed'
      );
      sendTransportError(reply, null, appError);
    });

    scope.get('/mcp', async (request) => {
      request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');

      return {
        name: MCP_SERVER_NAME,
        transport: 'streamable-http',
        endpoint: '/mcp',
        sessionId: session.id,
        state: session.state,
        methods: ['initialize', 'ping', 'tools/list', 'tools/call', 'resources/list', 'resources/read']
      };
    });

    scope.post('/mcp', { bodyLimit: bodyLimitBytes }, async (request: FastifyRequest, reply: FastifyReply) => {
      const requestLogger = request.log.child({ component: 'mcp', sessionId: session.id });

      if (rejectForeignSession(request, reply, session, requestLogger)) {
        return;
      }

      const raw = typeof request.body === 'string' ? request.body : '';
      let message: InboundMessage;
      try {
        message = decodeInboundMessage(raw);
      } catch (error) {
        const appError = normalizeError(error);
        requestLogger.warn(
          {
            event: 'mcp_post_rejected_malformed',
            code: appError.code,
            bodyLength: raw.length
          },
          'mcp_post_rejected_malformed'
        );
        sendTransportError(reply, null, appError);
        return;
      }

      const replyId: JsonRpcId = message.kind === 'notification' ? null : message.id;
      let handle: WaiterHandle | null;
      try {
        handle = session.submit(message);
      } catch (error) {
        const appError = normalizeError(error);
        requestLogger.warn(
          {
            event: 'mcp_post_rejected_by_session',
            code: appError.code,
            kind: message.kind,
            rpcRequestId: replyId
          },
          'mcp_post_rejected_by_session'
        );
        sendTransportError(reply, replyId, appError);
        return;
      }

      if (!handle) {
        requestLogger.info(
          {
            event: 'mcp_post_accepted_without_reply',
            kind: message.kind
          },
          'mcp_post_accepted_without_reply'
        );
        reply.code(202).send();
        return;
      }

      requestLogger.info(
        {
          event: 'mcp_post_request_waiting',
          sequence: handle.sequence,
          rpcRequestId: handle.correlationId
        },
        'mcp_post_request_waiting'
      );

      const outcome = await session.registry.awaitResolution(handle);
      switch (outcome.kind) {
        case 'reply':
          reply.code(200).type('application/json').send(outcome.body);
          return;
        case 'cancelled':
          sendTransportError(
            reply,
            handle.correlationId,
            new AppError(410, 'session_terminated', `Session terminated before a reply was produced (${outcome.reason}).`)
          );
          return;
        case 'timed_out':
          sendTransportError(
            reply,
            handle.correlationId,
            new AppError(504, 'request_timeout', `No reply within ${outcome.afterMs} ms.`)
          );
          return;
      }
    });

    scope.delete('/mcp', async (request, reply) => {
      if (rejectForeignSession(request, reply, session, request.log)) {
        return;
      }

      const result = session.close('session_terminated');
      reply.send({
        ok: true,
        sessionId: session.id,
        alreadyClosed: result.alreadyClosed,
        cancelled: result.cancelled
      });
    });
  });
}
