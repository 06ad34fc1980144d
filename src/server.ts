// This module wires all HTTP routes, middleware behavior, and the session lifecycle.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { ServerConfig } from './config/env.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { runMessageLoop, type MessageProcessor } from './transport/message-loop.js';
import { McpSession } from './transport/session.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface CreateServerOptions {
  config: ServerConfig;
  processor: MessageProcessor;
  // Tests pass false to keep output quiet.
  logger?: boolean;
}

export interface ServerResources {
  app: FastifyInstance;
  session: McpSession;
  loop: Promise<void>;
}

// This map stores high-resolution request start times without widening Fastify request types.
const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

// This function builds and configures the full HTTP application around one MCP session.
export function createServer(options: CreateServerOptions): ServerResources {
  const { config, processor } = options;

  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(config.logLevel),
    bodyLimit: config.bodyLimitBytes
  });

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  const session = new McpSession({
    logger: app.log,
    maxPending: config.maxPending,
    waiterTimeoutMs: config.waiterTimeoutMs,
    pairing: config.pairing
  });
  session.open();

  const loop = runMessageLoop(session, processor, app.log).catch((error: unknown) => {
    app.log.error(
      {
        event: 'mcp_message_loop_crashed',
        sessionId: session.id,
        error: errorForLog(error)
      },
      'mcp_message_loop_crashed'
    );
  });

  // This endpoint exposes a lightweight liveness signal that does not touch the session.
  app.get('/health', async (_request, reply) => {
    app.log.debug({ event: 'health_check' }, 'health_check');
    reply.type('text/plain; charset=utf-8').send('OK');
  });

  // This endpoint exposes canonical server and protocol version metadata for external monitoring and debugging.
  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION
    };
  });

  registerMcpRoutes(app, {
    session,
    bodyLimitBytes: config.bodyLimitBytes
  });

  // This shutdown hook drains every parked request before the message loop is awaited.
  app.addHook('onClose', async () => {
    session.close('server_shutdown');
    await loop;
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(normalized.statusCode).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    session,
    loop
  };
}
