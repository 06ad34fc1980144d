// This module implements the MCP method dispatch that consumes decoded messages and produces encoded replies.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { CalendarStore } from '../db/database.js';
import type { MessageProcessor } from '../transport/message-loop.js';
import type { InboundMessage, JsonRpcId, JsonRpcResponse, McpResource, ProcessedReply } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isJsonObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { rpcError } from './protocol.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool, toolErrorResult } from './tools.js';

export interface CalendarMessageProcessorOptions {
  store: CalendarStore;
  now?: () => Date;
}

const RESOURCES: McpResource[] = [
  {
    uri: 'calendars://event-calendars',
    name: 'Event Calendars',
    description: 'List of all event calendars',
    mimeType: 'application/json'
  },
  {
    uri: 'calendars://reminder-lists',
    name: 'Reminder Lists',
    description: 'List of all reminder lists',
    mimeType: 'application/json'
  },
  {
    uri: 'calendars://sources',
    name: 'Calendar Sources',
    description: 'Calendar sources and how many calendars each holds',
    mimeType: 'application/json'
  }
];

// This helper maps internal application errors into JSON-RPC error code ranges.
function mapAppErrorToRpc(error: AppError): { code: number; message: string; data?: unknown } {
  if (error.code === 'validation_error' || error.code === 'invalid_params') {
    return { code: -32602, message: error.message, data: error.details };
  }

  if (error.code === 'method_not_found') {
    return { code: -32601, message: error.message };
  }

  if (error.statusCode >= 500) {
    return { code: -32603, message: error.message };
  }

  return { code: -32000, message: error.message, data: error.details };
}

function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// This processor answers MCP lifecycle, tool, and resource methods against the calendar store.
export class CalendarMessageProcessor implements MessageProcessor {
  private readonly store: CalendarStore;
  private readonly now?: () => Date;

  public constructor(options: CalendarMessageProcessorOptions) {
    this.store = options.store;
    this.now = options.now;
  }

  public async process(message: InboundMessage, logger: FastifyBaseLogger): Promise<ProcessedReply | null> {
    if (message.kind === 'response') {
      logger.debug(
        {
          event: 'mcp_client_response_ignored',
          rpcRequestId: message.id
        },
        'mcp_client_response_ignored'
      );
      return null;
    }

    if (message.kind === 'notification') {
      logger.info(
        {
          event: 'mcp_notification_received',
          method: message.method
        },
        'mcp_notification_received'
      );
      return null;
    }

    const response = await this.handleRequest(message.id, message.method, message.payload, logger);
    return {
      id: message.id,
      body: JSON.stringify(response)
    };
  }

  // This method handles one JSON-RPC request and always returns a response object, even on failure.
  private async handleRequest(
    requestId: JsonRpcId,
    method: string,
    payload: Record<string, unknown>,
    logger: FastifyBaseLogger
  ): Promise<JsonRpcResponse> {
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();

    logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method
      },
      'mcp_rpc_request_received'
    );

    try {
      if (payload.jsonrpc !== '2.0') {
        return rpcError(requestId, -32600, 'Invalid JSON-RPC request: jsonrpc must be "2.0".');
      }

      const rawParams = payload.params;
      if (rawParams !== undefined && !isJsonObject(rawParams)) {
        return rpcError(requestId, -32602, 'params must be an object when provided.');
      }

      const params: Record<string, unknown> = rawParams ?? {};

      switch (method) {
        case 'initialize': {
          return rpcResult(requestId, {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: {
              tools: {
                listChanged: false
              },
              resources: {
                subscribe: false,
                listChanged: false
              }
            },
            serverInfo: {
              name: MCP_SERVER_NAME,
              version: MCP_SERVER_VERSION
            }
          });
        }

        case 'ping': {
          return rpcResult(requestId, {});
        }

        case 'tools/list': {
          return rpcResult(requestId, { tools: buildToolList() });
        }

        case 'tools/call': {
          const name = params.name;
          if (typeof name !== 'string') {
            logger.warn(
              {
                event: 'mcp_tool_call_invalid_name',
                rpcTraceId,
                rpcRequestId: requestId,
                providedNameType: typeof name
              },
              'mcp_tool_call_invalid_name'
            );
            return rpcError(requestId, -32602, 'tools/call requires params.name as string.');
          }

          logger.info(
            {
              event: 'mcp_tool_call_requested',
              rpcTraceId,
              rpcRequestId: requestId,
              toolName: name,
              arguments: sanitizeForLog(params.arguments ?? {})
            },
            'mcp_tool_call_requested'
          );

          try {
            const result = await executeTool(name, params.arguments ?? {}, {
              store: this.store,
              logger,
              now: this.now
            });
            return rpcResult(requestId, result);
          } catch (error) {
            const appError = normalizeError(error);
            return rpcResult(requestId, toolErrorResult(appError.message));
          }
        }

        case 'resources/list': {
          return rpcResult(requestId, { resources: RESOURCES });
        }

        case 'resources/read': {
          const uri = params.uri;
          if (typeof uri !== 'string') {
            throw new AppError(400, 'invalid_params', 'resources/read requires params.uri as string.');
          }

          return rpcResult(requestId, {
            contents: [
              {
                uri,
                mimeType: 'application/json',
                text: JSON.stringify(this.readResource(uri), null, 2)
              }
            ]
          });
        }

        default:
          throw new AppError(404, 'method_not_found', `Unknown method: ${method}`);
      }
    } catch (error) {
      const appError = normalizeError(error);
      const mapped = mapAppErrorToRpc(appError);

      logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      return rpcError(requestId, mapped.code, mapped.message, mapped.data);
    } finally {
      logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  private readResource(uri: string): unknown {
    switch (uri) {
      case 'calendars://event-calendars':
        return this.store.listCalendars('event');
      case 'calendars://reminder-lists':
        return this.store.listCalendars('reminder');
      case 'calendars://sources':
        return this.store.listSources();
      default:
        throw new AppError(400, 'invalid_params', `Unknown resource URI: ${uri}`);
    }
  }
}
