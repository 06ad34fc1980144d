// This module runs the message processor as the single sequential consumer of a session's inbound stream.

import type { FastifyBaseLogger } from 'fastify';
import type { InboundMessage, JsonRpcId, ProcessedReply } from '../types/mcp.js';
import { errorForLog } from '../utils/logger.js';
import type { McpSession } from './session.js';

export interface MessageProcessor {
  // Must resolve to exactly one reply per request and null for notifications and responses.
  process(message: InboundMessage, logger: FastifyBaseLogger): Promise<ProcessedReply | null>;
}

// This helper builds a JSON-RPC internal error so the reply order stays aligned with the waiter order.
function internalErrorReply(id: JsonRpcId, message: string): ProcessedReply {
  return {
    id,
    body: JSON.stringify({
      jsonrpc: '2.0',
      id,
      error: {
        code: -32603,
        message
      }
    })
  };
}

/**
 * Consumes the session's inbound stream one message at a time until it is finished.
 *
 * Each `process` call is awaited before the next message is read; FIFO
 * pairing in the registry depends on it.
 */
export async function runMessageLoop(
  session: McpSession,
  processor: MessageProcessor,
  logger: FastifyBaseLogger
): Promise<void> {
  const loopLogger = logger.child({ component: 'mcp_message_loop' });
  loopLogger.info({ event: 'mcp_message_loop_started' }, 'mcp_message_loop_started');
  let processed = 0;

  for await (const message of session.inbound) {
    processed += 1;
    let reply: ProcessedReply | null;

    try {
      reply = await processor.process(message, loopLogger);
    } catch (error) {
      loopLogger.error(
        {
          event: 'mcp_processor_failed',
          kind: message.kind,
          error: errorForLog(error)
        },
        'mcp_processor_failed'
      );
      reply = message.kind === 'request' ? internalErrorReply(message.id, 'Internal error while processing request.') : null;
    }

    if (message.kind !== 'request') {
      if (reply) {
        loopLogger.warn(
          {
            event: 'mcp_processor_replied_to_non_request',
            kind: message.kind
          },
          'mcp_processor_replied_to_non_request'
        );
      }
      continue;
    }

    if (!reply) {
      loopLogger.error(
        {
          event: 'mcp_processor_missing_reply',
          rpcRequestId: message.id,
          method: message.method
        },
        'mcp_processor_missing_reply'
      );
      reply = internalErrorReply(message.id, 'Request produced no reply.');
    }

    session.registry.deliver(reply);
  }

  loopLogger.info({ event: 'mcp_message_loop_finished', processed }, 'mcp_message_loop_finished');
}
