// This module owns the session identity, its lifecycle state machine, and the atomic register-then-publish step.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { InboundMessage } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { InboundMultiplexer } from './inbound-multiplexer.js';
import { PendingResponseRegistry, type PairingMode, type WaiterHandle } from './pending-registry.js';

export type SessionState = 'new' | 'open' | 'closing' | 'closed';

export interface McpSessionOptions {
  logger: FastifyBaseLogger;
  maxPending?: number;
  waiterTimeoutMs?: number;
  pairing?: PairingMode;
}

export interface SessionCloseResult {
  alreadyClosed: boolean;
  cancelled: number;
}

// One logical duplex conversation; construct it explicitly rather than sharing a process-wide singleton.
export class McpSession {
  public readonly registry: PendingResponseRegistry;
  public readonly inbound = new InboundMultiplexer<InboundMessage>();
  private readonly logger: FastifyBaseLogger;
  private sessionId: string | null = null;
  private currentState: SessionState = 'new';

  public constructor(options: McpSessionOptions) {
    this.logger = options.logger;
    this.registry = new PendingResponseRegistry({
      logger: options.logger,
      maxPending: options.maxPending,
      waiterTimeoutMs: options.waiterTimeoutMs,
      pairing: options.pairing
    });
  }

  public get state(): SessionState {
    return this.currentState;
  }

  public get id(): string {
    if (this.sessionId === null) {
      throw new AppError(500, 'session_not_opened', 'Session has not been opened yet.');
    }

    return this.sessionId;
  }

  public open(): string {
    if (this.currentState !== 'new') {
      throw new AppError(500, 'session_already_opened', 'Session can only be opened once.');
    }

    const sessionId = randomUUID();
    this.sessionId = sessionId;
    this.currentState = 'open';
    this.logger.info({ event: 'mcp_session_opened', sessionId }, 'mcp_session_opened');
    return sessionId;
  }

  /**
   * Registers a waiter (requests only) and publishes the message as one step.
   *
   * Both calls are synchronous, so no other message can be registered or
   * published between them. Returns null for messages that expect no reply.
   */
  public submit(message: InboundMessage): WaiterHandle | null {
    if (this.currentState !== 'open') {
      throw new AppError(410, 'session_closed', 'Session has been terminated.');
    }

    if (message.kind !== 'request') {
      this.inbound.publish(message);
      return null;
    }

    const handle = this.registry.register(message.id);
    this.inbound.publish(message);
    return handle;
  }

  public beginClose(): void {
    if (this.currentState !== 'open') {
      throw new AppError(500, 'invalid_session_transition', `Cannot begin closing from state ${this.currentState}.`);
    }

    this.currentState = 'closing';
    this.registry.stopAccepting();
  }

  public finalize(): void {
    if (this.currentState !== 'closing') {
      throw new AppError(500, 'invalid_session_transition', `Cannot finalize from state ${this.currentState}.`);
    }

    if (this.registry.pendingCount > 0 || !this.inbound.isFinished) {
      throw new AppError(500, 'session_not_drained', 'Session still has pending waiters or an open inbound stream.', {
        pendingCount: this.registry.pendingCount,
        inboundFinished: this.inbound.isFinished
      });
    }

    this.currentState = 'closed';
  }

  // This method terminates the session; calling it again after termination is a successful no-op.
  public close(reason: string): SessionCloseResult {
    if (this.currentState !== 'open') {
      this.logger.info(
        { event: 'mcp_session_close_noop', sessionId: this.sessionId, state: this.currentState },
        'mcp_session_close_noop'
      );
      return { alreadyClosed: true, cancelled: 0 };
    }

    this.beginClose();
    this.inbound.finish();
    const cancelled = this.registry.cancelAll(reason);
    this.finalize();

    this.logger.info(
      {
        event: 'mcp_session_closed',
        sessionId: this.sessionId,
        reason,
        cancelled
      },
      'mcp_session_closed'
    );

    return { alreadyClosed: false, cancelled };
  }
}
