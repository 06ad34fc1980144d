// This module pairs each outbound reply with the HTTP caller waiting for it and handles cancellation.

import type { FastifyBaseLogger } from 'fastify';
import type { JsonRpcId, ProcessedReply } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';

export type WaiterOutcome =
  | { kind: 'reply'; body: string }
  | { kind: 'cancelled'; reason: string }
  | { kind: 'timed_out'; afterMs: number };

export type PairingMode = 'fifo' | 'id';

// Callers only hold this view of a waiter; settling stays inside the registry.
export interface WaiterHandle {
  readonly sequence: number;
  readonly correlationId: JsonRpcId;
}

export interface PendingResponseRegistryOptions {
  logger: FastifyBaseLogger;
  maxPending?: number;
  waiterTimeoutMs?: number;
  pairing?: PairingMode;
}

export const DEFAULT_MAX_PENDING = 256;

function ignoreOutcome(_outcome: WaiterOutcome): void {
  // replaced synchronously by the promise executor
}

// One blocked HTTP call with a single-shot completion slot.
class PendingWaiter implements WaiterHandle {
  public readonly outcome: Promise<WaiterOutcome>;
  public timer: NodeJS.Timeout | null = null;
  private resolveOutcome: (outcome: WaiterOutcome) => void = ignoreOutcome;
  private settled = false;

  public constructor(
    public readonly sequence: number,
    public readonly correlationId: JsonRpcId
  ) {
    this.outcome = new Promise<WaiterOutcome>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  public get isSettled(): boolean {
    return this.settled;
  }

  public settle(outcome: WaiterOutcome): void {
    if (this.settled) {
      throw new AppError(500, 'waiter_already_settled', `Waiter ${this.sequence} was settled twice.`);
    }

    this.settled = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.resolveOutcome(outcome);
  }
}

// Internal pairing rule; swapping it never changes the registry's public contract.
interface WaiterPairing {
  readonly size: number;
  conflicts(correlationId: JsonRpcId): boolean;
  add(waiter: PendingWaiter): void;
  take(reply: ProcessedReply): PendingWaiter | undefined;
  drain(): PendingWaiter[];
}

// Oldest waiter takes the next reply; valid only while the processor answers strictly in order.
class FifoPairing implements WaiterPairing {
  private readonly queue: PendingWaiter[] = [];

  public get size(): number {
    return this.queue.length;
  }

  public conflicts(): boolean {
    return false;
  }

  public add(waiter: PendingWaiter): void {
    this.queue.push(waiter);
  }

  public take(): PendingWaiter | undefined {
    return this.queue.shift();
  }

  public drain(): PendingWaiter[] {
    return this.queue.splice(0, this.queue.length);
  }
}

// This helper keeps numeric 1 and string "1" apart as map keys.
function correlationKey(id: JsonRpcId): string {
  return id === null ? 'null' : `${typeof id}:${String(id)}`;
}

// Replies are routed by their JSON-RPC id; safe even if the processor reorders work.
class IdMapPairing implements WaiterPairing {
  private readonly waiters = new Map<string, PendingWaiter>();

  public get size(): number {
    return this.waiters.size;
  }

  public conflicts(correlationId: JsonRpcId): boolean {
    return this.waiters.has(correlationKey(correlationId));
  }

  public add(waiter: PendingWaiter): void {
    this.waiters.set(correlationKey(waiter.correlationId), waiter);
  }

  public take(reply: ProcessedReply): PendingWaiter | undefined {
    const key = correlationKey(reply.id);
    const waiter = this.waiters.get(key);
    this.waiters.delete(key);
    return waiter;
  }

  public drain(): PendingWaiter[] {
    const drained = [...this.waiters.values()].sort((a, b) => a.sequence - b.sequence);
    this.waiters.clear();
    return drained;
  }
}

/**
 * Tracks HTTP calls awaiting a reply, in arrival order.
 *
 * A waiter that hits the idle timeout resolves as `timed_out` but keeps its
 * slot until its reply shows up, so the next reply still lands on the right
 * caller under FIFO pairing. Such abandoned slots count toward `maxPending`.
 */
export class PendingResponseRegistry {
  private readonly logger: FastifyBaseLogger;
  private readonly maxPending: number;
  private readonly waiterTimeoutMs: number;
  private readonly pairing: WaiterPairing;
  private nextSequence = 1;
  private accepting = true;

  public constructor(options: PendingResponseRegistryOptions) {
    this.logger = options.logger;
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
    this.waiterTimeoutMs = options.waiterTimeoutMs ?? 0;
    this.pairing = options.pairing === 'id' ? new IdMapPairing() : new FifoPairing();
  }

  public get pendingCount(): number {
    return this.pairing.size;
  }

  public get isAccepting(): boolean {
    return this.accepting;
  }

  // This method allocates the next waiter slot; it must run in the same synchronous step as the publish.
  public register(correlationId: JsonRpcId): WaiterHandle {
    if (!this.accepting) {
      throw new AppError(410, 'session_closed', 'Session has been terminated.');
    }

    if (this.pairing.size >= this.maxPending) {
      this.logger.warn(
        {
          event: 'mcp_waiter_rejected_backpressure',
          pendingCount: this.pairing.size,
          maxPending: this.maxPending
        },
        'mcp_waiter_rejected_backpressure'
      );
      throw new AppError(503, 'too_many_pending', 'Too many requests are awaiting a reply; retry later.', {
        maxPending: this.maxPending
      });
    }

    if (this.pairing.conflicts(correlationId)) {
      throw new AppError(409, 'duplicate_request_id', `Request id ${String(correlationId)} is already pending.`);
    }

    const waiter = new PendingWaiter(this.nextSequence, correlationId);
    this.nextSequence += 1;

    if (this.waiterTimeoutMs > 0) {
      const timeoutMs = this.waiterTimeoutMs;
      waiter.timer = setTimeout(() => {
        waiter.timer = null;
        if (waiter.isSettled) {
          return;
        }

        this.logger.warn(
          {
            event: 'mcp_waiter_timed_out',
            sequence: waiter.sequence,
            rpcRequestId: waiter.correlationId,
            timeoutMs
          },
          'mcp_waiter_timed_out'
        );
        waiter.settle({ kind: 'timed_out', afterMs: timeoutMs });
      }, timeoutMs);
      waiter.timer.unref();
    }

    this.pairing.add(waiter);
    this.logger.debug(
      {
        event: 'mcp_waiter_registered',
        sequence: waiter.sequence,
        rpcRequestId: correlationId,
        pendingCount: this.pairing.size
      },
      'mcp_waiter_registered'
    );

    return waiter;
  }

  // This method suspends the caller until its waiter is resolved, cancelled, or timed out.
  public awaitResolution(handle: WaiterHandle): Promise<WaiterOutcome> {
    if (!(handle instanceof PendingWaiter)) {
      throw new AppError(500, 'unknown_waiter', 'Waiter handle was not issued by this registry.');
    }

    return handle.outcome;
  }

  // This method resolves the waiter selected by the pairing rule; extra replies are logged and dropped.
  public deliver(reply: ProcessedReply): boolean {
    const waiter = this.pairing.take(reply);

    if (!waiter) {
      if (!this.accepting) {
        this.logger.debug(
          {
            event: 'mcp_reply_after_close',
            rpcRequestId: reply.id
          },
          'mcp_reply_after_close'
        );
        return false;
      }

      this.logger.warn(
        {
          event: 'mcp_reply_without_waiter',
          rpcRequestId: reply.id
        },
        'mcp_reply_without_waiter'
      );
      return false;
    }

    if (waiter.isSettled) {
      this.logger.info(
        {
          event: 'mcp_reply_discarded_abandoned_waiter',
          sequence: waiter.sequence,
          rpcRequestId: reply.id
        },
        'mcp_reply_discarded_abandoned_waiter'
      );
      return false;
    }

    waiter.settle({ kind: 'reply', body: reply.body });
    this.logger.debug(
      {
        event: 'mcp_reply_delivered',
        sequence: waiter.sequence,
        rpcRequestId: reply.id,
        pendingCount: this.pairing.size
      },
      'mcp_reply_delivered'
    );
    return true;
  }

  public stopAccepting(): void {
    this.accepting = false;
  }

  // This method resolves every queued waiter as cancelled and empties the queue.
  public cancelAll(reason: string): number {
    this.accepting = false;
    let cancelled = 0;

    for (const waiter of this.pairing.drain()) {
      if (waiter.isSettled) {
        continue;
      }
      waiter.settle({ kind: 'cancelled', reason });
      cancelled += 1;
    }

    this.logger.info(
      {
        event: 'mcp_waiters_cancelled',
        reason,
        cancelled
      },
      'mcp_waiters_cancelled'
    );

    return cancelled;
  }
}
