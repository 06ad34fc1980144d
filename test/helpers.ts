// Shared fixtures for transport and server tests.

import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { ServerConfig } from '../src/config/env.js';
import type { MessageProcessor } from '../src/transport/message-loop.js';
import type { InboundMessage, ProcessedReply } from '../src/types/mcp.js';
import { AppError } from '../src/utils/errors.js';

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    dataDir: './data',
    dbPath: ':memory:',
    bodyLimitBytes: 1024,
    maxPending: 16,
    waiterTimeoutMs: 0,
    pairing: 'fifo',
    ...overrides
  };
}

// This helper runs one synchronous call that must fail and returns the AppError it raised.
export function captureAppError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }

  throw new Error('Expected an AppError to be thrown.');
}

/**
 * Answers `ping` with `{"id":<id>,"result":"pong"}` and echoes any other method.
 *
 * While a gate is closed every message waits on it, which lets tests park
 * requests in the registry and release them on demand.
 */
export class StubProcessor implements MessageProcessor {
  public readonly seen: InboundMessage[] = [];
  private gate: Promise<void> | null = null;
  private openGate: () => void = () => undefined;

  public hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  public release(): void {
    this.openGate();
    this.gate = null;
  }

  public async process(message: InboundMessage): Promise<ProcessedReply | null> {
    this.seen.push(message);
    if (this.gate) {
      await this.gate;
    }

    if (message.kind !== 'request') {
      return null;
    }

    const result = message.method === 'ping' ? 'pong' : message.method;
    return {
      id: message.id,
      body: JSON.stringify({ id: message.id, result })
    };
  }
}
