// This module configures the pino logger and shapes tool arguments and errors for structured log lines.

import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

const LOG_LIMITS = {
  depth: 4,
  stringLength: 512,
  arrayItems: 20,
  objectKeys: 25
} as const;

// Event and reminder bodies are personal free text; log lines only record how long they were.
const FREE_TEXT_KEYS = new Set(['notes']);

function shapeString(value: string): string {
  return value.length <= LOG_LIMITS.stringLength
    ? value
    : `${value.slice(0, LOG_LIMITS.stringLength)}...[+${value.length - LOG_LIMITS.stringLength} chars]`;
}

function shapeEntries(value: object, depth: number): Record<string, unknown> {
  const entries = Object.entries(value);
  const shaped: Record<string, unknown> = {};

  for (const [key, entry] of entries.slice(0, LOG_LIMITS.objectKeys)) {
    shaped[key] =
      FREE_TEXT_KEYS.has(key) && typeof entry === 'string' ? `[text:${entry.length} chars]` : sanitizeForLog(entry, depth + 1);
  }
  if (entries.length > LOG_LIMITS.objectKeys) {
    shaped.__omittedKeys = entries.length - LOG_LIMITS.objectKeys;
  }

  return shaped;
}

// This helper bounds one payload for logging: nesting, string length, list length and key count.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (depth > LOG_LIMITS.depth) {
    return '[nested]';
  }

  if (typeof value === 'string') {
    return shapeString(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    const items = value.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
    return value.length > LOG_LIMITS.arrayItems ? [...items, `[+${value.length - LOG_LIMITS.arrayItems} items]`] : items;
  }

  if (typeof value === 'object' && value !== null) {
    return shapeEntries(value, depth);
  }

  return value;
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const code: unknown = Reflect.get(error, 'code');
  return {
    name: error.name,
    message: error.message,
    code: typeof code === 'string' ? code : undefined,
    stack: error.stack
  };
}

export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: { service: MCP_SERVER_NAME },
    // Clients and proxies may still forward credentials even though this service ignores them.
    redact: { paths: ['req.headers.authorization', 'req.headers.cookie'], remove: true },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
