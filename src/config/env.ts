// This module reads runtime configuration from environment variables and validates it once at startup.

import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_MAX_PENDING, type PairingMode } from '../transport/pending-registry.js';
import { AppError } from '../utils/errors.js';

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: string;
  dataDir: string;
  dbPath: string;
  bodyLimitBytes: number;
  maxPending: number;
  // Zero disables the idle timeout.
  waiterTimeoutMs: number;
  pairing: PairingMode;
}

// This schema treats blank variables as unset so empty container env entries fall back to defaults.
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  HOST: optionalString.pipe(z.string().min(1).default('127.0.0.1')),
  PORT: optionalString.pipe(z.coerce.number().int().min(0).max(65_535).default(8080)),
  LOG_LEVEL: optionalString.pipe(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  DATA_DIR: optionalString.pipe(z.string().min(1).default('./data')),
  STATE_DB_PATH: optionalString,
  MCP_BODY_LIMIT_BYTES: optionalString.pipe(z.coerce.number().int().min(1).default(1024 * 1024)),
  MCP_MAX_PENDING: optionalString.pipe(z.coerce.number().int().min(1).default(DEFAULT_MAX_PENDING)),
  MCP_WAITER_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().min(0).default(120_000)),
  MCP_CORRELATION: optionalString.pipe(z.enum(['fifo', 'id']).default('fifo'))
});

// This function loads the server config and fails fast with the offending variables listed.
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid server configuration.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    dataDir: values.DATA_DIR,
    dbPath: values.STATE_DB_PATH ?? join(values.DATA_DIR, 'calendar.db'),
    bodyLimitBytes: values.MCP_BODY_LIMIT_BYTES,
    maxPending: values.MCP_MAX_PENDING,
    waiterTimeoutMs: values.MCP_WAITER_TIMEOUT_MS,
    pairing: values.MCP_CORRELATION
  };
}
