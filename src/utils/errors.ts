// This module provides a typed application error that can be mapped into JSON-RPC and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper reads the client-error status that Fastify attaches to framework errors such as oversized bodies.
function readClientStatusCode(error: Error): number | null {
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }

  return null;
}

// This helper reads the framework error code (for example FST_ERR_CTP_BODY_TOO_LARGE) when one is present.
function readFrameworkCode(error: Error): string | null {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && code.length > 0 ? code : null;
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    const clientStatus = readClientStatusCode(error);
    if (clientStatus !== null) {
      const code = clientStatus === 413 ? 'payload_too_large' : (readFrameworkCode(error) ?? 'bad_request');
      return new AppError(clientStatus, code, error.message);
    }

    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
