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

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isHttpLikeError(error)) {
    const code: unknown = Reflect.get(error, 'code');
    return new AppError(error.statusCode, typeof code === 'string' ? code : 'request_error', error.message);
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// Fastify attaches statusCode (and usually a FST_* code) to its own request errors.
function isHttpLikeError(error: unknown): error is Error & { statusCode: number } {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600;
}
