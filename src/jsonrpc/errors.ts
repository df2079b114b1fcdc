// This module defines the JSON-RPC error taxonomy and the mapping from thrown values into wire errors.

import { ZodError } from 'zod';
import { AppError } from '../utils/errors.js';

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerError: -32000
} as const;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

// This error carries a wire-level code and optional data, both when raised locally and when received from a peer.
export class RpcError extends Error {
  public readonly code: number;
  public readonly data?: unknown;

  public constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
    this.data = data;
  }

  public static parseError(message = 'Parse error', data?: unknown): RpcError {
    return new RpcError(ErrorCode.ParseError, message, data);
  }

  public static invalidRequest(message = 'Invalid Request', data?: unknown): RpcError {
    return new RpcError(ErrorCode.InvalidRequest, message, data);
  }

  public static methodNotFound(method?: string): RpcError {
    return new RpcError(ErrorCode.MethodNotFound, 'Method not found', method === undefined ? undefined : { method });
  }

  public static invalidParams(message = 'Invalid params', data?: unknown): RpcError {
    return new RpcError(ErrorCode.InvalidParams, message, data);
  }

  public static internalError(message = 'Internal error', data?: unknown): RpcError {
    return new RpcError(ErrorCode.InternalError, message, data);
  }

  // This helper validates an untrusted wire error object received from a peer.
  public static fromWire(value: unknown): RpcError {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return RpcError.internalError('Malformed error object in response.', { received: value });
    }

    const code: unknown = Reflect.get(value, 'code');
    const message: unknown = Reflect.get(value, 'message');
    if (typeof code !== 'number' || !Number.isInteger(code) || typeof message !== 'string') {
      return RpcError.internalError('Malformed error object in response.', { received: value });
    }

    return new RpcError(code, message, Reflect.get(value, 'data'));
  }

  public toWire(): JsonRpcErrorObject {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

// Every outcome caused by a closed connection (pending calls, sends, serving) raises this error.
export class ConnectionClosedError extends Error {
  public constructor(message = 'connection closed') {
    super(message);
    this.name = 'ConnectionClosedError';
  }
}

export class RequestTimeoutError extends Error {
  public readonly method: string;
  public readonly timeoutMs: number;

  public constructor(method: string, timeoutMs: number) {
    super(`Request ${method} timed out after ${timeoutMs}ms.`);
    this.name = 'RequestTimeoutError';
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}

// This helper maps HTTP-flavoured application errors into JSON-RPC error code ranges.
function mapAppErrorToRpc(error: AppError): RpcError {
  if (error.code === 'validation_error') {
    return new RpcError(ErrorCode.InvalidParams, error.message, error.details);
  }

  if (error.code === 'not_found' || error.statusCode === 404) {
    return new RpcError(-32004, error.message, error.details);
  }

  if (error.statusCode === 401 || error.statusCode === 403) {
    return new RpcError(-32001, error.message);
  }

  if (error.statusCode === 409) {
    return new RpcError(-32009, error.message, error.details);
  }

  if (error.statusCode >= 500) {
    return new RpcError(ErrorCode.ServerError, error.message, error.details);
  }

  return new RpcError(-32002, error.message, error.details);
}

// This function converts anything a handler throws into the error that is sent to the peer.
export function toRpcError(error: unknown): RpcError {
  if (error instanceof RpcError) {
    return error;
  }

  if (error instanceof AppError) {
    return mapAppErrorToRpc(error);
  }

  if (error instanceof ZodError) {
    return RpcError.invalidParams('Invalid params', error.flatten());
  }

  if (error instanceof Error) {
    return new RpcError(ErrorCode.ServerError, error.message, { name: error.name, message: error.message });
  }

  return new RpcError(ErrorCode.ServerError, String(error), { value: String(error) });
}

// This helper resolves the error a cancelled operation should fail with.
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason;
  }

  const error = new Error(reason === undefined ? 'The operation was aborted.' : String(reason));
  error.name = 'AbortError';
  return error;
}
