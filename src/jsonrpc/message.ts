// This module defines the JSON-RPC 2.0 wire shapes, the message classifier, and the encoders used on the send path.

import { JSONRPC_VERSION } from '../version.js';
import { type JsonRpcErrorObject, RpcError } from './errors.js';
import { type JsonRequestId, type RequestId, parseRequestId, requestIdToJson } from './id.js';

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRequestId;
  method: string;
  params?: unknown;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRequestId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRequestId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

// Errors other than RpcError appear only for local outcomes such as connection shutdown.
export type ResponseOutcome = { ok: true; result: unknown } | { ok: false; error: Error };

export type ClassifiedMessage =
  | { kind: 'request'; id: RequestId; method: string; params: unknown }
  | { kind: 'notification'; method: string; params: unknown }
  | { kind: 'response'; id: RequestId; outcome: ResponseOutcome };

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(value: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

// This helper parses JSON text and reports failures with the protocol's parse error.
export function decodeJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw RpcError.parseError('Parse error', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// Returns true when the trimmed text starts a JSON array.
export function isBatchText(text: string): boolean {
  return text.trimStart().startsWith('[');
}

function readParams(message: JsonObject): unknown {
  if (!hasOwn(message, 'params')) {
    return undefined;
  }

  const params = message.params;
  if (typeof params !== 'object' || params === null) {
    throw RpcError.invalidRequest('Invalid Request', { reason: 'params must be an object or an array' });
  }

  return params;
}

function readMethod(message: JsonObject): string {
  const method = message.method;
  if (typeof method !== 'string') {
    throw RpcError.invalidRequest('Invalid Request', { reason: 'method must be a string' });
  }

  return method;
}

// This function classifies one decoded message object by the keys it carries, in protocol precedence order.
export function classifyMessage(value: unknown): ClassifiedMessage {
  if (!isJsonObject(value)) {
    throw RpcError.invalidRequest('Invalid Request', { reason: 'message must be an object' });
  }

  if (value.jsonrpc !== JSONRPC_VERSION) {
    throw RpcError.parseError('Invalid JSON-RPC version', { jsonrpc: value.jsonrpc ?? null });
  }

  if (hasOwn(value, 'error')) {
    if (hasOwn(value, 'result')) {
      throw RpcError.invalidRequest('Invalid Request', { reason: 'response carries both result and error' });
    }

    // Error replies to unparseable input may legitimately carry no id.
    const id = hasOwn(value, 'id') ? parseRequestId(value.id) : parseRequestId(null);
    return { kind: 'response', id, outcome: { ok: false, error: RpcError.fromWire(value.error) } };
  }

  if (hasOwn(value, 'result')) {
    if (!hasOwn(value, 'id')) {
      throw RpcError.invalidRequest('Invalid Request', { reason: 'result without id' });
    }

    return { kind: 'response', id: parseRequestId(value.id), outcome: { ok: true, result: value.result } };
  }

  if (hasOwn(value, 'method')) {
    const method = readMethod(value);
    const params = readParams(value);

    if (hasOwn(value, 'id')) {
      return { kind: 'request', id: parseRequestId(value.id), method, params };
    }

    return { kind: 'notification', method, params };
  }

  throw RpcError.invalidRequest('Invalid Request', { reason: 'unrecognized message shape' });
}

// This helper extracts a usable id from a request that failed classification, so the error reply can reference it.
// Ids found on response-shaped messages belong to the other direction and are never echoed back.
export function recoverRequestId(value: unknown): RequestId {
  if (!isJsonObject(value) || !hasOwn(value, 'method') || !hasOwn(value, 'id')) {
    return parseRequestId(null);
  }

  try {
    return parseRequestId(value.id);
  } catch {
    return parseRequestId(null);
  }
}

// Params are left off the wire when there is nothing to send.
function isEmptyParams(params: unknown): boolean {
  if (params === undefined || params === null) {
    return true;
  }

  if (Array.isArray(params)) {
    return params.length === 0;
  }

  return isJsonObject(params) && Object.keys(params).length === 0;
}

export function encodeRequest(id: RequestId, method: string, params?: unknown): JsonRpcRequest {
  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id: requestIdToJson(id), method };
  if (!isEmptyParams(params)) {
    request.params = params;
  }

  return request;
}

export function encodeNotification(method: string, params?: unknown): JsonRpcNotification {
  const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
  if (!isEmptyParams(params)) {
    notification.params = params;
  }

  return notification;
}

// A success response always carries a result member, so an undefined handler result is sent as null.
export function encodeSuccess(id: RequestId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, id: requestIdToJson(id), result: result === undefined ? null : result };
}

export function encodeError(id: RequestId, error: RpcError): JsonRpcErrorResponse {
  return { jsonrpc: JSONRPC_VERSION, id: requestIdToJson(id), error: error.toWire() };
}
