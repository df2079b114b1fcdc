// This module models JSON-RPC request identifiers as a closed tagged union.

import { RpcError } from './errors.js';

export type RequestId =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'null' };

export type JsonRequestId = string | number | null;

export const NULL_ID: RequestId = { kind: 'null' };

export function stringId(value: string): RequestId {
  return { kind: 'string', value };
}

export function numberId(value: number): RequestId {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Request id must be a safe integer, got ${value}.`);
  }

  return { kind: 'number', value };
}

// This helper builds an id from a plain value, accepting the same shapes as the wire format.
export function toRequestId(value: JsonRequestId): RequestId {
  if (value === null) {
    return NULL_ID;
  }

  return typeof value === 'string' ? stringId(value) : numberId(value);
}

// This function validates an untrusted wire id; fractions, booleans and structured values are rejected.
export function parseRequestId(value: unknown): RequestId {
  if (value === null) {
    return NULL_ID;
  }

  if (typeof value === 'string') {
    return stringId(value);
  }

  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return { kind: 'number', value };
  }

  throw RpcError.invalidRequest('Invalid Request', { reason: 'invalid id', id: value });
}

export function requestIdToJson(id: RequestId): JsonRequestId {
  switch (id.kind) {
    case 'string':
      return id.value;
    case 'number':
      return id.value;
    case 'null':
      return null;
  }
}

// The string and number variants live in separate key spaces so that "1" and 1 never collide.
export function requestIdKey(id: RequestId): string | null {
  switch (id.kind) {
    case 'string':
      return `s:${id.value}`;
    case 'number':
      return `n:${id.value}`;
    case 'null':
      return null;
  }
}

export function requestIdEquals(left: RequestId, right: RequestId): boolean {
  switch (left.kind) {
    case 'string':
      return right.kind === 'string' && right.value === left.value;
    case 'number':
      return right.kind === 'number' && right.value === left.value;
    case 'null':
      return right.kind === 'null';
  }
}

export function formatRequestId(id: RequestId): string {
  switch (id.kind) {
    case 'string':
      return id.value;
    case 'number':
      return String(id.value);
    case 'null':
      return '';
  }
}

export interface IdGenerator {
  next(): RequestId;
}

// This generator hands out monotonically increasing integer ids starting at one.
export class CounterIdGenerator implements IdGenerator {
  private current: number;

  public constructor(start = 1) {
    this.current = start - 1;
  }

  public next(): RequestId {
    this.current += 1;
    return numberId(this.current);
  }
}
