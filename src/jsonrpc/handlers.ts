// This module keeps the method table of a connection and adapts typed handlers into the uniform dispatch signature.

import type { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import { RpcError } from './errors.js';
import type { RequestId } from './id.js';

// The connection is referenced structurally so handlers can issue calls back to the peer.
export interface PeerChannel {
  request(method: string, params?: unknown, options?: { signal?: AbortSignal; timeoutMs?: number }): Promise<unknown>;
  notify(method: string, params?: unknown, options?: { signal?: AbortSignal }): Promise<void>;
}

export interface HandlerContext {
  method: string;
  // Null for notifications.
  id: RequestId | null;
  signal: AbortSignal;
  peer: PeerChannel;
  logger: Logger;
}

export type MethodHandler = (params: unknown, context: HandlerContext) => unknown;

export class HandlerRegistry {
  private readonly handlers = new Map<string, MethodHandler>();

  public constructor(initial: Record<string, MethodHandler> = {}) {
    for (const [method, handler] of Object.entries(initial)) {
      this.register(method, handler);
    }
  }

  // A later registration for the same method replaces the earlier one.
  public register(method: string, handler: MethodHandler): this {
    this.handlers.set(method, handler);
    return this;
  }

  public unregister(method: string): boolean {
    return this.handlers.delete(method);
  }

  public get(method: string): MethodHandler | undefined {
    return this.handlers.get(method);
  }

  public has(method: string): boolean {
    return this.handlers.has(method);
  }

  public methods(): string[] {
    return [...this.handlers.keys()].sort();
  }
}

// This adapter validates raw params against a zod schema before the typed handler sees them.
export function typedHandler<S extends z.ZodTypeAny, R>(
  schema: S,
  handler: (params: z.output<S>, context: HandlerContext) => R | Promise<R>
): MethodHandler {
  return async (params, context) => {
    const parsed = schema.safeParse(params ?? {});
    if (!parsed.success) {
      throw RpcError.invalidParams('Invalid params', parsed.error.flatten());
    }

    const value: z.output<S> = parsed.data;
    return handler(value, context);
  };
}
