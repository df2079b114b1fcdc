// This module implements the bidirectional JSON-RPC connection: outbound calls, inbound dispatch, batches and shutdown.

import type { z } from 'zod';
import type { Session } from '../transport/transport.js';
import { type Logger, createSilentLogger, errorForLog, sanitizeForLog } from '../utils/logger.js';
import { ConnectionClosedError, RequestTimeoutError, RpcError, abortReason, toRpcError } from './errors.js';
import { HandlerRegistry, type HandlerContext, type MethodHandler, type PeerChannel } from './handlers.js';
import { CounterIdGenerator, type IdGenerator, NULL_ID, type RequestId, requestIdToJson } from './id.js';
import {
  type ClassifiedMessage,
  type JsonRpcResponse,
  type ResponseOutcome,
  classifyMessage,
  decodeJson,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeSuccess,
  isBatchText,
  recoverRequestId
} from './message.js';
import { CorrelationTable } from './pending.js';
import { linkAbort, raceSignal, withDeadline } from './signals.js';

export type ConnectionState = 'open' | 'serving' | 'closed';

// Concurrent dispatch lets one slow handler run while later responses are still delivered.
export type DispatchMode = 'concurrent' | 'sequential';

export interface ConnectionOptions {
  handlers?: HandlerRegistry | Record<string, MethodHandler>;
  logger?: Logger;
  idGenerator?: IdGenerator;
  dispatch?: DispatchMode;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface RequestOptions extends CallOptions {
  timeoutMs?: number;
}

export interface ServeOptions {
  signal?: AbortSignal;
}

// Replies to input the peer got wrong are best effort; a failure to send them is logged, never fatal.
interface DueReply {
  reply: JsonRpcResponse;
  bestEffort: boolean;
}

export class Connection implements PeerChannel {
  private readonly session: Session;
  private readonly handlers: HandlerRegistry;
  private readonly pending = new CorrelationTable();
  private readonly logger: Logger;
  private readonly idGenerator: IdGenerator;
  private readonly dispatch: DispatchMode;
  private readonly closeController = new AbortController();
  private sendChain: Promise<void> = Promise.resolve();
  private currentState: ConnectionState = 'open';
  private closeStarted = false;

  public constructor(session: Session, options: ConnectionOptions = {}) {
    this.session = session;
    this.handlers =
      options.handlers instanceof HandlerRegistry ? options.handlers : new HandlerRegistry(options.handlers);
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'jsonrpc' });
    this.idGenerator = options.idGenerator ?? new CounterIdGenerator();
    this.dispatch = options.dispatch ?? 'concurrent';
  }

  public get state(): ConnectionState {
    return this.currentState;
  }

  // Number of calls still waiting for a response.
  public get pendingCount(): number {
    return this.pending.size;
  }

  public isPending(id: RequestId): boolean {
    return this.pending.has(id);
  }

  public register(method: string, handler: MethodHandler): this {
    this.handlers.register(method, handler);
    return this;
  }

  // This method sends one request with a caller-chosen id and waits for the matching response.
  public async call(id: RequestId, method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    if (this.currentState === 'closed') {
      throw new ConnectionClosedError();
    }

    const text = JSON.stringify(encodeRequest(id, method, params));
    // Registration precedes the send so that a fast peer cannot answer before the slot exists.
    const slot = this.pending.register(id);

    try {
      await this.sendText(text);
    } catch (error) {
      this.pending.cancel(id);
      throw error;
    }

    const outcome = await this.awaitOutcome(id, slot, signal);
    if (!outcome.ok) {
      throw outcome.error;
    }

    return outcome.result;
  }

  // This method allocates the next id from the connection's generator and optionally validates the result.
  public async request(method: string, params?: unknown, options?: RequestOptions): Promise<unknown>;
  public async request<S extends z.ZodTypeAny>(
    method: string,
    params: unknown,
    options: RequestOptions & { schema: S }
  ): Promise<z.output<S>>;
  public async request(
    method: string,
    params?: unknown,
    options: RequestOptions & { schema?: z.ZodTypeAny } = {}
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs;
    const deadline = withDeadline(options.signal, timeoutMs, () => new RequestTimeoutError(method, timeoutMs ?? 0));

    try {
      const result = await this.call(this.idGenerator.next(), method, params, { signal: deadline.signal });
      return options.schema ? options.schema.parse(result) : result;
    } finally {
      deadline.dispose();
    }
  }

  // This method sends a notification; nothing is registered and no reply is awaited.
  public async notify(method: string, params?: unknown, options: CallOptions = {}): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    if (this.currentState === 'closed') {
      throw new ConnectionClosedError();
    }

    await this.sendText(JSON.stringify(encodeNotification(method, params)));
  }

  // This method starts serving in the background and only logs how the loop ended.
  public open(): void {
    if (this.currentState === 'closed') {
      throw new ConnectionClosedError();
    }

    void this.serve().catch((error: unknown) => {
      this.logger.debug({ event: 'jsonrpc_serve_stopped', error: errorForLog(error) }, 'jsonrpc_serve_stopped');
    });
  }

  // This method runs the receive loop until the channel ends, the signal aborts, or a reply cannot be sent.
  // Whatever stops the loop also closes the connection.
  public async serve(options: ServeOptions = {}): Promise<never> {
    const { signal } = options;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    if (this.currentState === 'closed') {
      throw new ConnectionClosedError();
    }

    if (this.currentState === 'serving') {
      throw new Error('Connection is already serving.');
    }

    this.currentState = 'serving';
    const loop = new AbortController();
    const unlink = linkAbort(loop, [signal, this.closeController.signal]);
    const fail = (error: unknown): void => {
      loop.abort(error);
    };

    this.logger.debug({ event: 'jsonrpc_serve_started' }, 'jsonrpc_serve_started');

    try {
      const iterator = this.session.receive()[Symbol.asyncIterator]();

      for (;;) {
        const next = await raceSignal(iterator.next(), loop.signal);
        if (next.done) {
          throw new ConnectionClosedError('connection closed by peer');
        }

        const handling = this.handleMessage(next.value, loop.signal).catch(fail);
        if (this.dispatch === 'sequential') {
          await raceSignal(handling, loop.signal);
        }
      }
    } finally {
      unlink();
      await this.close().catch((closeError: unknown) => {
        this.logger.warn({ event: 'jsonrpc_close_failed', error: errorForLog(closeError) }, 'jsonrpc_close_failed');
      });
    }
  }

  // Closing fails every pending call and closes the session; repeated calls resolve immediately.
  public async close(): Promise<void> {
    if (this.closeStarted) {
      return;
    }

    this.closeStarted = true;
    this.currentState = 'closed';
    const closedError = new ConnectionClosedError();
    this.closeController.abort(closedError);
    const failed = this.pending.rejectAll(closedError);
    this.logger.debug({ event: 'jsonrpc_connection_closed', failedCalls: failed }, 'jsonrpc_connection_closed');

    await this.session.close();
  }

  private awaitOutcome(id: RequestId, slot: Promise<ResponseOutcome>, signal?: AbortSignal): Promise<ResponseOutcome> {
    if (!signal) {
      return slot;
    }

    return new Promise<ResponseOutcome>((resolve, reject) => {
      const onAbort = (): void => {
        // Losing the race to deliver means the response is already on its way to the slot.
        if (this.pending.cancel(id)) {
          reject(abortReason(signal));
        }
      };

      void slot.then((outcome) => {
        signal.removeEventListener('abort', onAbort);
        resolve(outcome);
      });

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  // Sessions take one writer at a time; every write joins this chain.
  private sendText(text: string): Promise<void> {
    if (this.currentState === 'closed') {
      return Promise.reject(new ConnectionClosedError());
    }

    const sent = this.sendChain.then(() => this.session.send(text));
    this.sendChain = sent.then(
      () => undefined,
      () => undefined
    );
    return sent;
  }

  // Failing to deliver a best-effort reply never stops the loop.
  private async sendBestEffort(text: string): Promise<void> {
    try {
      await this.sendText(text);
    } catch (error) {
      this.logger.debug({ event: 'jsonrpc_best_effort_send_failed', error: errorForLog(error) }, 'jsonrpc_best_effort_send_failed');
    }
  }

  // Only failures to send a due reply reject; everything else is answered to the peer or logged.
  private async handleMessage(text: string, signal: AbortSignal): Promise<void> {
    let decoded: unknown;
    try {
      decoded = decodeJson(text);
    } catch (error) {
      this.logger.warn(
        { event: 'jsonrpc_parse_failed', batch: isBatchText(text), bytes: text.length },
        'jsonrpc_parse_failed'
      );
      await this.sendBestEffort(serializeReply(encodeError(NULL_ID, toRpcError(error))));
      return;
    }

    if (Array.isArray(decoded)) {
      await this.handleBatch(decoded, signal);
      return;
    }

    const due = await this.processMessage(decoded, signal);
    if (!due) {
      return;
    }

    const replyText = serializeReply(due.reply);
    await (due.bestEffort ? this.sendBestEffort(replyText) : this.sendText(replyText));
  }

  private async handleBatch(elements: unknown[], signal: AbortSignal): Promise<void> {
    if (elements.length === 0) {
      await this.sendBestEffort(serializeReply(encodeError(NULL_ID, RpcError.invalidRequest())));
      return;
    }

    this.logger.debug({ event: 'jsonrpc_batch_received', batchSize: elements.length }, 'jsonrpc_batch_received');

    let replies: Array<DueReply | null>;
    if (this.dispatch === 'concurrent') {
      replies = await Promise.all(elements.map((element) => this.processMessage(element, signal)));
    } else {
      replies = [];
      for (const element of elements) {
        replies.push(await this.processMessage(element, signal));
      }
    }

    const due = replies.filter((reply): reply is DueReply => reply !== null);
    if (due.length === 0) {
      return;
    }

    // A batch that only answers invalid elements is as best effort as a single invalid message.
    const text = `[${due.map((entry) => serializeReply(entry.reply)).join(',')}]`;
    await (due.every((entry) => entry.bestEffort) ? this.sendBestEffort(text) : this.sendText(text));
  }

  // This method handles one decoded message and returns the reply that is due, if any.
  private async processMessage(value: unknown, signal: AbortSignal): Promise<DueReply | null> {
    let message: ClassifiedMessage;
    try {
      message = classifyMessage(value);
    } catch (error) {
      const rpcError = toRpcError(error);
      this.logger.warn(
        { event: 'jsonrpc_invalid_message', code: rpcError.code, details: sanitizeForLog(rpcError.data) },
        'jsonrpc_invalid_message'
      );
      return { reply: encodeError(recoverRequestId(value), rpcError), bestEffort: true };
    }

    switch (message.kind) {
      case 'response':
        this.deliverResponse(message.id, message.outcome);
        return null;
      case 'notification':
        await this.runNotification(message.method, message.params, signal);
        return null;
      case 'request':
        // A null id cannot be correlated by the peer, so the request runs like a notification.
        if (message.id.kind === 'null') {
          await this.runNotification(message.method, message.params, signal);
          return null;
        }

        return { reply: await this.runRequest(message.id, message.method, message.params, signal), bestEffort: false };
    }
  }

  private deliverResponse(id: RequestId, outcome: ResponseOutcome): void {
    if (this.pending.deliver(id, outcome)) {
      return;
    }

    this.logger.debug(
      { event: 'jsonrpc_orphan_response', rpcRequestId: requestIdToJson(id), ok: outcome.ok },
      'jsonrpc_orphan_response'
    );
  }

  private async runRequest(id: RequestId, method: string, params: unknown, signal: AbortSignal): Promise<JsonRpcResponse> {
    const handler = this.handlers.get(method);
    if (!handler) {
      this.logger.info(
        { event: 'jsonrpc_method_not_found', rpcRequestId: requestIdToJson(id), method },
        'jsonrpc_method_not_found'
      );
      return encodeError(id, RpcError.methodNotFound(method));
    }

    const startedAt = Date.now();
    try {
      const result: unknown = await handler(params, this.handlerContext(method, id, signal));
      return encodeSuccess(id, result);
    } catch (error) {
      const rpcError = toRpcError(error);
      this.logger.warn(
        {
          event: 'jsonrpc_handler_failed',
          rpcRequestId: requestIdToJson(id),
          method,
          code: rpcError.code,
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'jsonrpc_handler_failed'
      );
      return encodeError(id, rpcError);
    }
  }

  // Notification outcomes are never reported to the peer.
  private async runNotification(method: string, params: unknown, signal: AbortSignal): Promise<void> {
    const handler = this.handlers.get(method);
    if (!handler) {
      this.logger.debug({ event: 'jsonrpc_notification_unhandled', method }, 'jsonrpc_notification_unhandled');
      return;
    }

    try {
      await handler(params, this.handlerContext(method, null, signal));
    } catch (error) {
      this.logger.debug(
        { event: 'jsonrpc_notification_failed', method, error: errorForLog(error) },
        'jsonrpc_notification_failed'
      );
    }
  }

  private handlerContext(method: string, id: RequestId | null, signal: AbortSignal): HandlerContext {
    return {
      method,
      id,
      signal,
      peer: this,
      logger: this.logger.child({ method, rpcRequestId: id === null ? undefined : requestIdToJson(id) })
    };
  }
}

// A result that cannot be encoded is replaced by an internal error for the same id.
function serializeReply(reply: JsonRpcResponse): string {
  try {
    return JSON.stringify(reply);
  } catch (error) {
    const fallback = RpcError.internalError('Result could not be serialized.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
    return JSON.stringify({ jsonrpc: reply.jsonrpc, id: reply.id, error: fallback.toWire() });
  }
}
