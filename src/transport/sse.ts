// This module implements the HTTP+SSE transport: an event stream per client plus a POST endpoint for inbound messages.

import { randomUUID } from 'node:crypto';
import type { ServerResponse } from 'node:http';
import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../utils/errors.js';
import { type Logger, createSilentLogger, errorForLog } from '../utils/logger.js';
import { AsyncQueue } from './queue.js';
import { type Session, type SessionHandler, SessionClosedError } from './transport.js';

export interface SseSessionManagerOptions {
  handler: SessionHandler;
  // Route prefix for the event stream, such as `/sse`.
  basePath?: string;
  // Public origin advertised in the endpoint event, used behind reverse proxies.
  baseUrl?: string;
  logger?: Logger;
}

// One client's event stream; inbound messages arrive through POST requests.
export class SseSession implements Session {
  public readonly id: string;
  private readonly response: ServerResponse;
  private readonly inbound = new AsyncQueue<string>();
  private readonly done: Promise<void>;
  private markDone: () => void = () => undefined;
  private closed = false;

  public constructor(id: string, response: ServerResponse) {
    this.id = id;
    this.response = response;
    this.done = new Promise<void>((resolve) => {
      this.markDone = resolve;
    });
  }

  public get finished(): Promise<void> {
    return this.done;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public send(message: string): Promise<void> {
    return this.writeEvent('message', message);
  }

  // Writes are buffered by the response; a client that went away surfaces as a closed session.
  public async writeEvent(event: string, data: string): Promise<void> {
    if (this.closed || this.response.writableEnded || this.response.destroyed) {
      throw new SessionClosedError();
    }

    this.response.write(`event: ${event}\ndata: ${data}\n\n`);
  }

  // Returns false when the session no longer accepts input.
  public push(message: string): boolean {
    return this.inbound.push(message);
  }

  public receive(): AsyncIterable<string> {
    return this.inbound;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.inbound.close();
    if (!this.response.writableEnded) {
      this.response.end();
    }

    this.markDone();
  }
}

// This helper trims a configured path to the `/segment` form used for route registration.
export function normalizeBasePath(basePath: string): string {
  const trimmed = basePath.trim().replace(/\/+$/, '');
  if (trimmed === '') {
    return '';
  }

  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export class SseSessionManager {
  private readonly handler: SessionHandler;
  private readonly basePath: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly sessions = new Map<string, SseSession>();

  public constructor(options: SseSessionManagerOptions) {
    this.handler = options.handler;
    this.basePath = normalizeBasePath(options.basePath ?? '/sse');
    this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'sse' });
  }

  public get size(): number {
    return this.sessions.size;
  }

  public sessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  public get(sessionId: string): SseSession | undefined {
    return this.sessions.get(sessionId);
  }

  public endpointFor(sessionId: string): string {
    return `${this.baseUrl}${this.basePath}/${sessionId}`;
  }

  // Registers the stream and message routes in an encapsulated scope so the raw-body parser stays local.
  public readonly plugin: FastifyPluginAsync = async (app: FastifyInstance) => {
    app.removeAllContentTypeParsers();
    app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    const streamPath = this.basePath === '' ? '/' : this.basePath;

    app.get(streamPath, { exposeHeadRoute: false }, async (request, reply) => {
      await this.openStream(request, reply);
    });

    app.route({
      method: ['POST', 'PUT', 'PATCH', 'DELETE'],
      url: streamPath,
      handler: async (request) => {
        throw new AppError(405, 'method_not_allowed', `Method ${request.method} is not allowed on the event stream.`);
      }
    });

    app.post<{ Params: { sessionId: string } }>(`${this.basePath}/:sessionId`, async (request, reply) => {
      this.acceptMessage(request.params.sessionId, request.body);
      return reply.code(202).send();
    });

    app.route({
      method: ['GET', 'PUT', 'PATCH', 'DELETE'],
      url: `${this.basePath}/:sessionId`,
      handler: async (request) => {
        throw new AppError(405, 'method_not_allowed', `Method ${request.method} is not allowed on the message endpoint.`);
      }
    });
  };

  // Closes every open stream, used on server shutdown.
  public async closeAll(): Promise<void> {
    const sessions = [...this.sessions.values()];
    await Promise.all(sessions.map((session) => session.close()));
  }

  private acceptMessage(sessionId: string, body: unknown): void {
    const session = this.sessions.get(sessionId);
    if (!session || session.isClosed) {
      throw new AppError(404, 'session_not_found', `Session ${sessionId} was not found.`);
    }

    const text = typeof body === 'string' ? body.trim() : '';
    if (text === '') {
      throw new AppError(400, 'empty_body', 'Message body must contain JSON-RPC text.');
    }

    if (!session.push(text)) {
      throw new AppError(404, 'session_not_found', `Session ${sessionId} was not found.`);
    }

    this.logger.debug({ event: 'sse_message_accepted', sessionId, bytes: text.length }, 'sse_message_accepted');
  }

  // The stream stays open until the session closes, either from the handler side or because the client left.
  private async openStream(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const sessionId = randomUUID();
    const raw = reply.raw;

    reply.hijack();
    raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'Access-Control-Allow-Origin': '*'
    });

    const session = new SseSession(sessionId, raw);
    this.sessions.set(sessionId, session);
    raw.on('close', () => {
      void session.close();
    });

    this.logger.info({ event: 'sse_session_opened', sessionId, requestId: request.id }, 'sse_session_opened');

    try {
      await session.writeEvent('endpoint', this.endpointFor(sessionId));
      void this.handler(session, sessionId).catch(async (error: unknown) => {
        this.logger.error({ event: 'sse_session_handler_failed', sessionId, error: errorForLog(error) }, 'sse_session_handler_failed');
        await session.close();
      });
      await session.finished;
    } catch (error) {
      this.logger.warn({ event: 'sse_stream_write_failed', sessionId, error: errorForLog(error) }, 'sse_stream_write_failed');
    } finally {
      this.sessions.delete(sessionId);
      await session.close();
      this.logger.info({ event: 'sse_session_closed', sessionId }, 'sse_session_closed');
    }
  }
}
