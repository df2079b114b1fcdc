// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { RuntimeConfig } from './config/config.js';
import { registerBuiltins } from './mcp/builtin.js';
import { McpServer } from './mcp/server.js';
import type { SseSessionManager } from './transport/sse.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';

export interface ServerResources {
  app: FastifyInstance;
  mcp: McpServer;
  sse: SseSessionManager;
}

export interface CreateServerOptions {
  // Defaults to a server carrying only the built-in tools and resources.
  mcp?: McpServer;
  // Disables request logging, used by tests.
  logger?: boolean;
}

// This helper builds a safe header snapshot for request diagnostics without leaking secrets.
function buildRequestHeaderSnapshot(request: FastifyRequest): unknown {
  const headers = request.headers;
  return sanitizeForLog({
    host: headers.host ?? null,
    'x-forwarded-host': headers['x-forwarded-host'] ?? null,
    'x-forwarded-proto': headers['x-forwarded-proto'] ?? null,
    'x-forwarded-for': headers['x-forwarded-for'] ?? null,
    'user-agent': headers['user-agent'] ?? null,
    accept: headers.accept ?? null,
    'content-type': headers['content-type'] ?? null,
    'content-length': headers['content-length'] ?? null
  });
}

// This function builds and configures the full HTTP application.
export function createServer(config: RuntimeConfig, options: CreateServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: options.logger === false ? false : buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    trustProxy: true
  });

  const mcp = options.mcp ?? registerBuiltins(new McpServer({ logger: app.log }));
  const sse = mcp.createSseManager({ basePath: config.ssePath, baseUrl: config.baseUrl });
  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        headers: buildRequestHeaderSnapshot(request)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION
    };
  });

  // This endpoint keeps root machine-facing and points clients at the event stream.
  app.get('/', async () => {
    return {
      ok: true,
      service: MCP_SERVER_NAME,
      sseEndpoint: config.ssePath,
      activeSessions: sse.size
    };
  });

  void app.register(sse.plugin);

  // Open event streams never finish on their own, so they are ended before the listener closes.
  app.addHook('preClose', async () => {
    await mcp.close();
    await sse.closeAll();
  });

  // This handler maps internal exceptions into structured JSON errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = normalized.statusCode;
    const log = status >= 500 ? request.log.error.bind(request.log) : request.log.warn.bind(request.log);

    log(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    void reply.status(status).send({
      ok: false,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details
      }
    });
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    void reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    mcp,
    sse
  };
}
