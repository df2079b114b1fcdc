// This module implements the MCP server on top of the JSON-RPC connection: lifecycle, tools and resources.

import { z } from 'zod';
import { Connection, type DispatchMode } from '../jsonrpc/connection.js';
import { ConnectionClosedError, ErrorCode, RpcError } from '../jsonrpc/errors.js';
import { HandlerRegistry, type MethodHandler, typedHandler } from '../jsonrpc/handlers.js';
import { RouteNotFoundError, type RouteHandler, UriParseError, UriRouter } from '../router/router.js';
import { SseSessionManager } from '../transport/sse.js';
import { createStdioSession } from '../transport/stream.js';
import type { Session, SessionHandler } from '../transport/transport.js';
import type {
  InitializeResult,
  ListResourceTemplatesResult,
  ListResourcesResult,
  ListToolsResult,
  McpResource,
  McpResourceTemplate,
  McpTool,
  ReadResourceResult,
  ToolCallResult
} from '../types/mcp.js';
import { type Logger, createSilentLogger, errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import type { RegisteredTool } from './tools.js';

export interface McpServerOptions {
  name?: string;
  version?: string;
  instructions?: string;
  tools?: RegisteredTool[];
  logger?: Logger;
  dispatch?: DispatchMode;
  // Registered after the built-in methods, so an entry for an existing method replaces it.
  customHandlers?: Record<string, MethodHandler>;
}

export interface McpServeOptions {
  signal?: AbortSignal;
}

export interface SseManagerOptions {
  basePath?: string;
  baseUrl?: string;
}

const metaSchema = z.record(z.unknown()).optional();

const initializeParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: z.record(z.unknown()).optional(),
    clientInfo: z.object({ name: z.string(), version: z.string() }).partial().optional(),
    _meta: metaSchema
  })
  .passthrough();

const listParamsSchema = z.object({ cursor: z.string().optional(), _meta: metaSchema }).passthrough();

const callToolParamsSchema = z
  .object({
    name: z.string().min(1),
    arguments: z.record(z.unknown()).optional(),
    _meta: metaSchema
  })
  .passthrough();

const readResourceParamsSchema = z.object({ uri: z.string().min(1), _meta: metaSchema }).passthrough();

export class McpServer {
  public readonly name: string;
  public readonly version: string;
  private readonly instructions: string | undefined;
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly resources: McpResource[] = [];
  private readonly resourceTemplates: McpResourceTemplate[] = [];
  private readonly resourceRouter = new UriRouter<ReadResourceResult>();
  private readonly customHandlers: Array<[string, MethodHandler]>;
  private readonly connections = new Set<Connection>();
  private readonly logger: Logger;
  private readonly dispatch: DispatchMode;

  public constructor(options: McpServerOptions = {}) {
    this.name = options.name ?? MCP_SERVER_NAME;
    this.version = options.version ?? MCP_SERVER_VERSION;
    this.instructions = options.instructions;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'mcp' });
    this.dispatch = options.dispatch ?? 'concurrent';
    this.customHandlers = Object.entries(options.customHandlers ?? {});

    for (const tool of options.tools ?? []) {
      this.addTool(tool);
    }
  }

  // A later tool with the same name replaces the earlier one.
  public addTool(tool: RegisteredTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  // This method lists a fixed resource and routes reads of its URI to the reader.
  public addResource(resource: McpResource, reader: RouteHandler<ReadResourceResult>): this {
    this.resourceRouter.handle(resource.uri, reader);
    this.resources.push(resource);
    return this;
  }

  // Template parameters written as `{name}` are bound by the resource router.
  public addResourceTemplate(template: McpResourceTemplate, reader: RouteHandler<ReadResourceResult>): this {
    this.resourceRouter.handle(template.uriTemplate, reader);
    this.resourceTemplates.push(template);
    return this;
  }

  // Reads of URIs that no resource or template matches go here instead of failing.
  public setResourceFallback(reader: RouteHandler<ReadResourceResult> | null): this {
    this.resourceRouter.setNotFoundHandler(reader);
    return this;
  }

  public describeTool(name: string): McpTool | undefined {
    return this.tools.get(name)?.describe();
  }

  public get connectionCount(): number {
    return this.connections.size;
  }

  // This method serves one session until it ends; a peer that goes away is a normal end.
  public async serve(session: Session, options: McpServeOptions = {}): Promise<void> {
    const connection = new Connection(session, {
      handlers: this.buildHandlers(),
      logger: this.logger,
      dispatch: this.dispatch
    });

    this.connections.add(connection);
    this.logger.info({ event: 'mcp_connection_opened', connections: this.connections.size }, 'mcp_connection_opened');

    try {
      await connection.serve({ signal: options.signal });
    } catch (error) {
      if (!(error instanceof ConnectionClosedError)) {
        throw error;
      }
    } finally {
      this.connections.delete(connection);
      this.logger.info({ event: 'mcp_connection_closed', connections: this.connections.size }, 'mcp_connection_closed');
    }
  }

  public serveStdio(options: McpServeOptions = {}): Promise<void> {
    return this.serve(createStdioSession(), options);
  }

  public sessionHandler(): SessionHandler {
    return async (session, sessionId) => {
      this.logger.debug({ event: 'mcp_sse_session_started', sessionId }, 'mcp_sse_session_started');
      await this.serve(session);
    };
  }

  public createSseManager(options: SseManagerOptions = {}): SseSessionManager {
    return new SseSessionManager({
      handler: this.sessionHandler(),
      basePath: options.basePath,
      baseUrl: options.baseUrl,
      logger: this.logger
    });
  }

  public async close(): Promise<void> {
    const connections = [...this.connections];
    await Promise.all(connections.map((connection) => connection.close()));
  }

  private buildHandlers(): HandlerRegistry {
    const registry = new HandlerRegistry({
      ping: () => ({}),
      initialize: typedHandler(initializeParamsSchema, (params) => this.initialize(params)),
      'notifications/initialized': () => {
        this.logger.debug({ event: 'mcp_client_initialized' }, 'mcp_client_initialized');
      },
      'tools/list': typedHandler(listParamsSchema, (params) => this.listTools(params.cursor)),
      'tools/call': typedHandler(callToolParamsSchema, (params, context) =>
        this.callTool(params.name, params.arguments, context.signal, context.logger)
      ),
      'resources/list': typedHandler(listParamsSchema, (): ListResourcesResult => ({ resources: [...this.resources] })),
      'resources/templates/list': typedHandler(
        listParamsSchema,
        (): ListResourceTemplatesResult => ({ resourceTemplates: [...this.resourceTemplates] })
      ),
      'resources/read': typedHandler(readResourceParamsSchema, (params, context) =>
        this.readResource(params.uri, context.signal)
      )
    });

    for (const [method, handler] of this.customHandlers) {
      registry.register(method, handler);
    }

    return registry;
  }

  private initialize(params: z.output<typeof initializeParamsSchema>): InitializeResult {
    this.logger.info(
      {
        event: 'mcp_initialize',
        clientProtocolVersion: params.protocolVersion ?? null,
        clientInfo: sanitizeForLog(params.clientInfo ?? null)
      },
      'mcp_initialize'
    );

    const result: InitializeResult = {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {
        tools: { listChanged: false },
        resources: { subscribe: false, listChanged: false }
      },
      serverInfo: { name: this.name, version: this.version }
    };

    if (this.instructions !== undefined) {
      result.instructions = this.instructions;
    }

    return result;
  }

  private listTools(cursor: string | undefined): ListToolsResult {
    if (cursor !== undefined && cursor !== '') {
      throw RpcError.invalidRequest('cursor is not supported', { cursor });
    }

    const tools = [...this.tools.values()]
      .map((tool) => tool.describe())
      .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

    return { tools };
  }

  private async callTool(
    name: string,
    args: Record<string, unknown> | undefined,
    signal: AbortSignal,
    logger: Logger
  ): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      logger.warn({ event: 'mcp_tool_not_found', toolName: name }, 'mcp_tool_not_found');
      throw new RpcError(ErrorCode.MethodNotFound, 'tool not found', { tool: name });
    }

    const startedAt = Date.now();
    const result = await tool.invoke(args, { signal, logger });
    logger.info(
      { event: 'mcp_tool_execution_completed', toolName: name, isError: result.isError, durationMs: Date.now() - startedAt },
      'mcp_tool_execution_completed'
    );

    return result;
  }

  private async readResource(uri: string, signal: AbortSignal): Promise<ReadResourceResult> {
    try {
      return await this.resourceRouter.execute(uri, { signal });
    } catch (error) {
      if (error instanceof RouteNotFoundError || error instanceof UriParseError) {
        this.logger.info({ event: 'mcp_resource_not_found', uri, reason: error.message }, 'mcp_resource_not_found');
        throw RpcError.invalidParams(`Resource not found: ${uri}`, { uri });
      }

      this.logger.warn({ event: 'mcp_resource_read_failed', uri, error: errorForLog(error) }, 'mcp_resource_read_failed');
      throw error;
    }
  }
}
