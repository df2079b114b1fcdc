// Public entry point for embedding the connection, router, transports and MCP server.

export { Connection } from './jsonrpc/connection.js';
export type { CallOptions, ConnectionOptions, ConnectionState, DispatchMode, RequestOptions, ServeOptions } from './jsonrpc/connection.js';
export {
  ConnectionClosedError,
  ErrorCode,
  RequestTimeoutError,
  RpcError,
  toRpcError
} from './jsonrpc/errors.js';
export type { JsonRpcErrorObject } from './jsonrpc/errors.js';
export { HandlerRegistry, typedHandler } from './jsonrpc/handlers.js';
export type { HandlerContext, MethodHandler, PeerChannel } from './jsonrpc/handlers.js';
export {
  CounterIdGenerator,
  NULL_ID,
  formatRequestId,
  numberId,
  parseRequestId,
  requestIdEquals,
  requestIdKey,
  requestIdToJson,
  stringId,
  toRequestId
} from './jsonrpc/id.js';
export type { IdGenerator, JsonRequestId, RequestId } from './jsonrpc/id.js';
export {
  classifyMessage,
  decodeJson,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeSuccess
} from './jsonrpc/message.js';
export type {
  ClassifiedMessage,
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
  ResponseOutcome
} from './jsonrpc/message.js';
export { CorrelationTable } from './jsonrpc/pending.js';
export {
  RouteConflictError,
  RouteNotFoundError,
  RoutePatternError,
  UriParseError,
  UriRouter
} from './router/router.js';
export type { RouteContext, RouteHandler, RouteRequest } from './router/router.js';
export { discardSession } from './transport/discard.js';
export { createPipe } from './transport/pipe.js';
export { AsyncQueue } from './transport/queue.js';
export { SseSession, SseSessionManager } from './transport/sse.js';
export type { SseSessionManagerOptions } from './transport/sse.js';
export { StreamSession, createStdioSession } from './transport/stream.js';
export { SessionClosedError } from './transport/transport.js';
export type { Session, SessionHandler } from './transport/transport.js';
export {
  ContentConversionError,
  blobResourceContents,
  embeddedResource,
  imageContent,
  textContent,
  textResourceContents,
  toContent
} from './mcp/content.js';
export { registerBuiltins } from './mcp/builtin.js';
export { McpServer } from './mcp/server.js';
export type { McpServeOptions, McpServerOptions } from './mcp/server.js';
export { defineTool, toInputSchema } from './mcp/tools.js';
export type { RegisteredTool, ToolDefinition, ToolRuntimeContext } from './mcp/tools.js';
export type * from './types/mcp.js';
export { loadConfig } from './config/config.js';
export type { RuntimeConfig } from './config/config.js';
export { createServer } from './server.js';
export type { CreateServerOptions, ServerResources } from './server.js';
