// This file defines the MCP payload types exchanged over a JSON-RPC connection.

// Free-form metadata that MCP allows on requests and results.
export type McpMeta = Record<string, unknown>;

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface McpResource {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
  // Size in bytes before any encoding.
  size?: number;
}

export interface McpResourceTemplate {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface TextResourceContents {
  uri: string;
  mimeType?: string;
  text: string;
}

export interface BlobResourceContents {
  uri: string;
  mimeType?: string;
  // Base64 encoded.
  blob: string;
}

export type ResourceContents = TextResourceContents | BlobResourceContents;

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageContent {
  type: 'image';
  // Base64 encoded.
  data: string;
  mimeType: string;
}

export interface EmbeddedResource {
  type: 'resource';
  resource: ResourceContents;
}

export type McpContent = TextContent | ImageContent | EmbeddedResource;

export interface ToolCallResult {
  content: McpContent[];
  isError: boolean;
  _meta?: McpMeta;
}

export interface ListToolsResult {
  tools: McpTool[];
  nextCursor?: string;
  _meta?: McpMeta;
}

export interface ListResourcesResult {
  resources: McpResource[];
  nextCursor?: string;
  _meta?: McpMeta;
}

export interface ListResourceTemplatesResult {
  resourceTemplates: McpResourceTemplate[];
  nextCursor?: string;
  _meta?: McpMeta;
}

export interface ReadResourceResult {
  contents: ResourceContents[];
  _meta?: McpMeta;
}

export interface ServerCapabilities {
  logging?: Record<string, never>;
  prompts?: { listChanged?: boolean };
  resources?: { subscribe?: boolean; listChanged?: boolean };
  tools?: { listChanged?: boolean };
}

export interface ImplementationInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: ImplementationInfo;
  instructions?: string;
  _meta?: McpMeta;
}
