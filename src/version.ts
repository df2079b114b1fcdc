// This module centralizes server identity values so protocol metadata and HTTP endpoints stay in sync.

export const MCP_SERVER_NAME = 'duplex-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
export const JSONRPC_VERSION = '2.0';
