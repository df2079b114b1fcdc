// This module registers the tools and resources every server instance exposes about itself.

import { z } from 'zod';
import { RpcError } from '../jsonrpc/errors.js';
import { MCP_PROTOCOL_VERSION } from '../version.js';
import { textResourceContents } from './content.js';
import type { McpServer } from './server.js';
import { defineTool } from './tools.js';

export const SERVER_INFO_URI = 'mcp://server/info';
export const TOOL_TEMPLATE_URI = 'mcp://server/tools/{name}';

export function registerBuiltins(server: McpServer): McpServer {
  const serverInfo = () => ({
    name: server.name,
    version: server.version,
    protocolVersion: MCP_PROTOCOL_VERSION,
    connections: server.connectionCount
  });

  server.addTool(
    defineTool({
      name: 'get_server_info',
      description: 'Return server name, version, protocol version and open connection count.',
      input: z.object({}).strict(),
      handler: () => serverInfo()
    })
  );

  server.addTool(
    defineTool({
      name: 'echo',
      description: 'Return the given text unchanged, optionally repeated.',
      input: z.object({
        text: z.string().max(10_000),
        times: z.number().int().min(1).max(10).default(1)
      }),
      handler: (input) => Array.from({ length: input.times }, () => input.text)
    })
  );

  server.addResource(
    { uri: SERVER_INFO_URI, name: 'Server info', mimeType: 'application/json' },
    ({ uri }) => ({ contents: [textResourceContents(uri, JSON.stringify(serverInfo()), 'application/json')] })
  );

  server.addResourceTemplate(
    { uriTemplate: TOOL_TEMPLATE_URI, name: 'Tool description', mimeType: 'application/json' },
    ({ uri, params }) => {
      const tool = server.describeTool(params.name);
      if (!tool) {
        throw RpcError.invalidParams(`Unknown tool: ${params.name}`, { uri });
      }

      return { contents: [textResourceContents(uri, JSON.stringify(tool), 'application/json')] };
    }
  );

  return server;
}
