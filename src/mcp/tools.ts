// This module declares MCP tools with zod input schemas and runs tool calls into normalized results.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpContent, McpTool, ToolCallResult } from '../types/mcp.js';
import { type Logger, errorForLog, sanitizeForLog } from '../utils/logger.js';
import { textContent, toContent } from './content.js';

export interface ToolRuntimeContext {
  signal: AbortSignal;
  logger: Logger;
}

export interface ToolDefinition<S extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  input: S;
  // A tool may return one value or a list; each element becomes one content block.
  handler: (input: z.output<S>, context: ToolRuntimeContext) => unknown;
}

export interface RegisteredTool {
  readonly name: string;
  describe(): McpTool;
  invoke(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult>;
}

// This helper converts a zod schema into the inline JSON Schema object advertised by tools/list.
export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _schemaUri, ...inline } = zodToJsonSchema(schema, { $refStrategy: 'none' });
  return { ...inline };
}

function errorResult(message: string): ToolCallResult {
  return { isError: true, content: [textContent(message)] };
}

function formatIssues(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });

  return `Invalid tool input. ${issues.join('; ')}`;
}

// This function builds a registered tool whose failures are reported as isError results.
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  const inputSchema = toInputSchema(definition.input);

  return {
    name: definition.name,
    describe: () => ({ name: definition.name, description: definition.description, inputSchema }),
    invoke: async (args, context) => {
      const parsed = definition.input.safeParse(args ?? {});
      if (!parsed.success) {
        context.logger.info(
          { event: 'mcp_tool_input_invalid', toolName: definition.name, issues: sanitizeForLog(parsed.error.issues) },
          'mcp_tool_input_invalid'
        );
        return errorResult(formatIssues(parsed.error));
      }

      let output: unknown;
      try {
        const input: z.output<S> = parsed.data;
        output = await definition.handler(input, context);
      } catch (error) {
        context.logger.warn(
          { event: 'mcp_tool_execution_failed', toolName: definition.name, error: errorForLog(error) },
          'mcp_tool_execution_failed'
        );
        return errorResult(error instanceof Error ? error.message : String(error));
      }

      // Returning nothing yields an empty content list.
      const values: unknown[] = output === undefined ? [] : Array.isArray(output) ? output : [output];
      const content: McpContent[] = [];
      try {
        for (const value of values) {
          content.push(toContent(value));
        }
      } catch (error) {
        return errorResult(error instanceof Error ? error.message : String(error));
      }

      return { isError: false, content };
    }
  };
}
