// This module builds MCP content blocks and converts arbitrary tool output into them.

import type {
  BlobResourceContents,
  EmbeddedResource,
  ImageContent,
  McpContent,
  ResourceContents,
  TextContent,
  TextResourceContents
} from '../types/mcp.js';

export function textContent(text: string): TextContent {
  return { type: 'text', text };
}

export function imageContent(data: Uint8Array, mimeType: string): ImageContent {
  return { type: 'image', data: Buffer.from(data).toString('base64'), mimeType };
}

export function embeddedResource(resource: ResourceContents): EmbeddedResource {
  return { type: 'resource', resource };
}

export function textResourceContents(uri: string, text: string, mimeType?: string): TextResourceContents {
  return mimeType === undefined ? { uri, text } : { uri, mimeType, text };
}

export function blobResourceContents(uri: string, data: Uint8Array, mimeType?: string): BlobResourceContents {
  const blob = Buffer.from(data).toString('base64');
  return mimeType === undefined ? { uri, blob } : { uri, mimeType, blob };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isResourceContents(value: unknown): value is ResourceContents {
  if (!isRecord(value) || typeof value.uri !== 'string') {
    return false;
  }

  return typeof value.text === 'string' || typeof value.blob === 'string';
}

export function isContent(value: unknown): value is McpContent {
  if (!isRecord(value)) {
    return false;
  }

  switch (value.type) {
    case 'text':
      return typeof value.text === 'string';
    case 'image':
      return typeof value.data === 'string' && typeof value.mimeType === 'string';
    case 'resource':
      return isResourceContents(value.resource);
    default:
      return false;
  }
}

export class ContentConversionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ContentConversionError';
  }
}

// Strings become text, content blocks pass through, and everything else is JSON-encoded into text.
export function toContent(value: unknown): McpContent {
  if (typeof value === 'string') {
    return textContent(value);
  }

  if (isContent(value)) {
    return value;
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    throw new ContentConversionError(
      `Failed to encode tool output: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (encoded === undefined) {
    throw new ContentConversionError(`Failed to encode tool output of type ${typeof value}.`);
  }

  return textContent(encoded);
}
