// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

// Connections, transports and the HTTP server all log through the fastify-compatible pino surface.
export type Logger = FastifyBaseLogger;

const MAX_LOG_DEPTH = 5;
const MAX_LOG_STRING_LENGTH = 1024;
const MAX_LOG_ARRAY_ITEMS = 30;
const MAX_LOG_OBJECT_KEYS = 30;

// Header snapshots never carry credentials; these paths cover secrets in fields passed by embedders.
const REDACT_PATHS = ['*.authorization', '*.cookie', '*.password', '*.apiKey'];

// This helper returns true for field names that should never be logged in cleartext.
function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes('token') ||
    normalized.includes('password') ||
    normalized.includes('passphrase') ||
    normalized.includes('authorization') ||
    normalized.includes('cookie') ||
    normalized.includes('secret') ||
    normalized.includes('api_key') ||
    normalized.includes('apikey')
  );
}

// This helper truncates large strings so high-volume logs stay bounded and readable.
function truncateString(value: string): string {
  if (value.length <= MAX_LOG_STRING_LENGTH) {
    return value;
  }

  return `${value.slice(0, MAX_LOG_STRING_LENGTH)}...[truncated:${value.length - MAX_LOG_STRING_LENGTH}]`;
}

// This helper returns a stable short hash to correlate sensitive identifiers without exposing raw values.
function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 12);
}

// This helper sanitizes arbitrary payloads recursively while preserving debug utility.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (depth > MAX_LOG_DEPTH) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return truncateString(value);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Uint8Array) {
    return `[bytes:${value.byteLength}]`;
  }

  if (Array.isArray(value)) {
    const truncatedArray = value.slice(0, MAX_LOG_ARRAY_ITEMS).map((item: unknown) => sanitizeForLog(item, depth + 1));
    if (value.length > MAX_LOG_ARRAY_ITEMS) {
      truncatedArray.push(`[truncated-items:${value.length - MAX_LOG_ARRAY_ITEMS}]`);
    }
    return truncatedArray;
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value);
    const target: Record<string, unknown> = {};

    for (const [key, entryValue] of entries.slice(0, MAX_LOG_OBJECT_KEYS)) {
      if (isSensitiveKey(key)) {
        const serialized = typeof entryValue === 'string' ? entryValue : JSON.stringify(entryValue ?? '');
        target[key] = `[redacted:${shortHash(serialized)}]`;
        continue;
      }

      target[key] = sanitizeForLog(entryValue, depth + 1);
    }

    if (entries.length > MAX_LOG_OBJECT_KEYS) {
      target.__truncatedKeys = entries.length - MAX_LOG_OBJECT_KEYS;
    }

    return target;
  }

  return String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one logger configuration shared by fastify and standalone connections.
export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// Stdio mode owns stdout for protocol frames, so its logs are written to stderr.
export function createStderrLogger(level?: string): Logger {
  return pino(buildLoggerOptions(level), pino.destination(2));
}

// This helper returns a logger that drops everything, used as the default for embedded connections.
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
