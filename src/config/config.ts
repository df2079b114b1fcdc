// This module loads runtime configuration from environment variables and validates it with zod.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// This helper validates the optional public base URL advertised to SSE clients.
function isPublicBaseUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }

  return (url.protocol === 'http:' || url.protocol === 'https:') && url.search === '' && url.hash === '';
}

const emptyToUndefined = (value: unknown): unknown => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z.object({
  MCP_TRANSPORT: z.preprocess(emptyToUndefined, z.enum(['stdio', 'sse']).default('sse')),
  HOST: z.preprocess(emptyToUndefined, z.string().min(1).default('0.0.0.0')),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8080)),
  MCP_BASE_URL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .refine(isPublicBaseUrl, 'MCP_BASE_URL must be an absolute http(s) URL without query or fragment.')
      .transform((value) => value.replace(/\/+$/, ''))
      .optional()
  ),
  MCP_SSE_PATH: z.preprocess(
    emptyToUndefined,
    z.string().regex(/^\/[^?#\s]*$/, 'MCP_SSE_PATH must start with a slash.').default('/sse')
  ),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default('info'))
});

export type TransportMode = 'stdio' | 'sse';

export interface RuntimeConfig {
  transport: TransportMode;
  host: string;
  port: number;
  baseUrl: string | undefined;
  ssePath: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

// This function reads the process environment by default and fails fast on invalid values.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid runtime configuration.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  return {
    transport: values.MCP_TRANSPORT,
    host: values.HOST,
    port: values.PORT,
    baseUrl: values.MCP_BASE_URL,
    ssePath: values.MCP_SSE_PATH,
    logLevel: values.LOG_LEVEL
  };
}
