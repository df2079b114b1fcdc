#!/usr/bin/env node
// This is the process entrypoint that starts the stdio or HTTP transport and handles graceful shutdown.

import { type RuntimeConfig, loadConfig } from './config/config.js';
import { registerBuiltins } from './mcp/builtin.js';
import { McpServer } from './mcp/server.js';
import { createServer } from './server.js';
import { createStderrLogger, errorForLog } from './utils/logger.js';

async function runStdio(config: RuntimeConfig): Promise<void> {
  const logger = createStderrLogger(config.logLevel);
  const mcp = registerBuiltins(new McpServer({ logger }));
  const controller = new AbortController();

  const shutdown = (signal: string): void => {
    logger.info({ event: 'shutdown_started', signal }, 'shutdown_started');
    controller.abort(new Error(`Received ${signal}.`));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  logger.info({ event: 'server_started', transport: 'stdio' }, 'server_started');

  try {
    await mcp.serveStdio({ signal: controller.signal });
  } catch (error) {
    if (!controller.signal.aborted) {
      throw error;
    }
  }

  logger.info({ event: 'shutdown_completed' }, 'shutdown_completed');
  process.exit(0);
}

async function runHttp(config: RuntimeConfig): Promise<void> {
  const { app } = createServer(config);

  // This helper closes open event streams before the listener so shutdown does not hang.
  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');
    try {
      await app.close();
    } catch (error) {
      app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
      process.exit(1);
    }

    app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: config.host, port: config.port });
  app.log.info({ event: 'server_started', transport: 'sse', host: config.host, port: config.port }, 'server_started');
}

async function main(): Promise<void> {
  const config = loadConfig();
  await (config.transport === 'stdio' ? runStdio(config) : runHttp(config));
}

main().catch((error: unknown) => {
  process.stderr.write(`${JSON.stringify({ event: 'server_start_failed', error: errorForLog(error) })}\n`);
  process.exit(1);
});
