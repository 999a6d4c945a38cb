/**
 * Compiler MCP Server — Entry Point
 *
 * Stdio transport.
 */

import { loadEnvSafely } from '@compilebox/shared/Utils/env.js';

loadEnvSafely(import.meta.url);

import { mkdir } from 'node:fs/promises';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { createServer } from './server.js';
import { getConfig } from './config.js';

const logger = new Logger('compiler');

async function main() {
  const config = getConfig();

  await mkdir(config.workspaceRoot, { recursive: true, mode: 0o700 });
  if (config.logSubmissions) {
    await mkdir(config.logDir, { recursive: true });
  }

  logger.info('Starting Compiler MCP', { transport: 'stdio' });
  logger.info(`Workspaces: ${config.workspaceRoot}`);
  logger.info(`Concurrency: ${config.maxConcurrentSubmissions}`);

  const { server, orchestrator } = createServer({ config, logger });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  orchestrator
    .warmUp()
    .then((ready) => logger.info(ready ? 'Memory probe ready' : 'Memory probe unavailable, using placeholder peaks'))
    .catch((err: unknown) => logger.warn('Memory probe warm-up failed', err));

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error('Shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  logger.info('Compiler MCP running on stdio');
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
