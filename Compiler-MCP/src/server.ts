/**
 * Compiler MCP Server
 *
 * Registers the compile-and-run tools on an McpServer instance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerTool } from '@compilebox/shared/Utils/register-tool.js';
import { createSuccess } from '@compilebox/shared/Types/StandardResponse.js';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { getConfig, type CompilerConfig } from './config.js';
import { createOrchestrator, type PipelineOrchestrator } from './pipeline/orchestrator.js';
import {
  compileAndRunSchema,
  handleCompileAndRun,
  cacheStatsSchema,
  handleCacheStats,
} from './tools/compile-and-run.js';

export interface CreateServerOptions {
  config?: CompilerConfig;
  orchestrator?: PipelineOrchestrator;
  logger?: Logger;
}

export function createServer(
  options: CreateServerOptions = {},
): { server: McpServer; orchestrator: PipelineOrchestrator } {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? new Logger('compiler');
  const orchestrator = options.orchestrator ?? createOrchestrator(config, logger);

  const server = new McpServer({
    name: 'compilebox',
    version: '1.0.0',
  });

  registerTool(server, {
    name: 'compile_and_run',
    description:
      'Compile a single Java source file and run it when it declares a main method. ' +
      'Each call gets a fresh, isolated workspace; identical sources reuse cached bytecode.\n\n' +
      'Args:\n' +
      '  - source_code (string): Full source. The first public class names the file.\n\n' +
      'Returns: { submissionId, className, compilationOutput, compilationSuccess, compilationCached, ' +
      'compilationTimeMs, executionOutput, executionSuccess, executionTimeMs, peakMemoryBytes, timedOut, failure }',
    inputSchema: compileAndRunSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: false,
    },
    logger,
    handler: async (params) => {
      const result = await handleCompileAndRun(orchestrator, {
        enabled: config.logSubmissions,
        logDir: config.logDir,
      })(params);
      return createSuccess(result);
    },
  });

  registerTool(server, {
    name: 'cache_stats',
    description:
      'Report artifact cache counters and submission pool occupancy.\n\n' +
      'Returns: { cache: { entries, bytes, hits, misses, evictions, reclaimed }, ' +
      'activeSubmissions, pendingSubmissions, liveWorkspaces }',
    inputSchema: cacheStatsSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    },
    logger,
    handler: async (params) => {
      const result = await handleCacheStats(orchestrator)(params);
      return createSuccess(result);
    },
  });

  return { server, orchestrator };
}
