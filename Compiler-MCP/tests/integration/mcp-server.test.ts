/**
 * MCP server tests over InMemoryTransport, with the fake toolchain behind
 * the orchestrator.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer } from '../../src/server.js';
import { PipelineOrchestrator } from '../../src/pipeline/orchestrator.js';
import type { CompilerConfig } from '../../src/config.js';
import { fakeToolchain, HELLO_WORLD, quietLogger, tempRoot, testConfig } from '../helpers.js';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

const responseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  errorCode: z.string().optional(),
  data: z.unknown().optional(),
});

const submissionSchema = z.object({
  submissionId: z.string(),
  className: z.string().nullable(),
  compilationOutput: z.string(),
  compilationSuccess: z.boolean(),
  compilationCached: z.boolean(),
  executionOutput: z.string(),
  executionSuccess: z.boolean(),
  peakMemoryBytes: z.number(),
  timedOut: z.boolean(),
  failure: z.string().nullable(),
});

const statsSchema = z.object({
  cache: z.object({ entries: z.number(), hits: z.number(), misses: z.number() }),
  activeSubmissions: z.number(),
  liveWorkspaces: z.number(),
});

let root: string;
let client: Client;

async function connect(config: CompilerConfig): Promise<void> {
  const orchestrator = new PipelineOrchestrator({
    config,
    toolchain: fakeToolchain(config),
    logger: quietLogger(),
  });
  const { server } = createServer({ config, orchestrator, logger: quietLogger() });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: 'compilebox-test', version: '1.0.0' });
  await client.connect(clientTransport);
}

async function call(name: string, args: Record<string, unknown>) {
  const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
  return responseSchema.parse(JSON.parse(result.content[0].text));
}

beforeEach(() => {
  root = tempRoot('compilebox-mcp');
});

afterEach(async () => {
  await client.close();
  await rm(root, { recursive: true, force: true });
});

describe('Compiler MCP server', () => {
  it('should list both tools with annotations', async () => {
    await connect(testConfig(root));
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual(['cache_stats', 'compile_and_run']);
    const stats = tools.find((t) => t.name === 'cache_stats');
    expect(stats?.annotations?.readOnlyHint).toBe(true);
    const run = tools.find((t) => t.name === 'compile_and_run');
    expect(run?.inputSchema.properties).toHaveProperty('source_code');
  });

  it('should compile and run through compile_and_run', async () => {
    await connect(testConfig(root));
    const response = await call('compile_and_run', { source_code: HELLO_WORLD });

    expect(response.success).toBe(true);
    const result = submissionSchema.parse(response.data);
    expect(result.className).toBe('HelloWorld');
    expect(result.compilationOutput).toBe('Compilation successful');
    expect(result.executionOutput).toBe('Hello, World!');
    expect(result.failure).toBeNull();
  });

  it('should return input errors as a successful call with a failed submission', async () => {
    await connect(testConfig(root));
    const response = await call('compile_and_run', { source_code: '' });

    const result = submissionSchema.parse(response.data);
    expect(result.compilationOutput).toBe('Error: Source code cannot be empty');
    expect(result.failure).toBe('input-error');
  });

  it('should report cache counters through cache_stats', async () => {
    await connect(testConfig(root));
    await call('compile_and_run', { source_code: HELLO_WORLD });
    await call('compile_and_run', { source_code: HELLO_WORLD });

    const response = await call('cache_stats', {});
    const stats = statsSchema.parse(response.data);
    expect(stats.cache).toEqual({ entries: 1, hits: 1, misses: 1 });
    expect(stats.activeSubmissions).toBe(0);
    expect(stats.liveWorkspaces).toBe(0);
  });

  it('should append a submission log line when enabled', async () => {
    const config = testConfig(root, { logSubmissions: true });
    await connect(config);
    const response = await call('compile_and_run', { source_code: HELLO_WORLD });
    const result = submissionSchema.parse(response.data);

    await vi.waitFor(async () => {
      const files = await readdir(config.logDir);
      expect(files).toHaveLength(1);
      const line = (await readFile(join(config.logDir, files[0]), 'utf-8')).trim();
      expect(JSON.parse(line)).toMatchObject({
        type: 'submission',
        submission_id: result.submissionId,
        class_name: 'HelloWorld',
        compilation_success: true,
        execution_success: true,
      });
    });
  });
});
