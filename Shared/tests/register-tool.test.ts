import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { registerTool, type ToolTextContent } from '../Utils/register-tool.js';
import { Logger } from '../Utils/logger.js';
import { ValidationError } from '../Types/errors.js';

type RegisteredCallback = (args: Record<string, unknown>) => Promise<ToolTextContent>;

function createMockServer() {
  return { registerTool: vi.fn() };
}

function quietLogger(): Logger {
  const log = new Logger('tools-test');
  log.setLevel('error');
  return log;
}

function callbackOf(server: ReturnType<typeof createMockServer>): RegisteredCallback {
  return server.registerTool.mock.calls[0][2] as RegisteredCallback;
}

function parse(result: ToolTextContent): Record<string, unknown> {
  return JSON.parse(result.content[0].text) as Record<string, unknown>;
}

describe('registerTool', () => {
  it('should call server.registerTool with name, shape and annotations', () => {
    const server = createMockServer();
    const schema = z.object({ source_code: z.string() });
    const annotations = { readOnlyHint: false, destructiveHint: false };

    registerTool(server, {
      name: 'compile_and_run',
      description: 'Compile and run',
      inputSchema: schema,
      annotations,
      handler: async () => ({ success: true, data: 'ok' }),
    });

    expect(server.registerTool).toHaveBeenCalledOnce();
    const [name, config] = server.registerTool.mock.calls[0];
    expect(name).toBe('compile_and_run');
    expect(config.description).toBe('Compile and run');
    expect(config.inputSchema).toBe(schema.shape);
    expect(config.annotations).toEqual(annotations);
  });

  describe('handler wrapper', () => {
    it('should wrap successful handler result in MCP content format', async () => {
      const server = createMockServer();
      registerTool(server, {
        name: 'stats',
        description: 'stats',
        inputSchema: z.object({}),
        logger: quietLogger(),
        handler: async () => ({ success: true, data: { entries: 5 } }),
      });

      const result = await callbackOf(server)({});
      expect(result.content).toHaveLength(1);
      expect(result.content[0].type).toBe('text');
      expect(parse(result)).toEqual({ success: true, data: { entries: 5 } });
    });

    it('should pass parsed input to the handler', async () => {
      const server = createMockServer();
      const receivedInput = vi.fn();

      registerTool(server, {
        name: 'echo',
        description: 'echo',
        inputSchema: z.object({ msg: z.string() }),
        logger: quietLogger(),
        handler: async (input) => {
          receivedInput(input);
          return { success: true };
        },
      });

      await callbackOf(server)({ msg: 'hello' });
      expect(receivedInput).toHaveBeenCalledWith({ msg: 'hello' });
    });

    it('should reject input that does not match the schema', async () => {
      const server = createMockServer();
      const handler = vi.fn(async () => ({ success: true }));

      registerTool(server, {
        name: 'echo',
        description: 'echo',
        inputSchema: z.object({ msg: z.string() }),
        logger: quietLogger(),
        handler,
      });

      const parsed = parse(await callbackOf(server)({ msg: 7 }));
      expect(handler).not.toHaveBeenCalled();
      expect(parsed.success).toBe(false);
      expect(parsed.error).toBe('Invalid input for echo');
      expect(parsed.errorCode).toBe('VALIDATION_ERROR');
    });

    it('should wrap thrown errors', async () => {
      const server = createMockServer();
      registerTool(server, {
        name: 'fail',
        description: 'fails',
        inputSchema: z.object({}),
        logger: quietLogger(),
        handler: async () => { throw new Error('Something went wrong'); },
      });

      const parsed = parse(await callbackOf(server)({}));
      expect(parsed.success).toBe(false);
      expect(parsed.error).toBe('Something went wrong');
      expect(parsed.errorCode).toBe('INTERNAL_ERROR');
    });

    it('should keep code and details of a thrown BaseError', async () => {
      const server = createMockServer();
      registerTool(server, {
        name: 'validate',
        description: 'validates',
        inputSchema: z.object({}),
        logger: quietLogger(),
        handler: async () => { throw new ValidationError('bad path', { path: '../etc' }); },
      });

      const parsed = parse(await callbackOf(server)({}));
      expect(parsed.error).toBe('bad path');
      expect(parsed.errorCode).toBe('VALIDATION_ERROR');
      expect(parsed.errorDetails).toMatchObject({ path: '../etc' });
    });

    it('should log failures at warn level', async () => {
      const server = createMockServer();
      const log = new Logger('tools-test');
      const warn = vi.spyOn(log, 'warn').mockImplementation(() => {});

      registerTool(server, {
        name: 'fail',
        description: 'fails',
        inputSchema: z.object({}),
        logger: log,
        handler: async () => { throw 'string error'; },
      });

      const parsed = parse(await callbackOf(server)({}));
      expect(parsed.error).toBe('string error');
      expect(warn).toHaveBeenCalledWith('fail failed', expect.objectContaining({ error: 'string error' }));
    });
  });
});
