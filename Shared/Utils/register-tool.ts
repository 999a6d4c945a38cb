/**
 * Tool registration wrapper for McpServer.
 *
 * - Handler returns a StandardResponse; the wrapper formats it as MCP text content
 * - Input is parsed with the tool's Zod schema; a mismatch is a VALIDATION_ERROR
 * - Anything thrown becomes an error StandardResponse
 * - Each call is logged with its duration
 */

import type { z } from 'zod';
import { ValidationError } from '../Types/errors.js';
import type { StandardResponse } from '../Types/StandardResponse.js';
import { createErrorFromException } from '../Types/StandardResponse.js';
import { Logger } from './logger.js';

/**
 * Structural view of McpServer so the wrapper does not pin an SDK version.
 */
interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolTextContent {
  content: Array<{ type: 'text'; text: string }>;
}

const defaultLogger = new Logger('tools');

function toContent(response: StandardResponse): ToolTextContent {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(response) }],
  };
}

function parseInput<S extends z.ZodTypeAny>(schema: S, toolName: string, args: unknown): z.infer<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ValidationError(`Invalid input for ${toolName}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function registerTool<T extends z.AnyZodObject>(
  server: McpServerLike,
  config: {
    name: string;
    description: string;
    inputSchema: T;
    annotations?: ToolAnnotations;
    logger?: Logger;
    handler: (input: z.infer<NoInfer<T>>) => Promise<StandardResponse>;
  }
): void {
  const log = config.logger ?? defaultLogger;

  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: Record<string, unknown>): Promise<ToolTextContent> => {
      const startedAt = Date.now();
      try {
        const input = parseInput(config.inputSchema, config.name, args);
        const result = await config.handler(input);
        log.debug(`${config.name} finished`, { durationMs: Date.now() - startedAt, success: result.success });
        return toContent(result);
      } catch (error) {
        log.warn(`${config.name} failed`, { durationMs: Date.now() - startedAt, error });
        return toContent(createErrorFromException(error));
      }
    }
  );
}
