/**
 * Compiler MCP configuration
 *
 * Zod-validated environment config, resource ceilings for the compiler and
 * runtime subprocesses, and environment stripping for those subprocesses.
 */

import { z } from 'zod';
import { availableParallelism, homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '@compilebox/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const configSchema = z.object({
  workspaceRoot: z.string().default(join(tmpdir(), 'compilebox')),
  logDir: z.string().default('~/.compilebox/logs'),
  logSubmissions: booleanFlag.default(false),

  javaHome: z.string().default(''),
  javacPath: z.string().default('javac'),
  javaPath: z.string().default('java'),

  compileTimeoutMs: z.coerce.number().int().positive().default(10_000),
  executeTimeoutMs: z.coerce.number().int().positive().default(10_000),
  maxHeapMb: z.coerce.number().int().positive().default(128),
  maxStackKb: z.coerce.number().int().positive().default(1_024),
  maxMetaspaceMb: z.coerce.number().int().positive().default(64),
  maxDirectMemoryMb: z.coerce.number().int().positive().default(32),
  compilerHeapMb: z.coerce.number().int().positive().default(256),

  maxSourceBytes: z.coerce.number().int().positive().default(512_000), // 500KB
  outputHeadBytes: z.coerce.number().int().positive().default(24_576),
  outputTailBytes: z.coerce.number().int().positive().default(24_576),

  cacheMaxEntries: z.coerce.number().int().positive().default(100),
  cacheMaxBytes: z.coerce.number().int().positive().default(33_554_432), // 32MB
  cacheHeapPressureRatio: z.coerce.number().positive().max(1).default(0.85),

  maxConcurrentSubmissions: z.coerce.number().int().positive().default(availableParallelism()),
  memoryProbe: booleanFlag.default(true),
});

export type CompilerConfig = z.infer<typeof configSchema>;

/** Subset of the config the stages need; tests build these directly. */
export type ResourceLimits = Pick<
  CompilerConfig,
  | 'compileTimeoutMs'
  | 'executeTimeoutMs'
  | 'maxHeapMb'
  | 'maxStackKb'
  | 'maxMetaspaceMb'
  | 'maxDirectMemoryMb'
  | 'compilerHeapMb'
  | 'outputHeadBytes'
  | 'outputTailBytes'
>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

/**
 * Parse a raw key/value record (usually from process.env) into a config.
 * Undefined keys are dropped so the schema defaults apply.
 */
export function parseConfig(raw: Record<string, string | boolean | number | undefined>): CompilerConfig {
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`Compiler config error: ${result.error.message}`, {
      issues: result.error.issues,
    });
  }

  const config = result.data;
  config.workspaceRoot = resolve(expandHome(config.workspaceRoot));
  config.logDir = resolve(expandHome(config.logDir));
  if (config.javaHome) {
    config.javaHome = resolve(expandHome(config.javaHome));
  }

  return config;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: CompilerConfig | null = null;

export function getConfig(): CompilerConfig {
  if (cached) return cached;

  cached = parseConfig({
    workspaceRoot: process.env.COMPILEBOX_WORKSPACE_ROOT,
    logDir: process.env.COMPILEBOX_LOG_DIR,
    logSubmissions: process.env.COMPILEBOX_LOG_SUBMISSIONS,
    javaHome: process.env.COMPILEBOX_JAVA_HOME,
    javacPath: process.env.COMPILEBOX_JAVAC,
    javaPath: process.env.COMPILEBOX_JAVA,
    compileTimeoutMs: process.env.COMPILEBOX_COMPILE_TIMEOUT_MS,
    executeTimeoutMs: process.env.COMPILEBOX_EXECUTE_TIMEOUT_MS,
    maxHeapMb: process.env.COMPILEBOX_MAX_HEAP_MB,
    maxStackKb: process.env.COMPILEBOX_MAX_STACK_KB,
    maxMetaspaceMb: process.env.COMPILEBOX_MAX_METASPACE_MB,
    maxDirectMemoryMb: process.env.COMPILEBOX_MAX_DIRECT_MEMORY_MB,
    compilerHeapMb: process.env.COMPILEBOX_COMPILER_HEAP_MB,
    maxSourceBytes: process.env.COMPILEBOX_MAX_SOURCE_BYTES,
    outputHeadBytes: process.env.COMPILEBOX_OUTPUT_HEAD_BYTES,
    outputTailBytes: process.env.COMPILEBOX_OUTPUT_TAIL_BYTES,
    cacheMaxEntries: process.env.COMPILEBOX_CACHE_MAX_ENTRIES,
    cacheMaxBytes: process.env.COMPILEBOX_CACHE_MAX_BYTES,
    cacheHeapPressureRatio: process.env.COMPILEBOX_CACHE_HEAP_PRESSURE_RATIO,
    maxConcurrentSubmissions: process.env.COMPILEBOX_MAX_CONCURRENT,
    memoryProbe: process.env.COMPILEBOX_MEMORY_PROBE,
  });
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TMPDIR', 'USER', 'JAVA_HOME'];

/**
 * Variables the JVM reads extra command-line flags from. Any of them would
 * let the caller's environment override the heap/stack/metaspace ceilings.
 */
export const JVM_FLAG_INJECTION_VARS: readonly string[] = [
  'JAVA_TOOL_OPTIONS',
  '_JAVA_OPTIONS',
  'JDK_JAVA_OPTIONS',
];

/**
 * Minimal environment for compiler and runtime subprocesses.
 * Only allowlisted vars pass through; JVM flag-injection vars never do.
 */
export function getStrippedEnv(
  source: NodeJS.ProcessEnv = process.env,
  extraAllowed: readonly string[] = [],
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of [...ENV_ALLOWLIST, ...extraAllowed]) {
    if (JVM_FLAG_INJECTION_VARS.includes(key)) continue;
    const val = source[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
