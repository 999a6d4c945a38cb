/**
 * Test wiring: a toolchain backed by the fake compiler and runtime in
 * fixtures/, configs rooted in a per-test temp directory, and a quiet logger.
 */

import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { parseConfig, type CompilerConfig } from '../src/config.js';
import { JavaToolchain, type JavaLaunchers } from '../src/stages/toolchain.js';

export const FAKE_JAVAC = fileURLToPath(new URL('./fixtures/fake-javac.mjs', import.meta.url));
export const FAKE_JAVA = fileURLToPath(new URL('./fixtures/fake-java.mjs', import.meta.url));

export const fakeLaunchers: JavaLaunchers = {
  javac: [process.execPath, FAKE_JAVAC],
  java: [process.execPath, FAKE_JAVA],
};

export function tempRoot(prefix: string): string {
  return join(tmpdir(), `${prefix}-${randomUUID().slice(0, 8)}`);
}

export function testConfig(
  workspaceRoot: string,
  overrides: Partial<CompilerConfig> = {},
): CompilerConfig {
  return parseConfig({
    workspaceRoot,
    logDir: join(workspaceRoot, 'logs'),
    compileTimeoutMs: 5_000,
    executeTimeoutMs: 5_000,
    maxConcurrentSubmissions: 2,
    memoryProbe: true,
    ...overrides,
  });
}

export function fakeToolchain(config: CompilerConfig): JavaToolchain {
  return new JavaToolchain(fakeLaunchers, config);
}

export function quietLogger(): Logger {
  const log = new Logger('test');
  log.setLevel('error');
  return log;
}

/** Entries under `root`, or [] when it does not exist */
export async function entriesOf(root: string): Promise<string[]> {
  try {
    return await readdir(root);
  } catch {
    return [];
  }
}

export const HELLO_WORLD = `public class HelloWorld {
    public static void main(String[] args) {
        System.out.println("Hello, World!");
    }
}
`;
