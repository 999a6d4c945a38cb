import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { CompilationStage, COMPILATION_SUCCESSFUL } from '../../src/stages/compiler.js';
import { ExecutionStage, formatExecutionOutput, NO_OUTPUT_MESSAGE } from '../../src/stages/runtime.js';
import { JavaToolchain } from '../../src/stages/toolchain.js';
import { PLACEHOLDER_PEAK_BYTES } from '../../src/memory/probe.js';
import { WorkspaceManager, type Workspace } from '../../src/workspace/manager.js';
import { fakeLaunchers, fakeToolchain, HELLO_WORLD, quietLogger, tempRoot, testConfig } from '../helpers.js';

describe('formatExecutionOutput', () => {
  it('should trim stdout', () => {
    expect(formatExecutionOutput('hi\n', '', 0, null)).toBe('hi');
  });

  it('should report a silent success', () => {
    expect(formatExecutionOutput('', '', 0, null)).toBe(NO_OUTPUT_MESSAGE);
  });

  it('should report a silent failure by exit code or signal', () => {
    expect(formatExecutionOutput('', '', 1, null)).toBe('Process exited with code 1');
    expect(formatExecutionOutput('', '', null, 'SIGKILL')).toBe('Process terminated by signal SIGKILL');
  });

  it('should label stderr after stdout', () => {
    expect(formatExecutionOutput('out\n', 'boom\n', 1, null)).toBe('out\n\n[stderr]\nboom');
  });

  it('should drop JVM option notices from stderr', () => {
    expect(formatExecutionOutput('', 'Picked up JAVA_TOOL_OPTIONS: -Xmx1g\nboom', 1, null)).toBe('[stderr]\nboom');
    expect(formatExecutionOutput('', 'Picked up _JAVA_OPTIONS: -Xss1m\n', 0, null)).toBe(NO_OUTPUT_MESSAGE);
  });
});

describe('stages with the fake toolchain', () => {
  let root: string;
  let workspaces: WorkspaceManager;
  let workspace: Workspace;

  beforeEach(async () => {
    root = tempRoot('compilebox-stages');
    workspaces = new WorkspaceManager(root, quietLogger());
    workspace = await workspaces.create();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function stagesFor(overrides: Parameters<typeof testConfig>[1] = {}) {
    const config = testConfig(root, overrides);
    const toolchain = fakeToolchain(config);
    return {
      compiler: new CompilationStage(toolchain, config, {}, quietLogger()),
      runtime: new ExecutionStage(toolchain, config, {}, null, quietLogger()),
    };
  }

  async function compileSource(compiler: CompilationStage, className: string, source: string) {
    const file = await workspaces.writeText(workspace, `${className}.java`, source);
    return compiler.compile(file, workspace.path);
  }

  describe('CompilationStage', () => {
    it('should compile into the workspace', async () => {
      const { compiler } = stagesFor();
      const result = await compileSource(compiler, 'HelloWorld', HELLO_WORLD);

      expect(result.status).toBe('succeeded');
      expect(result.output).toBe(COMPILATION_SUCCESSFUL);
      expect(existsSync(join(workspace.path, 'HelloWorld.class'))).toBe(true);
    });

    it('should return compiler diagnostics on failure', async () => {
      const { compiler } = stagesFor();
      const result = await compileSource(compiler, 'Bad', 'public class Bad { int x = ; }');

      expect(result.status).toBe('failed');
      expect(result.succeeded).toBe(false);
      expect(result.output).toBe('Bad.java:1: error: illegal start of expression\n1 error\n');
    });

    it('should keep compiler notes on success', async () => {
      const { compiler } = stagesFor();
      const result = await compileSource(compiler, 'W', '// compile: warn\npublic class W {}');

      expect(result.succeeded).toBe(true);
      expect(result.output).toBe('Note: W.java uses unchecked or unsafe operations.\n');
    });

    it('should time out a hung compiler', async () => {
      const { compiler } = stagesFor({ compileTimeoutMs: 500 });
      const result = await compileSource(compiler, 'Slow', '// compile: hang\npublic class Slow {}');

      expect(result.status).toBe('timed-out');
      expect(result.output).toBe(
        'Compiling...\n\nCompilation timed out after 0.5 seconds.\n' +
          'Your code might be too complex or contain an error.',
      );
    });

    it('should report a compiler that cannot start', async () => {
      const config = testConfig(root);
      const toolchain = new JavaToolchain({ javac: ['/nonexistent/javac'], java: fakeLaunchers.java }, config);
      const compiler = new CompilationStage(toolchain, config, {}, quietLogger());
      const result = await compileSource(compiler, 'HelloWorld', HELLO_WORLD);

      expect(result.status).toBe('spawn-failed');
      expect(result.output).toMatch(/^Compilation error: spawn \/nonexistent\/javac ENOENT/);
    });
  });

  describe('ExecutionStage', () => {
    it('should run the entry point and use the placeholder peak without a probe', async () => {
      const { compiler, runtime } = stagesFor();
      await compileSource(compiler, 'HelloWorld', HELLO_WORLD);
      const result = await runtime.execute('HelloWorld', workspace);

      expect(result.status).toBe('succeeded');
      expect(result.output).toBe('Hello, World!');
      expect(result.exitCode).toBe(0);
      expect(result.peakMemoryBytes).toBe(PLACEHOLDER_PEAK_BYTES);
    });

    it('should report an uncaught exception from stderr', async () => {
      const { compiler, runtime } = stagesFor();
      await compileSource(
        compiler,
        'Thrower',
        'public class Thrower { public static void main(String[] a) { throw new IllegalStateException("bad state"); } }',
      );
      const result = await runtime.execute('Thrower', workspace);

      expect(result.status).toBe('failed');
      expect(result.exitCode).toBe(1);
      expect(result.output).toBe(
        '[stderr]\nException in thread "main" java.lang.IllegalStateException: bad state\n\tat Thrower.main(Thrower.java)',
      );
    });

    it('should report the exit code of a silent failure', async () => {
      const { compiler, runtime } = stagesFor();
      await compileSource(compiler, 'Quit', 'public class Quit { public static void main(String[] a) { System.exit(42); } }');
      const result = await runtime.execute('Quit', workspace);

      expect(result.output).toBe('Process exited with code 42');
      expect(result.exitCode).toBe(42);
    });

    it('should keep partial output of a program that times out', async () => {
      const { compiler, runtime } = stagesFor({ executeTimeoutMs: 500 });
      await compileSource(
        compiler,
        'Loop',
        'public class Loop { public static void main(String[] a) { System.out.println("tick"); while (true) {} } }',
      );
      const result = await runtime.execute('Loop', workspace);

      expect(result.status).toBe('timed-out');
      expect(result.peakMemoryBytes).toBe(0);
      expect(result.output).toBe(
        'tick\nExecution timed out after 0.5 seconds.\nCheck for infinite loops or optimize your code.',
      );
    });
  });
});
