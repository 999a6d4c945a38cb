/**
 * Compile-and-run pipeline.
 *
 * One submission: validate input → workspace → cache lookup or compile →
 * execute when there is a main method → cleanup. Every path ends in a
 * SubmissionResult; the workspace is destroyed in `finally` on all of them.
 * Submissions run on a bounded pool so at most `maxConcurrentSubmissions`
 * compiler/runtime processes exist at once.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { errorMessage } from '@compilebox/shared/Types/errors.js';
import { getStrippedEnv, type CompilerConfig } from '../config.js';
import { JavaSourceAnalyzer, type SourceAnalyzer } from '../analysis/source-analyzer.js';
import { ArtifactCache, type ArtifactCacheStats } from '../cache/artifact-cache.js';
import { WorkspaceManager, type Workspace } from '../workspace/manager.js';
import { CompilationStage } from '../stages/compiler.js';
import { ExecutionStage } from '../stages/runtime.js';
import { JavaToolchain, resolveJavaLaunchers, type Toolchain } from '../stages/toolchain.js';
import type { CompilationResult } from '../stages/types.js';
import { MemoryProbe } from '../memory/probe.js';
import { generateSubmissionId } from '../utils/id-generator.js';
import { SubmissionRun } from './state.js';
import type { FailureKind, SubmissionResult, TransitionListener } from './types.js';

export const MESSAGES = {
  emptySource: 'Error: Source code cannot be empty',
  tooLarge: (kb: number) => `Error: Source code exceeds maximum size of ${kb}KB`,
  noClass:
    'Error: No class found in source.\n' +
    "Please ensure your code contains a class declaration like 'public class YourClassName {...}'",
  cached: 'Compilation successful (cached)',
  executionSkipped: 'Compilation failed, execution skipped.',
  noMain: (className: string) =>
    `Class '${className}' compiled successfully, but no main method found.\n` +
    'To run this code, add: public static void main(String[] args) {...}',
  serverError: (message: string) => `Server error: ${message}`,
} as const;

export interface OrchestratorOptions {
  config: CompilerConfig;
  toolchain?: Toolchain;
  analyzer?: SourceAnalyzer;
  cache?: ArtifactCache;
  workspaces?: WorkspaceManager;
  /** Environment for compiler and runtime; defaults to the stripped process env */
  env?: Record<string, string>;
  logger?: Logger;
  onTransition?: TransitionListener;
}

export interface OrchestratorStats {
  cache: ArtifactCacheStats;
  activeSubmissions: number;
  pendingSubmissions: number;
  liveWorkspaces: number;
}

type InputCheck = { ok: true; className: string } | { ok: false; message: string };

function compileFailureKind(result: CompilationResult): FailureKind {
  switch (result.status) {
    case 'timed-out': return 'compile-timeout';
    case 'spawn-failed': return 'infrastructure-error';
    default: return 'compile-failure';
  }
}

export class PipelineOrchestrator {
  private readonly config: CompilerConfig;
  private readonly toolchain: Toolchain;
  private readonly analyzer: SourceAnalyzer;
  private readonly cache: ArtifactCache;
  private readonly workspaces: WorkspaceManager;
  private readonly compilation: CompilationStage;
  private readonly execution: ExecutionStage;
  private readonly probe: MemoryProbe | null;
  private readonly limit: LimitFunction;
  private readonly logger: Logger;
  private readonly onTransition?: TransitionListener;

  constructor(options: OrchestratorOptions) {
    const { config } = options;
    this.config = config;
    const baseLogger = options.logger ?? new Logger('compiler');
    this.logger = baseLogger.child('pipeline');

    this.toolchain = options.toolchain ?? new JavaToolchain(
      resolveJavaLaunchers(config.javaHome, config.javacPath, config.javaPath),
      config,
      config.javaHome,
    );
    this.analyzer = options.analyzer ?? new JavaSourceAnalyzer();
    this.cache = options.cache ?? new ArtifactCache({
      maxEntries: config.cacheMaxEntries,
      maxBytes: config.cacheMaxBytes,
      heapPressureRatio: config.cacheHeapPressureRatio,
      logger: baseLogger,
    });
    this.workspaces = options.workspaces ?? new WorkspaceManager(config.workspaceRoot, baseLogger);

    const env = options.env ?? getStrippedEnv();
    this.compilation = new CompilationStage(this.toolchain, config, env, baseLogger);
    this.probe = config.memoryProbe
      ? new MemoryProbe({
          compiler: this.compilation,
          workspaces: this.workspaces,
          toolchain: this.toolchain,
          heapCapBytes: config.maxHeapMb * 1024 * 1024,
          logger: baseLogger,
        })
      : null;
    this.execution = new ExecutionStage(this.toolchain, config, env, this.probe, baseLogger);

    this.limit = pLimit(config.maxConcurrentSubmissions);

    const listener = options.onTransition;
    if (listener) {
      this.onTransition = (id, from, to) => {
        try {
          listener(id, from, to);
        } catch (err) {
          this.logger.warn('Transition listener threw', { submissionId: id, error: err });
        }
      };
    }
  }

  /**
   * Compile the source and, when it declares a main method, run it.
   * Never rejects.
   */
  async compileAndRun(sourceText: string): Promise<SubmissionResult> {
    const run = new SubmissionRun(generateSubmissionId(), this.onTransition);
    const result = this.emptyResult(run.submissionId);

    const input = this.checkInput(sourceText);
    if (!input.ok) {
      run.fail();
      this.logger.info('Submission rejected', { submissionId: run.submissionId, reason: input.message });
      return { ...result, compilationOutput: input.message, failure: 'input-error' };
    }
    result.className = input.className;

    return this.limit(() => this.process(run, sourceText, input.className, result));
  }

  /**
   * Compile the memory probe ahead of the first submission.
   * Resolves to whether probed execution is available.
   */
  async warmUp(): Promise<boolean> {
    if (!this.probe) return false;
    return (await this.probe.load()) !== null;
  }

  stats(): OrchestratorStats {
    return {
      cache: this.cache.stats(),
      activeSubmissions: this.limit.activeCount,
      pendingSubmissions: this.limit.pendingCount,
      liveWorkspaces: this.workspaces.liveCount(),
    };
  }

  private checkInput(sourceText: string): InputCheck {
    if (sourceText.trim() === '') {
      return { ok: false, message: MESSAGES.emptySource };
    }
    if (Buffer.byteLength(sourceText, 'utf-8') > this.config.maxSourceBytes) {
      return { ok: false, message: MESSAGES.tooLarge(Math.floor(this.config.maxSourceBytes / 1024)) };
    }
    const className = this.analyzer.extractEntryPointName(sourceText);
    if (className === null) {
      return { ok: false, message: MESSAGES.noClass };
    }
    return { ok: true, className };
  }

  private emptyResult(submissionId: string): SubmissionResult {
    return {
      submissionId,
      className: null,
      compilationOutput: '',
      compilationSuccess: false,
      compilationCached: false,
      compilationTimeMs: 0,
      executionOutput: '',
      executionSuccess: false,
      executionTimeMs: 0,
      peakMemoryBytes: 0,
      timedOut: false,
      failure: null,
    };
  }

  private async process(
    run: SubmissionRun,
    sourceText: string,
    className: string,
    result: SubmissionResult,
  ): Promise<SubmissionResult> {
    const log = this.logger.child(run.submissionId);
    let workspace: Workspace | null = null;

    try {
      workspace = await this.workspaces.create();
      run.transition('workspace-created');

      const fingerprint = this.analyzer.fingerprint(sourceText);
      const sourceFile = await this.workspaces.writeText(
        workspace,
        `${className}${this.toolchain.sourceExtension}`,
        sourceText,
      );

      const compileStart = Date.now();
      const compilation = await this.obtainBytecode(run, workspace, sourceFile, fingerprint, className);
      result.compilationTimeMs = Date.now() - compileStart;
      result.compilationCached = run.history.includes('cache-hit');
      result.compilationOutput = compilation.output;
      result.compilationSuccess = compilation.succeeded;
      run.transition('compile-done');

      if (!compilation.succeeded) {
        result.executionOutput = MESSAGES.executionSkipped;
        result.timedOut = compilation.status === 'timed-out';
        result.failure = compileFailureKind(compilation);
        run.transition('done');
        log.info('Compilation failed', { status: compilation.status, elapsedMs: compilation.elapsedMs });
        return result;
      }

      if (!this.analyzer.hasRunnableEntryPoint(sourceText)) {
        result.executionOutput = MESSAGES.noMain(className);
        result.executionSuccess = true;
        run.transition('done');
        return result;
      }

      run.transition('executing');
      const execution = await this.execution.execute(className, workspace);
      result.executionTimeMs = execution.elapsedMs;
      result.executionOutput = execution.output;
      result.executionSuccess = execution.succeeded;
      result.peakMemoryBytes = execution.peakMemoryBytes;
      result.timedOut = execution.status === 'timed-out';
      if (execution.status === 'timed-out') result.failure = 'execute-timeout';
      else if (execution.status === 'spawn-failed') result.failure = 'infrastructure-error';
      else if (!execution.succeeded) result.failure = 'execute-failure';
      run.transition('done');

      log.info('Submission finished', {
        className,
        cached: result.compilationCached,
        status: execution.status,
        exitCode: execution.exitCode,
        compilationTimeMs: result.compilationTimeMs,
        executionTimeMs: result.executionTimeMs,
      });
      return result;
    } catch (err) {
      const compiled = run.compiled;
      run.fail();
      log.error('Submission errored', err);
      const message = MESSAGES.serverError(errorMessage(err));
      return {
        ...result,
        compilationOutput: compiled ? result.compilationOutput : message,
        compilationSuccess: compiled ? result.compilationSuccess : false,
        executionOutput: compiled ? message : result.executionOutput,
        executionSuccess: false,
        failure: 'infrastructure-error',
      };
    } finally {
      if (workspace) {
        await this.workspaces.destroy(workspace);
      }
    }
  }

  /**
   * Fill the workspace with bytecode for `sourceFile`, from the cache when the
   * fingerprint is known, otherwise by compiling and caching the result.
   */
  private async obtainBytecode(
    run: SubmissionRun,
    workspace: Workspace,
    sourceFile: string,
    fingerprint: string,
    className: string,
  ): Promise<CompilationResult> {
    const startedAt = Date.now();
    const cached = this.cache.get(fingerprint);
    if (cached && cached.className === className) {
      run.transition('cache-hit');
      for (const [name, bytes] of cached.classFiles) {
        await this.workspaces.writeBytes(workspace, name, bytes);
      }
      return {
        status: 'succeeded',
        succeeded: true,
        output: MESSAGES.cached,
        elapsedMs: Date.now() - startedAt,
        truncated: false,
      };
    }

    run.transition('compiling');
    const compilation = await this.compilation.compile(sourceFile, workspace.path);
    if (compilation.succeeded) {
      const classFiles = new Map<string, Buffer>();
      for (const name of await this.workspaces.listFiles(workspace, this.toolchain.artifactExtension)) {
        classFiles.set(name, await this.workspaces.readBytes(workspace, name));
      }
      if (classFiles.size > 0) {
        this.cache.put({ fingerprint, className, classFiles });
      }
    }
    return compilation;
  }
}

/**
 * Orchestrator wired from the given config with the JDK toolchain.
 */
export function createOrchestrator(config: CompilerConfig, logger?: Logger): PipelineOrchestrator {
  return new PipelineOrchestrator({ config, logger });
}
