/**
 * Compilation stage: runs the external compiler against source files
 * inside a workspace and reports merged diagnostics.
 */

import { Logger } from '@compilebox/shared/Utils/logger.js';
import type { ResourceLimits } from '../config.js';
import { formatSeconds, runProcess } from './process.js';
import type { Toolchain } from './toolchain.js';
import type { CompilationResult } from './types.js';

export const COMPILATION_SUCCESSFUL = 'Compilation successful';

export type CompilationLimits = Pick<ResourceLimits, 'compileTimeoutMs' | 'outputHeadBytes' | 'outputTailBytes'>;

export class CompilationStage {
  private readonly logger: Logger;

  constructor(
    private readonly toolchain: Toolchain,
    private readonly limits: CompilationLimits,
    private readonly env: Record<string, string>,
    logger: Logger = new Logger('compiler'),
  ) {
    this.logger = logger.child('compile');
  }

  /**
   * Compile `sourceFiles` (absolute paths) with `workingDir` as output directory.
   */
  async compile(sourceFiles: string | readonly string[], workingDir: string): Promise<CompilationResult> {
    const files = typeof sourceFiles === 'string' ? [sourceFiles] : sourceFiles;
    const command = this.toolchain.compileCommand(files, workingDir);

    this.logger.debug('Starting compiler', { command: command.command, files: files.length });

    const outcome = await runProcess({
      command,
      cwd: workingDir,
      env: this.env,
      timeoutMs: this.limits.compileTimeoutMs,
      limits: { head: this.limits.outputHeadBytes, tail: this.limits.outputTailBytes },
      mergeOutput: true,
    });

    switch (outcome.kind) {
      case 'spawn-failed':
        this.logger.error('Compiler could not be started', outcome.error);
        return {
          status: 'spawn-failed',
          succeeded: false,
          output: `Compilation error: ${outcome.error.message}`,
          elapsedMs: outcome.elapsedMs,
          truncated: false,
        };

      case 'timed-out': {
        this.logger.warn('Compiler timed out', { elapsedMs: outcome.elapsedMs });
        const notice =
          `Compilation timed out after ${formatSeconds(this.limits.compileTimeoutMs)} seconds.\n` +
          'Your code might be too complex or contain an error.';
        return {
          status: 'timed-out',
          succeeded: false,
          output: outcome.stdout ? `${outcome.stdout}\n${notice}` : notice,
          elapsedMs: outcome.elapsedMs,
          truncated: outcome.truncated,
        };
      }

      case 'exited': {
        const succeeded = outcome.exitCode === 0;
        let output = outcome.stdout;
        if (succeeded && output.trim() === '') {
          output = COMPILATION_SUCCESSFUL;
        } else if (!succeeded && output.trim() === '') {
          output = outcome.signal
            ? `Compiler terminated by signal ${outcome.signal}`
            : `Compiler exited with code ${outcome.exitCode}`;
        }
        return {
          status: succeeded ? 'succeeded' : 'failed',
          succeeded,
          output,
          elapsedMs: outcome.elapsedMs,
          truncated: outcome.truncated,
        };
      }
    }
  }
}
