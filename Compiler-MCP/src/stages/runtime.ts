/**
 * Execution stage: runs a compiled entry point inside its workspace under
 * hard resource ceilings, with stdout and stderr kept apart.
 */

import { Logger } from '@compilebox/shared/Utils/logger.js';
import type { ResourceLimits } from '../config.js';
import type { MemoryProbe } from '../memory/probe.js';
import { PLACEHOLDER_PEAK_BYTES } from '../memory/probe.js';
import { formatSeconds, runProcess } from './process.js';
import type { Toolchain } from './toolchain.js';
import type { Workspace } from '../workspace/manager.js';
import type { ExecutionResult } from './types.js';

export const NO_OUTPUT_MESSAGE = 'Program executed successfully with no output.';
export const STDERR_HEADER = '[stderr]';

export type ExecutionLimits = Pick<ResourceLimits, 'executeTimeoutMs' | 'outputHeadBytes' | 'outputTailBytes'>;

/** JVM notices about picked-up option variables are not program output */
function filterRuntimeNoise(stderr: string): string {
  return stderr
    .split('\n')
    .filter((line) => !line.startsWith('Picked up '))
    .join('\n');
}

/**
 * Render program output: stdout first, then a labelled stderr section.
 */
export function formatExecutionOutput(
  stdout: string,
  stderr: string,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
): string {
  const out = stdout.trim();
  const err = filterRuntimeNoise(stderr).trim();

  if (out && err) return `${out}\n\n${STDERR_HEADER}\n${err}`;
  if (err) return `${STDERR_HEADER}\n${err}`;
  if (out) return out;

  if (exitCode === 0) return NO_OUTPUT_MESSAGE;
  if (signal) return `Process terminated by signal ${signal}`;
  return `Process exited with code ${exitCode}`;
}

export class ExecutionStage {
  private readonly logger: Logger;

  constructor(
    private readonly toolchain: Toolchain,
    private readonly limits: ExecutionLimits,
    private readonly env: Record<string, string>,
    private readonly probe: MemoryProbe | null = null,
    logger: Logger = new Logger('compiler'),
  ) {
    this.logger = logger.child('execute');
  }

  async execute(
    entryPointName: string,
    workspace: Workspace,
    programArgs: readonly string[] = [],
  ): Promise<ExecutionResult> {
    const workingDir = workspace.path;
    const launch = this.probe ? await this.probe.install(workspace, entryPointName, programArgs) : null;
    const command = launch
      ? this.toolchain.runCommand(launch.mainClass, launch.args, workingDir)
      : this.toolchain.runCommand(entryPointName, programArgs, workingDir);

    this.logger.debug('Starting runtime', { entryPoint: entryPointName, probed: launch !== null });

    const outcome = await runProcess({
      command,
      cwd: workingDir,
      env: this.env,
      timeoutMs: this.limits.executeTimeoutMs,
      limits: { head: this.limits.outputHeadBytes, tail: this.limits.outputTailBytes },
      mergeOutput: false,
    });

    switch (outcome.kind) {
      case 'spawn-failed':
        this.logger.error('Runtime could not be started', outcome.error);
        return {
          status: 'spawn-failed',
          succeeded: false,
          output: `Execution error: ${outcome.error.message}`,
          stdout: '',
          stderr: '',
          exitCode: null,
          elapsedMs: outcome.elapsedMs,
          truncated: false,
          peakMemoryBytes: 0,
        };

      case 'timed-out': {
        this.logger.warn('Program timed out', { entryPoint: entryPointName, elapsedMs: outcome.elapsedMs });
        const notice =
          `Execution timed out after ${formatSeconds(this.limits.executeTimeoutMs)} seconds.\n` +
          'Check for infinite loops or optimize your code.';
        const partial = outcome.stdout.trim();
        return {
          status: 'timed-out',
          succeeded: false,
          output: partial ? `${partial}\n${notice}` : notice,
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          exitCode: null,
          elapsedMs: outcome.elapsedMs,
          truncated: outcome.truncated,
          peakMemoryBytes: 0,
        };
      }

      case 'exited': {
        const succeeded = outcome.exitCode === 0;
        const peakMemoryBytes = launch && this.probe
          ? await this.probe.readPeak(workspace)
          : PLACEHOLDER_PEAK_BYTES;
        return {
          status: succeeded ? 'succeeded' : 'failed',
          succeeded,
          output: formatExecutionOutput(outcome.stdout, outcome.stderr, outcome.exitCode, outcome.signal),
          stdout: outcome.stdout,
          stderr: outcome.stderr,
          exitCode: outcome.exitCode,
          elapsedMs: outcome.elapsedMs,
          truncated: outcome.truncated,
          peakMemoryBytes,
        };
      }
    }
  }
}
