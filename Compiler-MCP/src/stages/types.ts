/**
 * Stage results. Failure is a value: the orchestrator switches on `status`.
 */

export type StageStatus = 'succeeded' | 'failed' | 'timed-out' | 'spawn-failed';

export interface StageResult {
  status: StageStatus;
  succeeded: boolean;
  output: string;
  elapsedMs: number;
  /** Captured output exceeded the head+tail window */
  truncated: boolean;
}

export type CompilationResult = StageResult;

export interface ExecutionResult extends StageResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Best-effort estimate, see memory/probe.ts */
  peakMemoryBytes: number;
}
