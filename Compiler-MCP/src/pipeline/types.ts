/**
 * Submission-level types exposed to callers of the pipeline.
 */

export type FailureKind =
  | 'input-error'
  | 'compile-timeout'
  | 'compile-failure'
  | 'execute-timeout'
  | 'execute-failure'
  | 'infrastructure-error';

export interface SubmissionResult {
  submissionId: string;
  /** Entry-point class name, null when none could be determined */
  className: string | null;
  compilationOutput: string;
  compilationSuccess: boolean;
  /** Bytecode came from the artifact cache; no compiler ran */
  compilationCached: boolean;
  compilationTimeMs: number;
  executionOutput: string;
  executionSuccess: boolean;
  executionTimeMs: number;
  peakMemoryBytes: number;
  timedOut: boolean;
  failure: FailureKind | null;
}

export type PipelineState =
  | 'received'
  | 'workspace-created'
  | 'cache-hit'
  | 'compiling'
  | 'compile-done'
  | 'executing'
  | 'done'
  | 'errored';

export type TransitionListener = (
  submissionId: string,
  from: PipelineState,
  to: PipelineState,
) => void;
