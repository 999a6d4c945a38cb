/**
 * Log entry types for JSONL submission logs (daily rotation).
 */

import type { FailureKind } from '../pipeline/types.js';

export interface SubmissionLogEntry {
  type: 'submission';
  submission_id: string;
  class_name: string | null;
  source_sha256: string | null;
  source_bytes: number;
  compilation_success: boolean;
  compilation_cached: boolean;
  compilation_time_ms: number;
  execution_success: boolean;
  execution_time_ms: number;
  peak_memory_bytes: number;
  timed_out: boolean;
  failure: FailureKind | null;
  submitted_at: string;
}
