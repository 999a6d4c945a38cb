/**
 * compile_and_run and cache_stats tools.
 */

import { z } from 'zod';
import { createHash } from 'node:crypto';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { logSubmission } from '../logging/writer.js';
import type { OrchestratorStats, PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { SubmissionResult } from '../pipeline/types.js';

const logger = new Logger('compiler:tools');

export const compileAndRunSchema = z.object({
  source_code: z.string()
    .describe('Complete source of one compilation unit; the first public class is the entry point'),
});

export type CompileAndRunInput = z.infer<typeof compileAndRunSchema>;

export const cacheStatsSchema = z.object({});

export interface SubmissionLogOptions {
  enabled: boolean;
  logDir: string;
}

export function handleCompileAndRun(orchestrator: PipelineOrchestrator, logging: SubmissionLogOptions) {
  return async (input: CompileAndRunInput): Promise<SubmissionResult> => {
    const submittedAt = new Date().toISOString();
    const result = await orchestrator.compileAndRun(input.source_code);

    if (logging.enabled) {
      // Fire-and-forget; the response does not wait on disk
      logSubmission(
        {
          type: 'submission',
          submission_id: result.submissionId,
          class_name: result.className,
          source_sha256: input.source_code
            ? createHash('sha256').update(input.source_code, 'utf-8').digest('hex')
            : null,
          source_bytes: Buffer.byteLength(input.source_code, 'utf-8'),
          compilation_success: result.compilationSuccess,
          compilation_cached: result.compilationCached,
          compilation_time_ms: result.compilationTimeMs,
          execution_success: result.executionSuccess,
          execution_time_ms: result.executionTimeMs,
          peak_memory_bytes: result.peakMemoryBytes,
          timed_out: result.timedOut,
          failure: result.failure,
          submitted_at: submittedAt,
        },
        logging.logDir,
      ).catch((err: unknown) => logger.error('Submission log write failed', err));
    }

    return result;
  };
}

export function handleCacheStats(orchestrator: PipelineOrchestrator) {
  return async (_input: z.infer<typeof cacheStatsSchema>): Promise<OrchestratorStats> => orchestrator.stats();
}
