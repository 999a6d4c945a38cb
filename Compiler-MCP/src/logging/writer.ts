/**
 * JSONL submission log writer, one file per UTC day.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { getConfig } from '../config.js';
import type { SubmissionLogEntry } from './types.js';

const logger = new Logger('compiler:log');

export function submissionLogFilename(at: Date = new Date()): string {
  return `submissions-${at.toISOString().slice(0, 10)}.jsonl`;
}

/**
 * Append a submission entry to the daily JSONL file in `logDir`.
 */
export async function logSubmission(
  entry: SubmissionLogEntry,
  logDir: string = getConfig().logDir,
): Promise<void> {
  await mkdir(logDir, { recursive: true });

  const filepath = join(logDir, submissionLogFilename(new Date(entry.submitted_at)));
  const line = JSON.stringify(entry) + '\n';

  try {
    await appendFile(filepath, line, 'utf-8');
  } catch (err) {
    logger.error('Failed to write submission log', { filepath, error: err });
  }
}
