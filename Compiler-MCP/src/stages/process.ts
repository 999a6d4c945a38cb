/**
 * Subprocess runner shared by the compilation and execution stages.
 *
 * Spawns one child in its own process group with:
 * - Stripped environment supplied by the caller
 * - Wall-clock timeout ending in SIGKILL to the whole group (no grace period:
 *   an adversarial program can ignore SIGTERM)
 * - Bounded output capture, either merged or per stream
 *
 * The result is a discriminated union; nothing here throws for a failed,
 * crashed or hung process.
 */

import { spawn } from 'node:child_process';
import { OutputCapture, type CaptureLimits } from '../utils/output-capture.js';
import type { CommandLine } from './toolchain.js';

export interface ProcessRequest {
  command: CommandLine;
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
  limits: CaptureLimits;
  /** Capture stdout and stderr into one interleaved stream */
  mergeOutput: boolean;
}

interface CapturedStreams {
  stdout: string;
  stderr: string;
  truncated: boolean;
  elapsedMs: number;
}

export type ProcessOutcome =
  | ({ kind: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null } & CapturedStreams)
  | ({ kind: 'timed-out' } & CapturedStreams)
  | { kind: 'spawn-failed'; error: Error; elapsedMs: number };

/** How long to wait for 'close' after SIGKILL before giving up on the pipes */
const KILL_SETTLE_MS = 2_000;

/** `10000` → `10`, `2500` → `2.5` */
export function formatSeconds(ms: number): string {
  const secs = ms / 1000;
  return Number.isInteger(secs) ? String(secs) : secs.toFixed(1);
}

function killGroup(pid: number | undefined, fallback: () => void): void {
  if (pid !== undefined) {
    try {
      process.kill(-pid, 'SIGKILL');
      return;
    } catch {
      // Group already gone, or not a group leader; fall through to the child
    }
  }
  try {
    fallback();
  } catch {
    // Process may already be dead
  }
}

export function runProcess(request: ProcessRequest): Promise<ProcessOutcome> {
  const startTime = Date.now();
  const stdoutCapture = new OutputCapture(request.limits);
  const stderrCapture = request.mergeOutput ? stdoutCapture : new OutputCapture(request.limits);

  return new Promise<ProcessOutcome>((resolve) => {
    let timedOut = false;
    let settled = false;
    let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
    let settleTimer: ReturnType<typeof setTimeout> | null = null;

    const child = spawn(request.command.command, request.command.args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    child.stdout.on('data', (chunk: Buffer) => stdoutCapture.append(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrCapture.append(chunk));

    function clearTimers(): void {
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (settleTimer) clearTimeout(settleTimer);
    }

    function captured(): CapturedStreams {
      const out = stdoutCapture.render();
      const err = request.mergeOutput ? { text: '', truncated: false } : stderrCapture.render();
      return {
        stdout: out.text,
        stderr: err.text,
        truncated: out.truncated || err.truncated,
        elapsedMs: Date.now() - startTime,
      };
    }

    // Spawn errors (binary missing, permission denied)
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimers();
      resolve({ kind: 'spawn-failed', error: err, elapsedMs: Date.now() - startTime });
    });

    child.on('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimers();
      if (timedOut) {
        resolve({ kind: 'timed-out', ...captured() });
      } else {
        resolve({ kind: 'exited', exitCode: code, signal, ...captured() });
      }
    });

    timeoutTimer = setTimeout(() => {
      timedOut = true;
      killGroup(child.pid, () => child.kill('SIGKILL'));

      // A grandchild holding the pipes open must not hang the submission
      settleTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.stdout.destroy();
        child.stderr.destroy();
        resolve({ kind: 'timed-out', ...captured() });
      }, KILL_SETTLE_MS);
    }, request.timeoutMs);
  });
}
