/**
 * ID generators using Node's built-in crypto.
 *
 * Workspace ids combine a process-wide monotonic counter with a random
 * suffix, so two ids never collide within a process and are unguessable
 * across processes sharing a workspace root.
 */

import { randomUUID } from 'node:crypto';

let workspaceCounter = 0;

function randomSuffix(length = 12): string {
  return randomUUID().replace(/-/g, '').slice(0, length);
}

export function generateSubmissionId(): string {
  return `sub_${randomSuffix()}`;
}

export function generateWorkspaceId(): string {
  workspaceCounter += 1;
  return `ws_${workspaceCounter.toString(36)}_${randomSuffix()}`;
}
