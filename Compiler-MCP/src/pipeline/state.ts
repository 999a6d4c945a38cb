import type { PipelineState, TransitionListener } from './types.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  'received': ['workspace-created', 'errored'],
  'workspace-created': ['cache-hit', 'compiling', 'errored'],
  'cache-hit': ['compile-done', 'errored'],
  'compiling': ['compile-done', 'errored'],
  'compile-done': ['executing', 'done', 'errored'],
  'executing': ['done', 'errored'],
  'done': [],
  'errored': [],
};

export function isTerminal(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Lifecycle of one submission. An illegal transition is a bug in the
 * orchestrator and throws.
 */
export class SubmissionRun {
  private current: PipelineState = 'received';
  private readonly trail: PipelineState[] = ['received'];

  constructor(
    readonly submissionId: string,
    private readonly listener?: TransitionListener,
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly PipelineState[] {
    return this.trail;
  }

  /** True once compilation (or the cache lookup standing in for it) finished */
  get compiled(): boolean {
    return this.trail.includes('compile-done');
  }

  transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${next}`);
    }
    const from = this.current;
    this.current = next;
    this.trail.push(next);
    this.listener?.(this.submissionId, from, next);
  }

  /** Move to `errored` unless already terminal */
  fail(): void {
    if (!isTerminal(this.current)) {
      this.transition('errored');
    }
  }
}
