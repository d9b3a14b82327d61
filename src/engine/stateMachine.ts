import type { Logger } from '../shared/logger.js';

export type ResolutionState =
  | 'idle'
  | 'session_ready'
  | 'initiated'
  | 'converting'
  | 'ready'
  | 'failed';

// Re-entering session_ready covers a forced refresh after a 403 or a bad cipher.
const TRANSITIONS: Record<ResolutionState, readonly ResolutionState[]> = {
  idle: ['session_ready', 'initiated', 'failed'],
  session_ready: ['session_ready', 'initiated', 'failed'],
  initiated: ['session_ready', 'converting', 'ready', 'failed'],
  converting: ['converting', 'ready', 'failed'],
  ready: [],
  failed: [],
};

/**
 * Tracks one resolution through its protocol steps. An illegal transition is
 * a bug in a provider strategy, not an upstream failure, so it throws.
 */
export class ResolutionStateMachine {
  private current: ResolutionState = 'idle';
  private readonly trail: ResolutionState[] = ['idle'];

  constructor(private readonly log?: Logger) {}

  get state(): ResolutionState {
    return this.current;
  }

  get history(): readonly ResolutionState[] {
    return this.trail;
  }

  advance(next: ResolutionState): void {
    if (next === this.current && next === 'converting') return;
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal resolution transition ${this.current} -> ${next}`);
    }
    this.log?.debug({ from: this.current, to: next }, 'Resolution state');
    this.current = next;
    this.trail.push(next);
  }

  /** Reachable from any state; a no-op once terminal. */
  fail(): void {
    if (this.current === 'ready' || this.current === 'failed') return;
    this.log?.debug({ from: this.current, to: 'failed' }, 'Resolution state');
    this.current = 'failed';
    this.trail.push('failed');
  }
}
