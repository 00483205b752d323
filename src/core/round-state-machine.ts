/**
 * Round State Machine
 *
 * Tracks where the orchestrator is inside a task with typed transitions,
 * a transition log and listeners. The orchestrator drives it; nothing
 * here performs I/O.
 *
 * Valid transitions:
 *   BUILDING_CONTEXT    → CALLING_MODEL | TERMINATED
 *   CALLING_MODEL       → HANDLING_TOOLS | FINAL_RESPONSE | RETRY_WITH_FALLBACK | TERMINATED
 *   RETRY_WITH_FALLBACK → CALLING_MODEL | TERMINATED
 *   HANDLING_TOOLS      → BUILDING_CONTEXT | TERMINATED
 *   FINAL_RESPONSE      → TERMINATED
 */

import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('RoundStateMachine');

// =============================================================================
// TYPES
// =============================================================================

export type RoundState =
  | 'BUILDING_CONTEXT'
  | 'CALLING_MODEL'
  | 'HANDLING_TOOLS'
  | 'FINAL_RESPONSE'
  | 'RETRY_WITH_FALLBACK'
  | 'TERMINATED';

export type TerminationStatus = 'success' | 'budget_exhausted' | 'round_limit' | 'fatal_error';

export interface RoundTransition {
  from: RoundState;
  to: RoundState;
  round: number;
  reason: string;
  timestamp: number;
}

export type RoundStateEvent =
  | { type: 'state.changed'; transition: RoundTransition }
  | { type: 'state.terminated'; status: TerminationStatus; round: number; reason: string };

export type RoundStateListener = (event: RoundStateEvent) => void;

// =============================================================================
// VALID TRANSITIONS
// =============================================================================

const VALID_TRANSITIONS: Record<RoundState, ReadonlySet<RoundState>> = {
  BUILDING_CONTEXT: new Set(['CALLING_MODEL', 'TERMINATED']),
  CALLING_MODEL: new Set(['HANDLING_TOOLS', 'FINAL_RESPONSE', 'RETRY_WITH_FALLBACK', 'TERMINATED']),
  RETRY_WITH_FALLBACK: new Set(['CALLING_MODEL', 'TERMINATED']),
  HANDLING_TOOLS: new Set(['BUILDING_CONTEXT', 'TERMINATED']),
  FINAL_RESPONSE: new Set(['TERMINATED']),
  TERMINATED: new Set(),
};

export function canTransition(from: RoundState, to: RoundState): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

// =============================================================================
// STATE MACHINE
// =============================================================================

export class RoundStateMachine {
  private current: RoundState = 'BUILDING_CONTEXT';
  private roundCount = 0;
  private status?: TerminationStatus;
  private transitions: RoundTransition[] = [];
  private listeners: RoundStateListener[] = [];
  private now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  getState(): RoundState {
    return this.current;
  }

  /** Rounds started so far; incremented on each BUILDING_CONTEXT → CALLING_MODEL */
  get round(): number {
    return this.roundCount;
  }

  get terminationStatus(): TerminationStatus | undefined {
    return this.status;
  }

  get isTerminated(): boolean {
    return this.current === 'TERMINATED';
  }

  getTransitions(): readonly RoundTransition[] {
    return this.transitions;
  }

  /**
   * Move to `to`. Returns false, and changes nothing, when the move is not
   * allowed from the current state. Use `terminate()` to enter TERMINATED.
   */
  transition(to: Exclude<RoundState, 'TERMINATED'>, reason: string): boolean {
    if (!canTransition(this.current, to)) {
      log.warn('Rejected state transition', { from: this.current, to, reason });
      return false;
    }
    if (this.current === 'BUILDING_CONTEXT' && to === 'CALLING_MODEL') {
      this.roundCount++;
    }
    this.record(to, reason);
    return true;
  }

  terminate(status: TerminationStatus, reason: string): boolean {
    if (this.current === 'TERMINATED') return false;
    this.record('TERMINATED', reason);
    this.status = status;
    this.emit({ type: 'state.terminated', status, round: this.roundCount, reason });
    return true;
  }

  on(listener: RoundStateListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private record(to: RoundState, reason: string): void {
    const transition: RoundTransition = {
      from: this.current,
      to,
      round: this.roundCount,
      reason,
      timestamp: this.now(),
    };
    this.transitions.push(transition);
    this.current = to;
    this.emit({ type: 'state.changed', transition });
  }

  private emit(event: RoundStateEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn('State listener failed', { event: event.type, error: String(err) });
      }
    }
  }
}

export function createRoundStateMachine(options?: { now?: () => number }): RoundStateMachine {
  return new RoundStateMachine(options);
}
