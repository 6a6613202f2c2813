/**
 * Lifecycle of one browser-engine instance.
 */
export type SessionState = 'idle' | 'starting' | 'ready' | 'closing' | 'closed';

const ALLOWED_TRANSITIONS: Record<SessionState, SessionState[]> = {
  idle: ['starting', 'closed'],
  starting: ['ready', 'closing', 'closed'],
  ready: ['closing'],
  closing: ['closed'],
  closed: [],
};

/**
 * Tracks the session state and rejects transitions that would skip teardown.
 */
export class SessionLifecycle {
  private current: SessionState = 'idle';
  private readonly history: SessionState[] = ['idle'];

  get state(): SessionState {
    return this.current;
  }

  get isReady(): boolean {
    return this.current === 'ready';
  }

  get isClosed(): boolean {
    return this.current === 'closed';
  }

  /**
   * Every state the session has been in, oldest first.
   */
  get transitions(): readonly SessionState[] {
    return this.history;
  }

  canTransitionTo(next: SessionState): boolean {
    return ALLOWED_TRANSITIONS[this.current].includes(next);
  }

  transitionTo(next: SessionState): void {
    if (!this.canTransitionTo(next)) {
      throw new Error(`Invalid session transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}
