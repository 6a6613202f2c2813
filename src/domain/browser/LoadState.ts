/**
 * Load state of a single page.
 */
export type LoadState = 'idle' | 'loading' | 'loaded' | 'failed';

const NEXT_STATES: Record<LoadState, LoadState[]> = {
  idle: ['loading'],
  loading: ['loaded', 'failed'],
  loaded: ['loading'],
  failed: ['loading'],
};

export function canTransitionLoadState(from: LoadState, to: LoadState): boolean {
  return NEXT_STATES[from].includes(to);
}
