import { StateError } from './errors.js';

export type FetchState =
  | 'unstarted'
  | 'resolving'
  | 'dialing'
  | 'awaiting-headers'
  | 'reading-body'
  | 'done'
  | 'failed';

const TRANSITIONS: Readonly<Record<FetchState, readonly FetchState[]>> = {
  unstarted: ['resolving'],
  resolving: ['dialing', 'failed'],
  dialing: ['awaiting-headers', 'failed'],
  'awaiting-headers': ['reading-body', 'failed'],
  'reading-body': ['done', 'failed'],
  done: [],
  failed: [],
};

export type StateListener = (state: FetchState, previous: FetchState) => void;

/**
 * Progress of a single fetch. Moves forward only; done and failed are terminal.
 */
export class FetchLifecycle {
  private current: FetchState = 'unstarted';
  private readonly visited: FetchState[] = ['unstarted'];

  constructor(private readonly listener?: StateListener) {}

  get state(): FetchState {
    return this.current;
  }

  get history(): readonly FetchState[] {
    return this.visited;
  }

  get settled(): boolean {
    return this.current === 'done' || this.current === 'failed';
  }

  canTransition(next: FetchState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  transition(next: FetchState): void {
    if (!this.canTransition(next)) {
      throw new StateError(`Cannot move fetch from ${this.current} to ${next}`, {
        expectedState: TRANSITIONS[this.current].join(' | ') || 'none',
        actualState: this.current,
      });
    }
    const previous = this.current;
    this.current = next;
    this.visited.push(next);
    this.listener?.(next, previous);
  }

  /**
   * Move to failed unless already settled
   */
  fail(): void {
    if (!this.settled && this.canTransition('failed')) {
      this.transition('failed');
    }
  }
}
