import { StateTransitionError } from '@cyforge/shared';

export type LifecycleState =
  | 'idle'
  | 'scanning'
  | 'pruning'
  | 'building'
  | 'reporting'
  | 'cleaning'
  | 'done'
  | 'failed';

export type TerminalState = Extract<LifecycleState, 'done' | 'failed'>;

/**
 * Legal moves. `building` always passes through `reporting`, so every run that got as far
 * as compiling produces a report.
 */
export const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  idle: ['scanning', 'cleaning'],
  scanning: ['pruning', 'failed'],
  pruning: ['building', 'failed'],
  building: ['reporting'],
  reporting: ['done', 'failed'],
  cleaning: ['done', 'failed'],
  done: [],
  failed: [],
};

export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: LifecycleState): state is TerminalState {
  return state === 'done' || state === 'failed';
}

/**
 * Holds the current state and rejects moves the table does not allow.
 * `onChange` sees every accepted transition, in order.
 */
export class LifecycleMachine {
  private current: LifecycleState = 'idle';

  constructor(
    private readonly onChange: (from: LifecycleState, to: LifecycleState) => void = () => {},
  ) {}

  get state(): LifecycleState {
    return this.current;
  }

  transition(to: LifecycleState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new StateTransitionError(from, to);
    }
    this.current = to;
    this.onChange(from, to);
  }
}
