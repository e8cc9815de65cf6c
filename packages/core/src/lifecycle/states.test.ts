import { describe, it, expect } from 'vitest';
import { StateTransitionError } from '@cyforge/shared';
import { LifecycleMachine, TRANSITIONS, canTransition, isTerminal } from './states';

describe('LifecycleMachine', () => {
  it('walks the build path and reports each step', () => {
    const seen: string[] = [];
    const machine = new LifecycleMachine((from, to) => seen.push(`${from}->${to}`));
    for (const state of ['scanning', 'pruning', 'building', 'reporting', 'done'] as const) {
      machine.transition(state);
    }
    expect(machine.state).toBe('done');
    expect(seen).toEqual([
      'idle->scanning',
      'scanning->pruning',
      'pruning->building',
      'building->reporting',
      'reporting->done',
    ]);
  });

  it('never skips reporting after building', () => {
    const machine = new LifecycleMachine();
    machine.transition('scanning');
    machine.transition('pruning');
    machine.transition('building');
    expect(() => machine.transition('failed')).toThrow(StateTransitionError);
    expect(() => machine.transition('done')).toThrow('Illegal lifecycle transition: building -> done');
    expect(machine.state).toBe('building');
  });

  it('keeps clean mode apart from the build path', () => {
    expect(canTransition('idle', 'cleaning')).toBe(true);
    expect(canTransition('cleaning', 'scanning')).toBe(false);
    expect(canTransition('scanning', 'cleaning')).toBe(false);
  });

  it('has no way out of a terminal state', () => {
    expect(TRANSITIONS.done).toEqual([]);
    expect(TRANSITIONS.failed).toEqual([]);
    expect(isTerminal('failed')).toBe(true);
    expect(isTerminal('reporting')).toBe(false);
  });
});
