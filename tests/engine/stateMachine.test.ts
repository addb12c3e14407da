import { describe, it, expect } from 'vitest';
import { canTransition, validateTransition, validateUserState } from '../../src/engine/stateMachine';

describe('Status transitions', () => {
  it('allows undefined → anything', () => {
    expect(canTransition('undefined', 'next')).toBe(true);
    expect(canTransition('undefined', 'done')).toBe(true);
  });

  it('allows forward moves along the timeline', () => {
    expect(canTransition('next', 'soon')).toBe(true);
    expect(canTransition('soon', 'running')).toBe(true);
    expect(canTransition('running', 'done')).toBe(true);
  });

  it('allows skipping ahead', () => {
    expect(canTransition('next', 'done')).toBe(true);
    expect(canTransition('soon', 'done')).toBe(true);
  });

  it('allows falling back to undefined', () => {
    expect(canTransition('running', 'undefined')).toBe(true);
  });

  it('rejects backward moves', () => {
    expect(canTransition('running', 'soon')).toBe(false);
    expect(canTransition('soon', 'next')).toBe(false);
    expect(canTransition('done', 'running')).toBe(false);
  });

  it('accepts staying put', () => {
    expect(canTransition('done', 'done')).toBe(true);
  });
});

describe('validateTransition', () => {
  it('reports nothing for a consistent observation', () => {
    expect(validateTransition({ status: 'soon', progression: 0 }, { status: 'running', progression: 12 })).toEqual([]);
  });

  it('flags progression outside 0..100', () => {
    expect(validateTransition(null, { status: 'running', progression: 101 }).map((i) => i.kind)).toEqual([
      'progression_out_of_range',
    ]);
  });

  it('flags done below 100 and running at 0', () => {
    expect(validateTransition(null, { status: 'done', progression: 99 }).map((i) => i.kind)).toEqual(['done_incomplete']);
    expect(validateTransition(null, { status: 'running', progression: 0 }).map((i) => i.kind)).toEqual([
      'running_without_progression',
    ]);
  });

  it('flags regressions and backward transitions', () => {
    const issues = validateTransition({ status: 'running', progression: 40 }, { status: 'soon', progression: 0 });
    expect(issues.map((i) => i.kind)).toEqual(['progression_regressed', 'backward_transition']);
    expect(issues[1].message).toBe('Backward status transition: running → soon');
  });

  it('does not flag the drop when the event finishes', () => {
    expect(validateTransition({ status: 'running', progression: 100 }, { status: 'done', progression: 100 })).toEqual([]);
  });
});

describe('validateUserState', () => {
  const calm = { isUserWarmingInProgress: false, userIsGoingToBeHit: false, userHasBeenHit: false, userIsInArea: true };

  it('accepts a single flag', () => {
    expect(validateUserState({ ...calm, userIsGoingToBeHit: true })).toEqual([]);
    expect(validateUserState({ ...calm, userHasBeenHit: true })).toEqual([]);
  });

  it('reports each conflicting pair', () => {
    const issues = validateUserState({ ...calm, userHasBeenHit: true, userIsGoingToBeHit: true, isUserWarmingInProgress: true });
    expect(issues.map((i) => i.message)).toEqual([
      'User both hit and about to be hit',
      'User both hit and warming',
      'User both warming and about to be hit',
    ]);
  });

  it('reports an imminent hit outside the area', () => {
    const issues = validateUserState({ ...calm, userIsGoingToBeHit: true, userIsInArea: false });
    expect(issues).toEqual([{ kind: 'conflicting_user_state', message: 'User about to be hit outside the area' }]);
  });
});
