import {
  TimerState,
  TimerStates,
  canReset,
  canStart,
  canStop,
  type TimerStateValue,
} from '../../../src/domain/timers/TimerState';

const ALL_STATES: TimerStateValue[] = ['NEW', 'ACTIVE', 'INACTIVE', 'FINISHED'];

describe('TimerState predicates', () => {
  test.each([
    ['NEW', true],
    ['ACTIVE', false],
    ['INACTIVE', true],
    ['FINISHED', false],
  ] as const)('canStart(%s) is %s', (state, expected) => {
    expect(canStart(state)).toBe(expected);
  });

  test.each([
    ['NEW', false],
    ['ACTIVE', true],
    ['INACTIVE', false],
    ['FINISHED', false],
  ] as const)('canStop(%s) is %s', (state, expected) => {
    expect(canStop(state)).toBe(expected);
  });

  test('reset is allowed from every state, NEW included', () => {
    for (const state of ALL_STATES) {
      expect(canReset(state)).toBe(true);
    }
  });

  test('TimerStates names every state value', () => {
    expect(Object.values(TimerStates).sort()).toEqual([...ALL_STATES].sort());
  });
});

describe('TimerState', () => {
  test('starts NEW and exposes predicates for the current value', () => {
    const s = new TimerState();
    expect(s.value).toBe('NEW');
    expect(s.canStart).toBe(true);
    expect(s.canStop).toBe(false);
    expect(s.canReset).toBe(true);
  });

  test('transitions move the current value', () => {
    const s = new TimerState();

    s.toActive();
    expect(s.value).toBe('ACTIVE');
    expect(s.canStart).toBe(false);
    expect(s.canStop).toBe(true);

    s.toInactive();
    expect(s.value).toBe('INACTIVE');
    expect(s.canStart).toBe(true);

    s.toFinished();
    expect(s.value).toBe('FINISHED');
    expect(s.canStart).toBe(false);
    expect(s.canStop).toBe(false);
    expect(s.canReset).toBe(true);

    s.toNew();
    expect(s.value).toBe('NEW');
  });
});
