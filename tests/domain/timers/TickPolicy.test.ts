import {
  defaultShouldFinish,
  defaultShouldTick,
  shouldFinish,
  shouldTick,
  type TimerSnapshot,
} from '../../../src/domain/timers/TickPolicy';

function snapshot(overrides: Partial<Omit<TimerSnapshot, 'now'>> = {}): TimerSnapshot {
  return {
    elapsedTime: 10,
    elapsedSinceLastTick: 0,
    elapsedSinceLastFinish: 0,
    now: () => 0,
    ...overrides,
  };
}

describe('TickPolicy defaults', () => {
  test('ticks once the time since the last tick reaches the interval', () => {
    expect(defaultShouldTick(snapshot({ interval: 1, elapsedSinceLastTick: 0.99 }))).toBe(false);
    expect(defaultShouldTick(snapshot({ interval: 1, elapsedSinceLastTick: 1 }))).toBe(true);
    expect(defaultShouldTick(snapshot({ interval: 1, elapsedSinceLastTick: 1.2 }))).toBe(true);
  });

  test('never ticks without an interval', () => {
    expect(defaultShouldTick(snapshot({ elapsedSinceLastTick: 100 }))).toBe(false);
  });

  test('finishes once the time since the last finish reaches the duration', () => {
    expect(defaultShouldFinish(snapshot({ duration: 2, elapsedSinceLastFinish: 1.5 }))).toBe(false);
    expect(defaultShouldFinish(snapshot({ duration: 2, elapsedSinceLastFinish: 2 }))).toBe(true);
  });

  test('never finishes without a duration', () => {
    expect(defaultShouldFinish(snapshot({ elapsedSinceLastFinish: 100 }))).toBe(false);
  });
});

describe('TickPolicy overrides', () => {
  test('a custom predicate replaces the default rule', () => {
    const due = snapshot({ interval: 1, elapsedSinceLastTick: 5, duration: 1, elapsedSinceLastFinish: 5 });
    expect(shouldTick(due)).toBe(true);
    expect(shouldTick(due, () => false)).toBe(false);
    expect(shouldFinish(due)).toBe(true);
    expect(shouldFinish(due, () => false)).toBe(false);
  });

  test('the custom predicate receives the snapshot', () => {
    const s = snapshot();
    const custom = jest.fn(() => true);
    expect(shouldTick(s, custom)).toBe(true);
    expect(custom).toHaveBeenCalledWith(s);
  });
});
