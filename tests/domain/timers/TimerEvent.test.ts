import { createTimerEvent, firingRate, isOfKind } from '../../../src/domain/timers/TimerEvent';

describe('TimerEvent', () => {
  const fields = {
    kind: 'tick' as const,
    timestamp: 1_000,
    deltaTime: 0.5,
    timerLifetime: 1.5,
    timesFired: 3,
  };

  test('createTimerEvent copies the fields into a frozen snapshot', () => {
    const event = createTimerEvent(fields);
    expect(event).toEqual(fields);
    expect(event).not.toBe(fields);
    expect(Object.isFrozen(event)).toBe(true);
  });

  test('isOfKind compares the event kind', () => {
    const tick = createTimerEvent(fields);
    const finish = createTimerEvent({ ...fields, kind: 'finish' });
    expect(isOfKind(tick, 'tick')).toBe(true);
    expect(isOfKind(tick, 'finish')).toBe(false);
    expect(isOfKind(finish, 'finish')).toBe(true);
  });

  test('firingRate divides times fired by lifetime', () => {
    expect(firingRate(createTimerEvent(fields))).toBe(2);
    expect(firingRate(createTimerEvent({ ...fields, timerLifetime: 0 }))).toBe(0);
  });
});
