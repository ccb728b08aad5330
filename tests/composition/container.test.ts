import fs from 'fs';
import os from 'os';
import path from 'path';
import { createTimer, loadRuntimeSettings } from '../../src/composition/container';
import { ManualClockDriver } from '../../src/adapters/sys/ManualClockDriver';
import type { RuntimeSettings } from '../../src/config';
import { TimerVariants } from '../../src/domain/timers/TimerVariant';
import type { TimePort } from '../../src/ports/sys/TimePort';
import { RecordingLogger } from '../support/fakes';

jest.mock('../../src/env', () => ({
  CONFIG_PATH: undefined,
  DEBUG_MODE: false,
  TICKWORK_FRAME_RATE: undefined,
  TICKWORK_LOG_LEVEL: 'warn',
}));

describe('container', () => {
  const settings: RuntimeSettings = { frameRate: 4, keepAlive: true, logLevel: 'error' };
  const time: TimePort = {
    now: () => Date.now(),
    uptime: () => Date.now(),
    toLocaleTimeString: (epochMs) => String(epochMs),
  };

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.clearAllTimers();
    jest.useRealTimers();
  });

  test('loadRuntimeSettings merges the config file with the environment', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickwork-container-'));
    const configPath = path.join(dir, 'tickwork.config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ driver: { frameRate: 30, keepAlive: false }, logging: { level: 'error' } })
    );

    expect(loadRuntimeSettings(configPath)).toEqual({ frameRate: 30, keepAlive: false, logLevel: 'warn' });
  });

  test('timers run on an interval driver at the configured frame rate', () => {
    const onTick = jest.fn();
    const timer = createTimer(TimerVariants.basic({ interval: 0.5, onTick }), {
      settings,
      time,
      logger: new RecordingLogger(),
      label: 'ticker',
    });

    expect(timer.label).toBe('ticker');
    expect(timer.start()).toBe(true);
    jest.advanceTimersByTime(1_000);

    expect(timer.elapsedTime).toBe(1);
    expect(timer.timesTicked).toBe(2);
    expect(onTick).toHaveBeenCalledTimes(2);

    timer.dispose();
    jest.advanceTimersByTime(1_000);
    expect(timer.elapsedTime).toBe(1);
  });

  test('an explicit frame rate overrides the settings', () => {
    const timer = createTimer(TimerVariants.stopwatch(), {
      settings,
      time,
      logger: new RecordingLogger(),
      frameRate: 2,
    });

    timer.start();
    jest.advanceTimersByTime(1_000);

    expect(timer.elapsedTime).toBe(1);
    timer.dispose();
  });

  test('a finished timer stops its driver', () => {
    const onFinish = jest.fn();
    const timer = createTimer(TimerVariants.delay({ delay: 0.5, onFinish }), {
      settings,
      time,
      logger: new RecordingLogger(),
    });

    timer.start();
    jest.advanceTimersByTime(2_000);

    expect(onFinish).toHaveBeenCalledTimes(1);
    expect(timer.state).toBe('FINISHED');
    expect(timer.elapsedTime).toBe(0.5);
    expect(jest.getTimerCount()).toBe(0);
  });

  test('manual timers have no driver', () => {
    const timer = createTimer(TimerVariants.basic({ interval: 1 }), {
      settings,
      time,
      logger: new RecordingLogger(),
      manual: true,
    });

    timer.start();
    jest.advanceTimersByTime(5_000);
    expect(timer.elapsedTime).toBe(0);

    timer.advance(1);
    expect(timer.timesTicked).toBe(1);
  });

  test('a supplied driver is used as is', () => {
    const driver = new ManualClockDriver();
    const timer = createTimer(TimerVariants.basic({ interval: 1 }), {
      settings,
      time,
      logger: new RecordingLogger(),
      driver,
    });

    timer.start();
    expect(driver.isRunning).toBe(true);
    driver.run(3, 1);
    expect(timer.timesTicked).toBe(3);

    timer.dispose();
    expect(driver.isCancelled).toBe(true);
  });
});
