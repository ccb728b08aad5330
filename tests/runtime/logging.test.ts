import fs from 'fs';
import os from 'os';
import path from 'path';
import { initializeLogging } from '../../src/runtime/logging';

describe('initializeLogging', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('is a no-op without a log file', async () => {
    const before = console.info;
    const handle = initializeLogging();

    expect(handle.logPath).toBeUndefined();
    expect(console.info).toBe(before);
    handle.shutdown();
    await expect(handle.closed).resolves.toBeUndefined();
  });

  test('mirrors console output to the file until shutdown', async () => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickwork-log-'));
    const logFile = path.join(dir, 'nested', 'run.log');

    const handle = initializeLogging(logFile);
    console.info('Timer started', { timerId: 'a' });
    console.warn(new Error('late frame').message);
    handle.shutdown();
    handle.shutdown();
    console.info('after shutdown');
    await handle.closed;

    expect(handle.logPath).toBe(path.resolve(logFile));
    const lines = fs
      .readFileSync(logFile, 'utf8')
      .trimEnd()
      .split('\n')
      .map((line) => line.replace(/^\[[^\]]+\] /, ''));
    expect(lines).toEqual([
      '--- tickwork session started ---',
      'INFO Timer started {"timerId":"a"}',
      'WARN late frame',
      '--- tickwork session ended ---',
    ]);
  });

  test('an unwritable log file restores the console and reports the error', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const infoBefore = console.info;
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickwork-log-'));

    const handle = initializeLogging(dir);
    await handle.closed;

    expect(console.info).toBe(infoBefore);
    expect(console.error).toBe(errorSpy);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe(`Failed to write log file ${path.resolve(dir)}:`);
    expect(errorSpy.mock.calls[0][1]).toMatchObject({ code: 'EISDIR' });

    handle.shutdown();
    expect(console.info).toBe(infoBefore);
  });

  test('restores the original console methods', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickwork-log-'));
    const original = console.debug;

    const handle = initializeLogging(path.join(dir, 'run.log'));
    expect(console.debug).not.toBe(original);
    handle.shutdown();
    await handle.closed;

    expect(console.debug).toBe(original);
  });
});
