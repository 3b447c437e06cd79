import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { resolveInside } from '../src/utils/paths.js';
import { Mutex } from '../src/utils/mutex.js';
import { LogLevel, parseLogLevel } from '../src/utils/logger.js';

describe('resolveInside', () => {
  const base = path.resolve('/srv/speech');

  it('resolves paths below the base', () => {
    expect(resolveInside(base, 'src/main.py')).toBe(path.join(base, 'src', 'main.py'));
    expect(resolveInside(base, 'src/../requirements.txt')).toBe(path.join(base, 'requirements.txt'));
  });

  it('refuses absolute paths, escapes and the base itself', () => {
    expect(resolveInside(base, '/etc/passwd')).toBeNull();
    expect(resolveInside(base, '../other/file')).toBeNull();
    expect(resolveInside(base, '.')).toBeNull();
  });
});

describe('Mutex', () => {
  it('runs tasks one at a time in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive(async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(mutex.isLocked()).toBe(true);
    release();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('keeps going after a task fails', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await mutex.runExclusive(async () => 'next')).toBe('next');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels in any case and falls back otherwise', () => {
    expect(parseLogLevel(' Warn ')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose', LogLevel.ERROR)).toBe(LogLevel.ERROR);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
  });
});
