import { afterEach, describe, expect, it, vi } from 'vitest';
import { formatTimestamp, initializeLogger, withTimestamp } from '../logger';

const originals = {
  log: console.log,
  error: console.error,
  warn: console.warn,
  info: console.info,
  debug: console.debug,
};

describe('logger', () => {
  afterEach(() => {
    Object.assign(console, originals);
  });

  it('formats local time as [HH:MM:SS.mmm]', () => {
    expect(formatTimestamp(new Date(2024, 0, 1, 9, 5, 7, 42))).toBe('[09:05:07.042]');
  });

  it('merges the timestamp into a leading component tag', () => {
    expect(withTimestamp(['[Admission Scheduler] Started', { polling: true }], '[09:05:07.042]')).toEqual([
      '[09:05:07.042] [Admission Scheduler] Started',
      { polling: true },
    ]);
  });

  it('prepends the timestamp as its own argument otherwise', () => {
    expect(withTimestamp([{ count: 1 }, 'untagged'], '[09:05:07.042]')).toEqual([
      '[09:05:07.042]',
      { count: 1 },
      'untagged',
    ]);
  });

  it('wraps console methods once', () => {
    const log = vi.fn();
    const warn = vi.fn();
    console.log = log;
    console.warn = warn;

    initializeLogger();
    initializeLogger();

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[Logger\] Timestamped logging enabled$/);

    console.warn('[Counter Store] slow write', 42);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[Counter Store\] slow write$/);
    expect(warn.mock.calls[0]?.[1]).toBe(42);
  });
});
