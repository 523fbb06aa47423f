import { describe, it, expect, afterEach } from 'vitest';
import type { LogEntry } from '../logger.js';
import { addLogTransport, createLogger, formatLogLine, isLogLevel, redactSecrets, setLogLevel } from '../logger.js';

describe('logger', () => {
  const cleanups: Array<() => void> = [];

  function capture(): LogEntry[] {
    const entries: LogEntry[] = [];
    cleanups.push(addLogTransport((entry) => entries.push(entry)));
    return entries;
  }

  afterEach(() => {
    while (cleanups.length) cleanups.pop()?.();
    setLogLevel('info');
  });

  it('stamps entries with scope, level, data and task id', () => {
    setLogLevel('error');
    const entries = capture();
    createLogger('FixController').error('Aborted', { reason: 'x' }, 'task-1');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      scope: 'FixController',
      message: 'Aborted',
      data: { reason: 'x' },
      taskId: 'task-1',
    });
    expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
  });

  it('drops entries below the minimum level', () => {
    setLogLevel('warn');
    const entries = capture();
    const log = createLogger('Test');
    log.debug('d');
    log.info('i');
    log.warn('w');
    expect(entries.map((entry) => entry.message)).toEqual(['w']);
  });

  it('stops delivering after the transport is removed', () => {
    setLogLevel('error');
    const entries: LogEntry[] = [];
    const remove = addLogTransport((entry) => entries.push(entry));
    remove();
    createLogger('Test').error('gone');
    expect(entries).toEqual([]);
  });

  it('keeps logging when a transport throws', () => {
    setLogLevel('error');
    cleanups.push(addLogTransport(() => { throw new Error('broken transport'); }));
    const entries = capture();
    expect(() => createLogger('Test').error('still here')).not.toThrow();
    expect(entries.map((entry) => entry.message)).toEqual(['still here']);
  });

  it('redacts API keys in messages', () => {
    setLogLevel('error');
    const entries = capture();
    createLogger('Test').error('key sk-test-placeholder-value-000000000000');
    expect(entries[0].message).toBe('key sk-test-place****');
  });
});

describe('formatLogLine', () => {
  const base: LogEntry = { timestamp: '2025-06-01T12:00:00.000Z', level: 'info', scope: 'Queue', message: 'Queued' };

  it('prints the scope and message', () => {
    expect(formatLogLine(base)).toBe('[Queue] Queued');
  });

  it('adds the task id to the tag and appends data as JSON', () => {
    expect(formatLogLine({ ...base, taskId: 't-1', data: { priority: 0.4 } }))
      .toBe('[Queue:t-1] Queued {"priority":0.4}');
  });
});

describe('redactSecrets', () => {
  it('leaves short sk- strings alone', () => {
    expect(redactSecrets('sk-short')).toBe('sk-short');
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});
