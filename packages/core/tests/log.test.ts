import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger, setConsoleEcho, getLogHistory, clearLogs, onLog, type LogEntry } from '../src/log.js';

beforeEach(() => {
  clearLogs();
});

afterEach(() => {
  setConsoleEcho(true);
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  it('prefixes console output with the tag', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('store').warn('disk full', 3);
    expect(spy).toHaveBeenCalledWith('[STORE]:', 'disk full', 3);
  });

  it('records entries even when echo is off', () => {
    setConsoleEcho(false);
    const spy = vi.spyOn(console, 'log');
    createLogger('reminders').log('scheduled', { id: 'a' });
    createLogger('store').error('failed:', new Error('locked'));

    expect(spy).not.toHaveBeenCalled();
    expect(getLogHistory().map(e => [e.level, e.tag, e.message])).toEqual([
      ['log', 'reminders', 'scheduled {"id":"a"}'],
      ['error', 'store', 'failed: locked'],
    ]);
  });

  it('keeps the last 200 entries', () => {
    setConsoleEcho(false);
    const log = createLogger('t');
    for (let i = 0; i < 205; i++) log.log(`m${i}`);

    const history = getLogHistory();
    expect(history).toHaveLength(200);
    expect(history[0]?.message).toBe('m5');
  });

  it('notifies listeners until they unsubscribe', () => {
    setConsoleEcho(false);
    const seen: LogEntry[] = [];
    const off = onLog(e => seen.push(e));
    const log = createLogger('t');
    log.log('one');
    off();
    log.log('two');
    expect(seen.map(e => e.message)).toEqual(['one']);
  });
});
