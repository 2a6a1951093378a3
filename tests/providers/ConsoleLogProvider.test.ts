import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { TrafficLogEvent } from '../../src/providers/ILogProvider.js';

describe('ConsoleLogProvider', () => {
  let provider: ConsoleLogProvider;

  beforeEach(() => {
    provider = new ConsoleLogProvider();
  });

  it('should keep events in arrival order', () => {
    provider.info('first');
    provider.warn('second');
    provider.error('third');
    expect(provider.events.map((e) => e.message)).toEqual(['first', 'second', 'third']);
  });

  it('should auto-set timestamp if omitted', () => {
    provider.log({ level: 'info', message: 'no ts' });
    const ts = provider.events[0].timestamp;
    expect(ts).toBeDefined();
    expect(new Date(ts ?? '').toISOString()).toBe(ts);
  });

  it('should preserve provided timestamp', () => {
    const ts = '2026-01-15T12:00:00.000Z';
    provider.log({ level: 'warn', message: 'with ts', timestamp: ts });
    expect(provider.events[0].timestamp).toBe(ts);
  });

  it('should keep the extra fields of a traffic record', () => {
    const record: TrafficLogEvent = {
      level: 'info',
      message: '\nip: ::1\nGET http://localhost/?\n',
      method: 'GET',
      path: '/',
      status: 200,
      startTime: 10,
      endTime: 12,
      durationMs: 2,
      responseCaptured: false,
    };
    provider.log(record);
    expect(provider.events[0]).toMatchObject({ method: 'GET', durationMs: 2, responseCaptured: false });
  });

  it('convenience methods should set level and fields', () => {
    provider.debug('verbose');
    provider.error('broken', { path: '/api/echo' });
    expect(provider.events[0]).toMatchObject({ level: 'debug', message: 'verbose' });
    expect(provider.events[1]).toMatchObject({
      level: 'error',
      message: 'broken',
      fields: { path: '/api/echo' },
    });
  });

  it('find() should return events whose message contains the text', () => {
    provider.error('error compiling pattern [x');
    provider.info('listening');
    expect(provider.find('compiling')).toHaveLength(1);
    expect(provider.find('nothing like this')).toEqual([]);
  });

  it('flush() should resolve immediately', async () => {
    provider.info('test');
    await expect(provider.flush()).resolves.toBeUndefined();
  });

  it('should write to console when outputToConsole is true', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const loud = new ConsoleLogProvider({ outputToConsole: true });
    loud.warn('slow request', { durationMs: 900 });
    expect(spy).toHaveBeenCalledWith('[WARN] slow request {"durationMs":900}');
    spy.mockRestore();
  });

  it('should not write to console by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    provider.info('silent');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('clear() should empty the events buffer', () => {
    provider.info('one');
    provider.info('two');
    provider.clear();
    expect(provider.events).toHaveLength(0);
  });
});
