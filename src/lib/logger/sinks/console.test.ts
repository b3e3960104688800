import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { ConsoleSink } from './console';
import type { LogEntry } from '../types';
import { LogLevel } from '../types';

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: 0,
  type: 'info',
  template: 'Test message',
  message: 'Test message',
  ...overrides,
});

describe('ConsoleSink', () => {
  let logSpy: MockInstance;
  let errorSpy: MockInstance;
  let warnSpy: MockInstance;
  let infoSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should route each type to the matching console method', () => {
    const sink = new ConsoleSink({ colors: false, minLevel: LogLevel.DEBUG });

    sink.write(entry({ type: 'error', message: 'E' }));
    sink.write(entry({ type: 'warn', message: 'W' }));
    sink.write(entry({ type: 'info', message: 'I' }));
    sink.write(entry({ type: 'debug', message: 'D' }));

    expect(errorSpy).toHaveBeenCalledWith('E');
    expect(warnSpy).toHaveBeenCalledWith('W');
    expect(infoSpy).toHaveBeenCalledWith('I');
    expect(logSpy).toHaveBeenCalledWith('D');
  });

  test('should prefix service and entity names', () => {
    const sink = new ConsoleSink({ colors: false, typeLabels: true });

    sink.write(
      entry({
        serviceName: 'bootsteps:worker',
        entityName: 'pool',
        message: 'Starting pool...',
      }),
    );

    expect(infoSpy).toHaveBeenCalledWith(
      '[INFO] [bootsteps:worker] [pool] Starting pool...',
    );
  });

  test('should drop debug entries at the default level', () => {
    const sink = new ConsoleSink({ colors: false });

    sink.write(entry({ type: 'debug', message: 'hidden' }));

    expect(logSpy).not.toHaveBeenCalled();
    expect(sink.getMinLevel()).toBe(LogLevel.INFO);
  });

  test('should keep the message text when colors are on', () => {
    const sink = new ConsoleSink();

    sink.write(entry({ type: 'warn', message: 'Colored warning' }));

    expect(String(warnSpy.mock.calls[0][0])).toContain('Colored warning');
  });

  test('should write nothing while muted', () => {
    const sink = new ConsoleSink({ muted: true });

    sink.write(entry({ type: 'error' }));
    expect(errorSpy).not.toHaveBeenCalled();

    sink.unmute();
    sink.write(entry({ type: 'error' }));
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test('should print raw entries unformatted', () => {
    const sink = new ConsoleSink({ typeLabels: true });

    sink.write(entry({ type: 'raw', message: 'plain' }));

    expect(logSpy).toHaveBeenCalledWith('plain');
  });
});
