import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

const entry = (overrides: Partial<LogEntry> = {}): LogEntry => ({
  timestamp: 0,
  type: 'info',
  template: 'Test message',
  message: 'Test message',
  ...overrides,
});

describe('ArraySink', () => {
  test('should store log entries', () => {
    const sink = new ArraySink();
    const first = entry();

    sink.write(first);

    expect(sink.logs).toEqual([first]);
  });

  test('should clear all logs', () => {
    const sink = new ArraySink();
    sink.write(entry());
    sink.write(entry());

    sink.clear();

    expect(sink.logs).toHaveLength(0);
  });

  test('should render message lines', () => {
    const sink = new ArraySink();
    sink.write(entry({ message: 'Info message' }));
    sink.write(entry({ type: 'error', message: 'Error message' }));

    expect(sink.getMessageLines()).toEqual([
      'info: Info message',
      'error: Error message',
    ]);
  });

  test('should filter messages by type and service', () => {
    const sink = new ArraySink();
    sink.write(entry({ type: 'debug', serviceName: 'a', message: 'one' }));
    sink.write(entry({ type: 'debug', serviceName: 'b', message: 'two' }));
    sink.write(entry({ type: 'info', serviceName: 'a', message: 'three' }));

    expect(sink.messagesOfType('debug')).toEqual(['one', 'two']);
    expect(sink.messagesOfType('debug', 'a')).toEqual(['one']);
  });

  test('should keep the original entry when the transformer returns false', () => {
    const sink = new ArraySink({
      transformer: (log) =>
        log.message === 'Keep original'
          ? false
          : { ...log, message: `Transformed: ${log.message}` },
    });

    sink.write(entry({ message: 'Keep original' }));
    sink.write(entry({ message: 'Transform this' }));

    expect(sink.logs[0].message).toBe('Keep original');
    expect(sink.logs[1].message).toBe('Transformed: Transform this');
  });

  test('should ignore writes after close', () => {
    const sink = new ArraySink();
    sink.close();

    sink.write(entry());

    expect(sink.logs).toHaveLength(0);
  });
});
