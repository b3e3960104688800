/**
 * Log level enum for filtering logs by severity
 * Lower numbers = more important/higher priority
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  NOTICE = 2, // Normal but significant condition
  SUCCESS = 3,
  // eslint-disable-next-line @typescript-eslint/no-duplicate-enum-values
  INFO = 3, // Same level as SUCCESS (routine operational info)
  DEBUG = 4, // Boot order, per-component start/stop tracing
  RAW = 99,
}

export type LogType =
  | 'error'
  | 'info'
  | 'warn'
  | 'success'
  | 'notice'
  | 'debug'
  | 'raw';

export function getLogLevel(type: LogType): LogLevel {
  switch (type) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'notice':
      return LogLevel.NOTICE;
    case 'success':
      return LogLevel.SUCCESS;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    case 'raw':
      return LogLevel.RAW;
  }
}

/**
 * Options for log methods
 */
export interface LogOptions {
  params?: Record<string, unknown>;
  tags?: string[];
}

/**
 * Complete log entry that gets passed to sinks
 */
export interface LogEntry {
  timestamp: number;
  type: LogType;
  serviceName?: string; // e.g. 'bootsteps:worker'
  entityName?: string; // e.g. the component a namespace line is about
  template: string; // "Starting {{name}}..."
  message: string; // "Starting pool..."
  params?: Record<string, unknown>;
  error?: unknown; // Original error object from errorObject() calls
  tags?: string[];
}

/**
 * Sink interface - all sinks must implement this
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type ArrayLogTransformer = (entry: LogEntry) => LogEntry | false;

export interface LoggerOptions {
  sinks?: LogSink[];
  onSinkError?: (
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ) => void;
}
