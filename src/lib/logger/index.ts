import { isPromise } from '../is-promise';
import type { LogEntry, LogSink, LogType, LoggerOptions, LogOptions } from './types';
import type { HandleLogOptions } from './internal-types';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import { prepareErrorObjectLog } from './utils/error-object';
import { renderTemplate } from './template';
import { LoggerService } from './logger-service';

/**
 * Root logger with a sink-based architecture
 *
 * Every log call builds one LogEntry and hands it to each sink. Sinks decide
 * formatting and filtering; a failing sink never breaks the caller.
 */
export class Logger {
  private sinks: LogSink[];
  private readonly onSinkError?: LoggerOptions['onSinkError'];
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    this.sinks = options.sinks ?? [];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  /**
   * Log an error object with optional prefix
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    const message = prepareErrorObjectLog(prefix, error);

    this.handleLog('error', message, { ...options, error });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Log a raw message without any formatting
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  /**
   * Create a scoped logger with a service name
   */
  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), serviceName);
  }

  public addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * @returns true if the sink was found and removed
   */
  public removeSink(sink: LogSink): boolean {
    const index = this.sinks.indexOf(sink);
    if (index !== -1) {
      this.sinks.splice(index, 1);
      return true;
    }
    return false;
  }

  public getSinks(): readonly LogSink[] {
    return [...this.sinks];
  }

  /**
   * Close all sinks; the logger drops every later log call
   */
  public async close(): Promise<void> {
    this._closed = true;

    await Promise.all(
      this.sinks.map(async (sink) => {
        if (sink.close) {
          try {
            await sink.close();
          } catch (error) {
            this.handleSinkError(error, 'close', sink);
          }
        }
      }),
    );

    this.sinks = [];
  }

  /**
   * Create a logger for tests: an ArraySink to inspect, and optionally a
   * (muted by default) ConsoleSink
   */
  public static createTestOptimizedLogger(options?: {
    sinks?: LogSink[];
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink();
    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    const sinks: LogSink[] = [arraySink];
    if (consoleSink) {
      sinks.push(consoleSink);
    }
    sinks.push(...(options?.sinks ?? []));

    return { logger: new Logger({ sinks }), arraySink, consoleSink };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const params = options?.params;
    const tags = options?.tags;

    const entry: LogEntry = {
      timestamp: Date.now(),
      type,
      serviceName: options?.serviceName?.trim() || undefined,
      entityName: options?.entityName?.trim() || undefined,
      template,
      message: params ? renderTemplate(template, params) : template,
      params,
      error: options?.error,
      tags: tags && tags.length > 0 ? tags : undefined,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);
        if (isPromise(result)) {
          result.then(undefined, (error: unknown) => {
            this.handleSinkError(error, 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(error, 'write', sink);
      }
    }
  }

  /**
   * Hand sink errors to onSinkError, or fall back to console.error
   */
  private handleSinkError(
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    const message = error instanceof Error ? error.message : String(error);

    if (this.onSinkError) {
      try {
        this.onSinkError(error, context, sink);
      } catch {
        // The error handler itself failed; report the original error once
        // eslint-disable-next-line no-console
        console.error(`Error in onSinkError handler: ${message}`);
      }
    } else {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${message}`,
      );
    }
  }
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';
