import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink stores logs in memory for testing and debugging
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer ? this.transformer(entry) : false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Logs as `"type: message"` lines, for compact assertions
   */
  public getMessageLines(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  /**
   * Messages of one log type, optionally restricted to one service
   */
  public messagesOfType(type: LogEntry['type'], serviceName?: string): string[] {
    return this.logs
      .filter(
        (log) =>
          log.type === type &&
          (serviceName === undefined || log.serviceName === serviceName),
      )
      .map((log) => log.message);
  }

  /**
   * Close the sink and stop accepting new logs
   */
  public close(): void {
    this.closed = true;
  }
}
