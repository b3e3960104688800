import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  /** Entries less important than this are dropped (default: INFO) */
  minLevel?: LogLevel;
}

/**
 * ConsoleSink writes logs to the console with optional colors, timestamps, and type labels
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw type - no formatting and always shown
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const formattedMessage = this.format(entry);
    const output = this.colors
      ? colorize(entry.type, formattedMessage)
      : formattedMessage;

    switch (entry.type) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(output);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(output);
        break;
      case 'info':
        // eslint-disable-next-line no-console
        console.info(output);
        break;
      case 'success':
      case 'notice':
      case 'debug':
        // eslint-disable-next-line no-console
        console.log(output);
        break;
    }
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  /**
   * Close the sink and stop accepting new logs
   */
  public close(): void {
    this.closed = true;
  }

  private format(entry: LogEntry): string {
    let formattedMessage = '';

    if (this.timestamps) {
      formattedMessage =
        '[' + format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss') + '] ';
    }

    if (this.typeLabels) {
      formattedMessage += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      formattedMessage += `[${entry.serviceName}] `;
    }

    if (entry.entityName) {
      formattedMessage += `[${entry.entityName}] `;
    }

    return formattedMessage + entry.message;
  }
}
