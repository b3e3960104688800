import type { HandleLog } from './internal-types';
import type { LogOptions } from './types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * LoggerService for scoped logging with a service name, and optionally an
 * entity name (e.g. `logger.service('bootsteps:worker').entity('pool')`)
 */
export class LoggerService {
  private readonly handleLog: HandleLog;
  private readonly serviceName: string;
  private readonly entityName?: string;

  constructor(handleLog: HandleLog, serviceName: string, entityName?: string) {
    this.handleLog = handleLog;
    this.serviceName = serviceName;
    this.entityName = entityName;
  }

  /**
   * Create a logger for one entity within this service
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, this.serviceName, entityName);
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  /**
   * Log an error object with a prefix line
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
      error,
    });
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  private log(
    type: 'error' | 'warn' | 'notice' | 'success' | 'info' | 'debug',
    message: string,
    options?: LogOptions,
  ): void {
    this.handleLog(type, message, {
      ...options,
      serviceName: this.serviceName,
      entityName: this.entityName,
    });
  }
}
