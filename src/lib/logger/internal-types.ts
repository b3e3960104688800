/**
 * Internal types shared by Logger and LoggerService, not part of the public API
 */

import type { LogOptions, LogType } from './types';

export interface HandleLogOptions extends LogOptions {
  serviceName?: string;
  entityName?: string;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;
