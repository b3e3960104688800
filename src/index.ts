// module entry point

// Boot-step orchestration
export * from './lib/bootsteps/index';

// Logger
export {
  Logger,
  LoggerService,
  ArraySink,
  ConsoleSink,
  LogLevel,
  type LogEntry,
  type LogOptions,
  type LogSink,
  type LogType,
  type LoggerOptions,
} from './lib/logger/index';

// Event handling
export {
  EventEmitterProtected,
  type EventCallback,
} from './lib/event-emitter';

// Callback handling
export {
  safeHandleCallback,
  reportAsProcessWarning,
  type CallbackErrorReporter,
} from './lib/safe-handle-callback';

// Utility functions
export { isPromise } from './lib/is-promise';
export { PromiseProtectedResolver } from './lib/promise-protected-resolver';
export { sleep } from './lib/sleep';
