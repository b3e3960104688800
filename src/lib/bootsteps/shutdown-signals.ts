import type { Logger } from '../logger';
import type { Namespace } from './namespace';
import type { ComponentHost } from './types';

export type ShutdownSignalName = 'SIGINT' | 'SIGTERM' | 'SIGQUIT';

/**
 * Where signals come from; `process` in production, an EventEmitter in tests
 */
export interface SignalSource {
  on(signal: ShutdownSignalName, listener: () => void): unknown;
  off(signal: ShutdownSignalName, listener: () => void): unknown;
}

export interface AttachShutdownSignalsOptions<TParent extends ComponentHost> {
  namespace: Namespace<TParent>;
  parent: TParent;
  logger: Logger;
  /** Default: the current process */
  process?: SignalSource;
}

/**
 * Wire process signals to a namespace's shutdown
 *
 * - SIGTERM: warm shutdown (`stop`)
 * - SIGQUIT: cold shutdown (`terminate`)
 * - SIGINT: warm on the first press, cold on the second
 *
 * Shutdown failures are logged; the namespace has reached TERMINATE by then.
 *
 * @returns A function that removes the listeners
 *
 * @example
 * ```typescript
 * const detach = attachShutdownSignals({ namespace, parent: worker, logger });
 * await namespace.join();
 * detach();
 * ```
 */
export function attachShutdownSignals<TParent extends ComponentHost>(
  options: AttachShutdownSignalsOptions<TParent>,
): () => void {
  const { namespace, parent } = options;
  const source: SignalSource = options.process ?? process;
  const logger = options.logger.service(`bootsteps:${namespace.name}:signals`);
  let interrupts = 0;

  const shutdown = (signal: ShutdownSignalName, cold: boolean): void => {
    logger.warn('{{signal}} received, starting {{kind}} shutdown', {
      params: { signal, kind: cold ? 'cold' : 'warm' },
    });

    const stopping = cold
      ? namespace.terminate(parent)
      : namespace.stop(parent);

    stopping.catch((error: unknown) => {
      logger.errorObject(`Shutdown after ${signal} failed`, error);
    });
  };

  const onTerm = (): void => {
    shutdown('SIGTERM', false);
  };

  const onQuit = (): void => {
    shutdown('SIGQUIT', true);
  };

  const onInt = (): void => {
    interrupts++;
    shutdown('SIGINT', interrupts > 1);
  };

  source.on('SIGTERM', onTerm);
  source.on('SIGQUIT', onQuit);
  source.on('SIGINT', onInt);

  return () => {
    source.off('SIGTERM', onTerm);
    source.off('SIGQUIT', onQuit);
    source.off('SIGINT', onInt);
  };
}
