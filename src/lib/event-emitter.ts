/**
 * A small typed event emitter whose `emit` is protected, so only the owning
 * class can fire its events.
 *
 * Handlers run through `safeHandleCallback()`: a throwing or rejecting handler
 * is reported to the emitter's error reporter and never reaches the code that
 * emitted the event.
 */

import {
  reportAsProcessWarning,
  safeHandleCallback,
  type CallbackErrorReporter,
} from './safe-handle-callback';

export type EventCallback<T> = (data: T) => void | Promise<void>;

type EventCallbackSets<TEventMap> = {
  [K in keyof TEventMap]?: Set<EventCallback<TEventMap[K]>>;
};

export class EventEmitterProtected<TEventMap extends object> {
  private events: EventCallbackSets<TEventMap> = {};
  private readonly onHandlerError: CallbackErrorReporter;

  /**
   * @param onHandlerError - Receives errors thrown by event handlers
   */
  constructor(onHandlerError: CallbackErrorReporter = reportAsProcessWarning) {
    this.onHandlerError = onHandlerError;
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe
   */
  public on<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    let callbacks = this.events[event];
    if (!callbacks) {
      callbacks = new Set();
      this.events[event] = callbacks;
    }
    callbacks.add(callback);

    return () => {
      const current = this.events[event];
      if (current) {
        current.delete(callback);
        if (current.size === 0) {
          delete this.events[event];
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after the first emission
   * @returns A function to unsubscribe before it's called
   */
  public once<K extends keyof TEventMap>(
    event: K,
    callback: EventCallback<TEventMap[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public listenerCount(event: keyof TEventMap): number {
    return this.events[event]?.size ?? 0;
  }

  /**
   * Remove all listeners for one event, or for every event
   */
  public clear(event?: keyof TEventMap): void {
    if (event === undefined) {
      this.events = {};
    } else {
      delete this.events[event];
    }
  }

  protected emit<K extends keyof TEventMap>(
    event: K,
    data: TEventMap[K],
  ): void {
    const callbacks = this.events[event];
    if (!callbacks) {
      return;
    }

    // Copy so handlers that unsubscribe (once) don't disturb iteration
    for (const callback of [...callbacks]) {
      safeHandleCallback(
        `event handler for ${String(event)}`,
        callback,
        this.onHandlerError,
        data,
      );
    }
  }
}
