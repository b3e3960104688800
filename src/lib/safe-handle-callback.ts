import { isPromise } from './is-promise';

/**
 * Receives errors thrown (or rejected) by a guarded callback
 */
export type CallbackErrorReporter = (callbackName: string, error: unknown) => void;

/**
 * Fallback reporter: surfaces the error as a process warning instead of
 * letting it escape into the caller
 */
export const reportAsProcessWarning: CallbackErrorReporter = (
  callbackName,
  error,
) => {
  const message = error instanceof Error ? error.message : String(error);

  process.emitWarning(`Error in a callback ${callbackName}: ${message}`, {
    type: 'CallbackError',
  });
};

/**
 * Calls a callback without letting its errors reach the caller
 *
 * Handles both synchronous callbacks and callbacks returning a Promise. This
 * is fire-and-forget: async callbacks aren't awaited, their rejections go to
 * `onError` like synchronous throws do.
 *
 * @param callbackName - Used when reporting errors
 * @param callback - The function to call
 * @param onError - Where errors are reported
 * @param args - Arguments passed to the callback
 */
export function safeHandleCallback<TArgs extends unknown[]>(
  callbackName: string,
  callback: (...args: TArgs) => unknown,
  onError: CallbackErrorReporter,
  ...args: TArgs
): void {
  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.then(undefined, (error: unknown) => {
        onError(callbackName, error);
      });
    }
  } catch (error) {
    onError(callbackName, error);
  }
}
