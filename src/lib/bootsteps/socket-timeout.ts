/**
 * Process-wide default network I/O timeout
 *
 * Node has no global socket timeout, so this module holds one as explicit
 * configuration state. Components that open sockets read it with
 * `getDefaultSocketTimeout()` or `applyDefaultSocketTimeout(socket)`.
 *
 * Namespace.stop() lowers it to SHUTDOWN_SOCKET_TIMEOUT_MS for the length of
 * the shutdown window through `withDefaultSocketTimeout()`, so a hung socket
 * operation inside a component's stop() can't block shutdown forever. Each
 * window ends by dropping only its own override, so namespaces that shut down
 * at the same time leave the base value in place once all of them finish.
 */

/** Default socket timeout applied while a namespace shuts down */
export const SHUTDOWN_SOCKET_TIMEOUT_MS = 5000;

interface SocketTimeoutOverride {
  timeoutMS: number | null;
}

/** `null` means no timeout (sockets wait indefinitely) */
let baseSocketTimeoutMS: number | null = null;

/** Active scoped overrides, oldest first; the newest one wins */
const overrides: SocketTimeoutOverride[] = [];

/**
 * Anything with a Node-style `setTimeout(ms)` method, such as `net.Socket`
 */
export interface TimeoutConfigurable {
  setTimeout(timeoutMS: number): unknown;
}

/**
 * @throws {RangeError} If the value is negative or not finite
 */
export function assertSocketTimeout(timeoutMS: number | null): void {
  if (timeoutMS !== null && (!Number.isFinite(timeoutMS) || timeoutMS < 0)) {
    throw new RangeError(
      `Socket timeout must be a non-negative number of milliseconds, got ${timeoutMS}`,
    );
  }
}

export function getDefaultSocketTimeout(): number | null {
  const active = overrides.at(-1);
  return active ? active.timeoutMS : baseSocketTimeoutMS;
}

/**
 * Set the base value. While a scoped override is active, the override stays
 * in effect and the new base applies once every override has ended.
 *
 * @throws {RangeError} If the value is negative or not finite
 */
export function setDefaultSocketTimeout(timeoutMS: number | null): void {
  assertSocketTimeout(timeoutMS);
  baseSocketTimeoutMS = timeoutMS;
}

/**
 * Run `fn` with the default socket timeout overridden
 *
 * Overrides may overlap across concurrent calls. Each one removes only its own
 * entry when `fn` returns or throws, and the default falls back to the newest
 * override still active, or to the base value.
 *
 * @example
 * ```typescript
 * await withDefaultSocketTimeout(5000, async () => {
 *   await broker.disconnect();
 * });
 * ```
 */
export async function withDefaultSocketTimeout<T>(
  timeoutMS: number | null,
  fn: () => T | Promise<T>,
): Promise<T> {
  assertSocketTimeout(timeoutMS);

  const entry: SocketTimeoutOverride = { timeoutMS };
  overrides.push(entry);

  try {
    return await fn();
  } finally {
    overrides.splice(overrides.indexOf(entry), 1);
  }
}

/**
 * Apply the current default to a socket
 *
 * @returns true if a timeout was set, false when there is no default
 */
export function applyDefaultSocketTimeout(socket: TimeoutConfigurable): boolean {
  const timeoutMS = getDefaultSocketTimeout();
  if (timeoutMS === null) {
    return false;
  }

  socket.setTimeout(timeoutMS);
  return true;
}
