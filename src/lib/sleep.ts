/**
 * Resolve after `ms` milliseconds
 *
 * ```typescript
 * await sleep(50);
 * ```
 */
export function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => {
    setTimeout(resolve, Math.max(0, ms));
  });
}
