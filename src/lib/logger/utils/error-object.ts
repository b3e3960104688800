import { DOUBLE_EOL, EOL, INDENT } from '../../constants';

/**
 * Render an error (or any thrown value) as a multi-line log message
 *
 * Includes the conventional `errPrefix`/`errType`/`errCode` fields and
 * `additionalInfo` when present, followed by the stack.
 */
export function formatErrorObject(error: unknown): string {
  if (!(error instanceof Error)) {
    return `Non-error value thrown: ${String(error)}`;
  }

  const lines = [`${error.name}: ${error.message}`];
  const extra: Record<string, unknown> = { ...error };

  for (const key of ['errPrefix', 'errType', 'errCode'] as const) {
    const value = extra[key];
    if (typeof value === 'string') {
      lines.push(`${INDENT}${key}: ${value}`);
    }
  }

  const additionalInfo = extra['additionalInfo'];
  if (additionalInfo !== null && typeof additionalInfo === 'object') {
    for (const [key, value] of Object.entries(additionalInfo)) {
      lines.push(`${INDENT}additionalInfo.${key}: ${JSON.stringify(value)}`);
    }
  }

  if (error.stack) {
    // The first stack line repeats name and message
    const frames = error.stack.split(EOL).slice(1);
    if (frames.length > 0) {
      lines.push(...frames);
    }
  }

  return lines.join(EOL);
}

/**
 * Prepare an error object for logging with an optional prefix
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  prefix = prefix.trim();

  const prefixLine = prefix.length > 0 ? prefix + ':' + DOUBLE_EOL : '';

  return prefixLine + formatErrorObject(error);
}
