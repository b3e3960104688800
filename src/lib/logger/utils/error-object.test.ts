import { describe, expect, test } from 'vitest';
import { formatErrorObject, prepareErrorObjectLog } from './error-object';
import { DependencyCycleError } from '../../bootsteps/errors';

describe('formatErrorObject', () => {
  test('should include error conventions and additional info', () => {
    const error = new DependencyCycleError({ cycle: ['a', 'b'] });
    error.stack = undefined;

    expect(formatErrorObject(error)).toBe(
      [
        'DependencyCycleError: Circular dependency detected: a -> b -> a',
        '    errPrefix: BootstepsErr',
        '    errType: Dependency',
        '    errCode: CyclicDependency',
        '    additionalInfo.cycle: ["a","b"]',
      ].join('\n'),
    );
  });

  test('should describe non-error values', () => {
    expect(formatErrorObject('oops')).toBe('Non-error value thrown: oops');
  });
});

describe('prepareErrorObjectLog', () => {
  test('should put the prefix on its own line', () => {
    const error = new Error('boom');
    error.stack = undefined;

    expect(prepareErrorObjectLog('  Stop failed ', error)).toBe(
      'Stop failed:\n\nError: boom',
    );
  });

  test('should omit an empty prefix', () => {
    const error = new Error('boom');
    error.stack = undefined;

    expect(prepareErrorObjectLog('', error)).toBe('Error: boom');
  });
});
