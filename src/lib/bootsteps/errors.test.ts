import { describe, expect, test } from 'vitest';
import {
  ComponentDefinitionError,
  DependencyCycleError,
  MissingDependencyError,
  NamespaceStateError,
  NotConstructableError,
  SymbolNotFoundError,
  bootstepsErrCodes,
  bootstepsErrPrefix,
  bootstepsErrTypes,
} from './errors';

describe('bootsteps errors', () => {
  test('carry the shared prefix, type and code', () => {
    const cases: Array<[Error & { errPrefix: string; errType: string; errCode: string }, string, string]> = [
      [
        new ComponentDefinitionError('bad', { className: 'Pool' }),
        bootstepsErrTypes.Definition,
        bootstepsErrCodes.InvalidDefinition,
      ],
      [
        new DependencyCycleError({ cycle: ['a', 'b'] }),
        bootstepsErrTypes.Dependency,
        bootstepsErrCodes.CyclicDependency,
      ],
      [
        new MissingDependencyError({ componentName: 'pool', missingDependency: 'timer' }),
        bootstepsErrTypes.Dependency,
        bootstepsErrCodes.NotFound,
      ],
      [
        new NamespaceStateError({ namespace: 'worker', operation: 'start', state: 'RUN' }),
        bootstepsErrTypes.Lifecycle,
        bootstepsErrCodes.InvalidState,
      ],
      [
        new SymbolNotFoundError({ moduleID: 'app', exportName: 'Pool' }),
        bootstepsErrTypes.Import,
        bootstepsErrCodes.SymbolNotFound,
      ],
      [
        new NotConstructableError({ qualifiedName: 'app:Pool', actualType: 'string' }),
        bootstepsErrTypes.Import,
        bootstepsErrCodes.NotConstructable,
      ],
    ];

    for (const [error, errType, errCode] of cases) {
      expect(error).toBeInstanceOf(Error);
      expect(error.errPrefix).toBe(bootstepsErrPrefix);
      expect(error.errType).toBe(errType);
      expect(error.errCode).toBe(errCode);
    }
  });

  test('messages name what went wrong', () => {
    expect(new DependencyCycleError({ cycle: ['a', 'b'], namespace: 'worker' }).message).toBe(
      'Circular dependency detected in namespace "worker": a -> b -> a',
    );
    expect(
      new MissingDependencyError({
        componentName: 'pool',
        missingDependency: 'timer',
      }).message,
    ).toBe('Component "pool" requires "timer", but it is not registered in namespace "(unknown)".');
    expect(
      new NamespaceStateError({ namespace: 'worker', operation: 'start', state: 'RUN' }).message,
    ).toBe('Cannot start namespace "worker" in state RUN');
    expect(new SymbolNotFoundError({ moduleID: 'app', exportName: 'Pool' }).message).toBe(
      'Module "app" has no export named "Pool"',
    );
    expect(
      new NotConstructableError({ qualifiedName: 'app:Pool', actualType: 'string' }).message,
    ).toBe('"app:Pool" resolved to a string, expected a class');
  });

  test('errors carry their own class name', () => {
    expect(new DependencyCycleError({ cycle: ['a'] }).name).toBe('DependencyCycleError');
    expect(new ComponentDefinitionError('bad', { className: 'Pool' }).name).toBe(
      'ComponentDefinitionError',
    );
  });
});
