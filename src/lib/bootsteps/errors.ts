/**
 * Error thrown when a component blueprint can't be registered
 *
 * Raised at definition time, from `registerComponent()`, never deferred to
 * claim time. Common causes:
 * - Missing or empty name
 * - Name without a namespace (neither `namespace` nor a `"namespace.name"` form)
 */
export class ComponentDefinitionError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Definition';
  public errCode = 'InvalidDefinition';
  public additionalInfo: { className: string; name?: string };

  constructor(
    message: string,
    additionalInfo: { className: string; name?: string },
  ) {
    super(message);
    this.name = 'ComponentDefinitionError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when the `requires` relation of a namespace contains a cycle
 *
 * Example: worker.pool requires worker.timer, worker.timer requires worker.pool
 */
export class DependencyCycleError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Dependency';
  public errCode = 'CyclicDependency';
  public additionalInfo: { cycle: string[]; namespace?: string };

  constructor(additionalInfo: { cycle: string[]; namespace?: string }) {
    const where = additionalInfo.namespace
      ? ` in namespace "${additionalInfo.namespace}"`
      : '';

    super(
      `Circular dependency detected${where}: ${additionalInfo.cycle.join(' -> ')} -> ${additionalInfo.cycle[0] ?? ''}`,
    );
    this.name = 'DependencyCycleError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a component requires a name that isn't claimed by its namespace
 */
export class MissingDependencyError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Dependency';
  public errCode = 'NotFound';
  public additionalInfo: {
    componentName: string;
    missingDependency: string;
    namespace?: string;
  };

  constructor(additionalInfo: {
    componentName: string;
    missingDependency: string;
    namespace?: string;
  }) {
    super(
      `Component "${additionalInfo.componentName}" requires "${additionalInfo.missingDependency}", but it is not registered in namespace "${additionalInfo.namespace ?? '(unknown)'}".`,
    );
    this.name = 'MissingDependencyError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a Namespace operation is called in the wrong state,
 * e.g. `start()` before `apply()` or a second `start()`
 */
export class NamespaceStateError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Lifecycle';
  public errCode = 'InvalidState';
  public additionalInfo: {
    namespace: string;
    operation: string;
    state: string;
  };

  constructor(additionalInfo: {
    namespace: string;
    operation: string;
    state: string;
  }) {
    super(
      `Cannot ${additionalInfo.operation} namespace "${additionalInfo.namespace}" in state ${additionalInfo.state}`,
    );
    this.name = 'NamespaceStateError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when a qualified name points at a module that lacks the export
 */
export class SymbolNotFoundError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Import';
  public errCode = 'SymbolNotFound';
  public additionalInfo: { moduleID: string; exportName: string };

  constructor(additionalInfo: { moduleID: string; exportName: string }) {
    super(
      `Module "${additionalInfo.moduleID}" has no export named "${additionalInfo.exportName}"`,
    );
    this.name = 'SymbolNotFoundError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error thrown when `instantiate()` resolves to something that isn't a class
 */
export class NotConstructableError extends Error {
  public errPrefix = 'BootstepsErr';
  public errType = 'Import';
  public errCode = 'NotConstructable';
  public additionalInfo: { qualifiedName: string; actualType: string };

  constructor(additionalInfo: { qualifiedName: string; actualType: string }) {
    super(
      `"${additionalInfo.qualifiedName}" resolved to a ${additionalInfo.actualType}, expected a class`,
    );
    this.name = 'NotConstructableError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error prefix constant for all bootsteps errors
 */
export const bootstepsErrPrefix = 'BootstepsErr';

/**
 * Error type constants
 */
export const bootstepsErrTypes = {
  Definition: 'Definition',
  Dependency: 'Dependency',
  Lifecycle: 'Lifecycle',
  Import: 'Import',
} as const;

/**
 * Error code constants
 */
export const bootstepsErrCodes = {
  InvalidDefinition: 'InvalidDefinition',
  CyclicDependency: 'CyclicDependency',
  NotFound: 'NotFound',
  InvalidState: 'InvalidState',
  SymbolNotFound: 'SymbolNotFound',
  NotConstructable: 'NotConstructable',
} as const;
