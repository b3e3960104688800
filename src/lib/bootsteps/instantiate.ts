import { NotConstructableError, SymbolNotFoundError } from './errors';

/**
 * Loads a module by identifier and resolves with its namespace object
 */
export type ModuleImporter = (moduleID: string) => Promise<unknown>;

/**
 * Dynamic `import()`; identifiers resolve like bare imports from this package
 * (package names, `node:` builtins, absolute paths or file URLs)
 */
export const defaultModuleImporter: ModuleImporter = (moduleID) =>
  import(moduleID);

export interface QualifiedName {
  moduleID: string;
  exportName: string;
}

/**
 * Split `"module:Export"` at the last colon
 *
 * Without a colon the module's default export is meant. Builtins therefore
 * need an explicit export: `"node:events:EventEmitter"`.
 */
export function parseQualifiedName(qualifiedName: string): QualifiedName {
  const separator = qualifiedName.lastIndexOf(':');

  if (separator <= 0 || separator === qualifiedName.length - 1) {
    return { moduleID: qualifiedName, exportName: 'default' };
  }

  return {
    moduleID: qualifiedName.slice(0, separator),
    exportName: qualifiedName.slice(separator + 1),
  };
}

/**
 * Resolve `"module:Export"` to the exported value
 *
 * @throws {SymbolNotFoundError} If the module has no such export
 */
export async function symbolByName(
  qualifiedName: string,
  importModule: ModuleImporter = defaultModuleImporter,
): Promise<unknown> {
  const { moduleID, exportName } = parseQualifiedName(qualifiedName);
  const mod = await importModule(moduleID);

  if (
    mod === null ||
    (typeof mod !== 'object' && typeof mod !== 'function') ||
    !(exportName in mod)
  ) {
    throw new SymbolNotFoundError({ moduleID, exportName });
  }

  const value: unknown = Reflect.get(mod, exportName);
  return value;
}

/**
 * Construct the class named by `"module:Export"` with the given arguments
 *
 * @example
 * ```typescript
 * const emitter = await instantiate('node:events:EventEmitter');
 * ```
 *
 * @throws {SymbolNotFoundError} If the module has no such export
 * @throws {NotConstructableError} If the export isn't a class
 */
export async function instantiate(
  qualifiedName: string,
  args: readonly unknown[] = [],
  importModule: ModuleImporter = defaultModuleImporter,
): Promise<object> {
  const target = await symbolByName(qualifiedName, importModule);

  // Arrow functions and methods have no prototype and can't be constructed
  if (typeof target !== 'function' || !('prototype' in target)) {
    throw new NotConstructableError({
      qualifiedName,
      actualType: typeof target,
    });
  }

  const instance: unknown = Reflect.construct(target, args);

  if (instance === null || typeof instance !== 'object') {
    throw new NotConstructableError({
      qualifiedName,
      actualType: typeof instance,
    });
  }

  return instance;
}
