import { ComponentDefinitionError } from './errors';
import type {
  Blueprint,
  BlueprintInfo,
  ComponentClass,
  ComponentDefinition,
  ComponentHost,
} from './types';

/**
 * Table of component blueprints, grouped by namespace
 *
 * Blueprints are added by `registerComponent()` when a component is defined,
 * before any namespace exists. A Namespace claims its own bucket in `apply()`.
 */
export class ComponentRegistry {
  private readonly buckets = new Map<string, Map<string, Blueprint>>();

  /**
   * Store a blueprint under `[namespace][name]`
   *
   * Registering the same name again replaces the blueprint but keeps its
   * original position in registration order.
   */
  public add(blueprint: Blueprint): void {
    let bucket = this.buckets.get(blueprint.namespace);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(blueprint.namespace, bucket);
    }
    bucket.set(blueprint.name, blueprint);
  }

  /**
   * Blueprints registered under `namespace`, in registration order
   *
   * Returns a snapshot; the bucket stays in place so every Namespace with this
   * name (e.g. one per worker instance) claims the same blueprints.
   */
  public claim(namespace: string): ReadonlyMap<string, Blueprint> {
    return new Map(this.buckets.get(namespace));
  }

  public get(namespace: string, name: string): Blueprint | undefined {
    return this.buckets.get(namespace)?.get(name);
  }

  public has(namespace: string, name: string): boolean {
    return this.buckets.get(namespace)?.has(name) ?? false;
  }

  /**
   * @returns true if a blueprint was removed
   */
  public unregister(namespace: string, name: string): boolean {
    const bucket = this.buckets.get(namespace);
    if (!bucket?.delete(name)) {
      return false;
    }
    if (bucket.size === 0) {
      this.buckets.delete(namespace);
    }
    return true;
  }

  public namespaces(): string[] {
    return [...this.buckets.keys()];
  }

  /**
   * Remove one namespace's blueprints, or all of them
   */
  public clear(namespace?: string): void {
    if (namespace === undefined) {
      this.buckets.clear();
    } else {
      this.buckets.delete(namespace);
    }
  }
}

/** Process-wide registry used when no other one is given */
export const defaultRegistry = new ComponentRegistry();

/**
 * Validate a definition and fill in its defaults
 *
 * A name of the form `"namespace.name"` sets both fields when no explicit
 * namespace is given (split at the first dot).
 *
 * @throws {ComponentDefinitionError} If a non-abstract definition has no
 *   usable name or namespace
 */
export function normalizeDefinition(
  className: string,
  definition: ComponentDefinition,
): BlueprintInfo {
  const isAbstract = definition.abstract ?? false;
  let name =
    typeof definition.name === 'string' ? definition.name.trim() : '';
  let namespace = definition.namespace?.trim() ?? '';

  if (!namespace) {
    const dot = name.indexOf('.');
    if (dot !== -1) {
      namespace = name.slice(0, dot);
      name = name.slice(dot + 1);
    }
  }

  if (!isAbstract) {
    if (!name) {
      throw new ComponentDefinitionError(
        `Component ${className} must be named`,
        { className },
      );
    }

    if (!namespace) {
      throw new ComponentDefinitionError(
        `Component "${name}" (${className}) has no namespace; use "namespace.${name}" or set namespace`,
        { className, name },
      );
    }
  }

  return {
    name,
    namespace,
    requires: [...(definition.requires ?? [])],
    last: definition.last ?? false,
    enabled: definition.enabled ?? true,
    abstract: isAbstract,
    className,
  };
}

/**
 * Declare a component: build its blueprint and, unless abstract, store it in
 * the registry
 *
 * @example
 * ```typescript
 * class PoolComponent extends StartStopComponent<Worker, Pool> {
 *   public create(worker: Worker): Pool {
 *     return new Pool(worker.concurrency);
 *   }
 * }
 *
 * registerComponent(PoolComponent, {
 *   name: 'worker.pool',
 *   requires: ['timer'],
 * });
 * ```
 *
 * @throws {ComponentDefinitionError} At definition time, for a missing name
 */
export function registerComponent<TParent extends ComponentHost>(
  componentClass: ComponentClass<TParent>,
  definition: ComponentDefinition,
  registry: ComponentRegistry = defaultRegistry,
): Blueprint<TParent> {
  const info = normalizeDefinition(componentClass.name, definition);

  const blueprint: Blueprint<TParent> = {
    ...info,
    bind(parent, input) {
      return new componentClass(parent, { ...input, blueprint: info });
    },
  };

  if (!info.abstract) {
    registry.add(blueprint);
  }

  return blueprint;
}
