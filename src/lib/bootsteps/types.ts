import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import type { Component } from './component';
import type { ModuleImporter } from './instantiate';
import type { ComponentRegistry } from './registry';

/**
 * What every StartStop-capable component exposes to the Namespace state machine
 *
 * Each method may be sync or async; the namespace awaits the result.
 */
export interface LifecycleComponent {
  readonly name: string;
  start(parent: ComponentHost): Promise<void> | void;
  stop(parent: ComponentHost): Promise<void> | void;
  close(parent: ComponentHost): Promise<void> | void;
  terminate(parent: ComponentHost): Promise<void> | void;
}

/**
 * The host ("parent") object whose services the components create and manage
 *
 * StartStop components append themselves to `components` when included. The
 * namespace passes the host unchanged to every constructor, `create()`,
 * `includeIf()` and lifecycle call and puts no other constraint on it.
 */
export interface ComponentHost {
  components: LifecycleComponent[];
}

/**
 * A service object created by a StartStopComponent and driven through it
 */
export interface ServiceObject {
  start(): Promise<void> | void;
  stop(): Promise<void> | void;
}

/**
 * Declarative description of a boot-step, as passed to `registerComponent()`
 */
export interface ComponentDefinition {
  /** Component name, or `"namespace.name"` to set both at once */
  name: string;
  /** Owning namespace; taken from a dotted name when omitted */
  namespace?: string;
  /** Names of components in the same namespace that must start first */
  requires?: readonly string[];
  /** Force this component after every other one in its namespace */
  last?: boolean;
  /** Default for `includeIf()` (default: true) */
  enabled?: boolean;
  /** Abstract blueprints are never stored in the registry */
  abstract?: boolean;
}

/**
 * Normalized blueprint metadata
 */
export interface BlueprintInfo {
  readonly name: string;
  readonly namespace: string;
  readonly requires: readonly string[];
  readonly last: boolean;
  readonly enabled: boolean;
  readonly abstract: boolean;
  /** Class name of the component implementation, for logs and errors */
  readonly className: string;
}

/**
 * Per-namespace inputs handed to a blueprint when it's bound
 */
export interface BindInput {
  /** Keyword configuration passed to `Namespace.apply()` */
  options: Readonly<Record<string, unknown>>;
  /** Logger scoped to the component */
  logger: LoggerService;
}

/**
 * A registered component blueprint: metadata plus the way to bind it to a host
 */
export interface Blueprint<TParent extends ComponentHost = ComponentHost>
  extends BlueprintInfo {
  bind(parent: TParent, input: BindInput): Component<TParent>;
}

/**
 * Second constructor argument of every component
 */
export interface ComponentContext extends BindInput {
  blueprint: BlueprintInfo;
}

/**
 * Constructor of a concrete component class
 */
export type ComponentClass<TParent extends ComponentHost> = new (
  parent: TParent,
  context: ComponentContext,
) => Component<TParent>;

/**
 * Namespace lifecycle state; `null` until start()
 */
export type NamespaceState = 'RUN' | 'CLOSE' | 'TERMINATE';

/**
 * What stop()/terminate() does when a component's stop call throws
 *
 * - `propagate`: rethrow the first failure once the namespace has still
 *   reached TERMINATE and fired its shutdown signal
 * - `continue`: log the failure, keep stopping the remaining components
 */
export type StopErrorPolicy = 'propagate' | 'continue';

export interface NamespaceOptions {
  /** Registry bucket this namespace claims */
  name: string;
  logger: Logger;
  /** Where blueprints are claimed from (default: the process-wide registry) */
  registry?: ComponentRegistry;
  /** Called after state becomes RUN, before any component starts */
  onStart?: () => Promise<void> | void;
  /** Called at the beginning of close() */
  onClose?: () => Promise<void> | void;
  /** Called after every component stopped, before state becomes TERMINATE */
  onStopped?: () => Promise<void> | void;
  /** Default socket timeout during the shutdown window (default: 5000) */
  shutdownSocketTimeoutMS?: number;
  /** Default: 'propagate' */
  stopErrorPolicy?: StopErrorPolicy;
  /** Module identifiers loaded before claiming, in addition to `modules()` */
  modules?: readonly string[];
  /** Loads modules by identifier (default: dynamic `import()`) */
  importModule?: ModuleImporter;
}
