import type { LoggerService } from '../logger/logger-service';
import { defaultModuleImporter, instantiate } from './instantiate';
import type { Namespace } from './namespace';
import type {
  BlueprintInfo,
  ComponentContext,
  ComponentHost,
  LifecycleComponent,
  ServiceObject,
} from './types';

/**
 * Base class for boot-steps
 *
 * The constructor runs when the component is bound to a host object, so it can
 * initialize attributes on the host at host instantiation time. `create()` is
 * the constructive step; it runs only when `includeIf()` allows it.
 *
 * Components are registered explicitly:
 *
 * @example
 * ```typescript
 * class TimerComponent extends Component<Worker, Timer> {
 *   public create(worker: Worker): Timer {
 *     worker.timer = new Timer();
 *     return worker.timer;
 *   }
 * }
 *
 * registerComponent(TimerComponent, { name: 'worker.timer' });
 * ```
 */
export abstract class Component<
  TParent extends ComponentHost = ComponentHost,
  TObj = unknown,
> {
  public readonly name: string;
  public readonly namespaceName: string;
  public readonly requires: readonly string[];
  public readonly last: boolean;
  public readonly enabled: boolean;

  /** Keyword configuration passed to `Namespace.apply()` */
  public readonly options: Readonly<Record<string, unknown>>;

  /** Owning namespace, set right after binding */
  public namespace: Namespace | null = null;

  /** Object returned by `create()`, once included */
  public obj: TObj | null = null;

  /** Component logger (scoped to the namespace and component name) */
  protected readonly logger: LoggerService;

  protected readonly blueprint: BlueprintInfo;

  constructor(_parent: TParent, context: ComponentContext) {
    this.blueprint = context.blueprint;
    this.name = context.blueprint.name;
    this.namespaceName = context.blueprint.namespace;
    this.requires = context.blueprint.requires;
    this.last = context.blueprint.last;
    this.enabled = context.blueprint.enabled;
    this.options = context.options;
    this.logger = context.logger;
  }

  /**
   * Create the component's runtime object
   *
   * Not every component creates one; the default returns null.
   */
  public create(_parent: TParent): TObj | null | Promise<TObj | null> {
    return null;
  }

  /**
   * Whether this component takes part in the host at all
   *
   * Defaults to the blueprint's `enabled` flag. Override to depend on host state.
   */
  public includeIf(_parent: TParent): boolean {
    return this.enabled;
  }

  /**
   * Create the component if `includeIf()` allows it
   *
   * @returns true when included
   */
  public async include(parent: TParent): Promise<boolean> {
    if (!this.includeIf(parent)) {
      return false;
    }

    this.obj = await this.create(parent);
    return true;
  }

  /**
   * Construct a class by qualified name (`"module:Export"`), for components
   * that load their implementation at run time
   *
   * Uses the owning namespace's module importer once bound.
   */
  public instantiate(
    qualifiedName: string,
    ...args: unknown[]
  ): Promise<object> {
    return instantiate(
      qualifiedName,
      args,
      this.namespace?.importModule ?? defaultModuleImporter,
    );
  }
}

/**
 * A component that owns a started/stopped service object
 *
 * Lifecycle calls are forwarded to `obj`. When `create()` returned nothing the
 * calls are no-ops unless overridden. Included instances append themselves to
 * the host's `components` list; that list, in boot order, is what the
 * namespace starts and (in reverse) stops.
 */
export abstract class StartStopComponent<
    TParent extends ComponentHost = ComponentHost,
    TObj extends ServiceObject = ServiceObject,
  >
  extends Component<TParent, TObj>
  implements LifecycleComponent
{
  public start(_parent: TParent): Promise<void> | void {
    return this.obj?.start();
  }

  public stop(_parent: TParent): Promise<void> | void {
    return this.obj?.stop();
  }

  /**
   * Called on every shutdown before stop/terminate, even when startup never
   * completed. No-op by default.
   */
  public close(_parent: TParent): Promise<void> | void {}

  /**
   * Forced shutdown; defaults to stop(). Override to skip graceful draining.
   */
  public terminate(parent: TParent): Promise<void> | void {
    return this.stop(parent);
  }

  public async include(parent: TParent): Promise<boolean> {
    const included = await super.include(parent);

    if (included) {
      parent.components.push(this);
    }

    return included;
  }
}

/**
 * Capability check used by the namespace when collecting its components
 */
export function isStartStopComponent(
  component: Component<ComponentHost>,
): component is StartStopComponent {
  return component instanceof StartStopComponent;
}
