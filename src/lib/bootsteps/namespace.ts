import { ulid } from 'ulid';
import { EventEmitterProtected } from '../event-emitter';
import type { LoggerService } from '../logger/logger-service';
import { isStartStopComponent } from './component';
import type { Component, StartStopComponent } from './component';
import { DependencyGraph } from './dependency-graph';
import { NamespaceStateError } from './errors';
import type { NamespaceEventMap } from './events';
import { defaultModuleImporter } from './instantiate';
import type { ModuleImporter } from './instantiate';
import { defaultRegistry } from './registry';
import type { ComponentRegistry } from './registry';
import { ShutdownSignal } from './shutdown-signal';
import type { WaitOptions, WaitOutcome } from './shutdown-signal';
import {
  SHUTDOWN_SOCKET_TIMEOUT_MS,
  assertSocketTimeout,
  withDefaultSocketTimeout,
} from './socket-timeout';
import type {
  Blueprint,
  ComponentHost,
  NamespaceOptions,
  NamespaceState,
  StopErrorPolicy,
} from './types';

/**
 * A named group of boot-steps driven as one unit
 *
 * `apply()` claims the namespace's blueprints from the registry, orders them by
 * their `requires` declarations and binds them to the host. `start()` starts
 * the included components in boot order; `stop()` / `terminate()` stop them in
 * reverse order and release everyone waiting in `join()`.
 *
 * States only move forward: `null → RUN → CLOSE → TERMINATE`.
 *
 * @example
 * ```typescript
 * const namespace = new Namespace<Worker>({ name: 'worker', logger });
 *
 * await namespace.apply(worker, { concurrency: 4 });
 * await namespace.start(worker);
 *
 * // elsewhere
 * await namespace.stop(worker);
 * ```
 */
export class Namespace<
  TParent extends ComponentHost = ComponentHost,
> extends EventEmitterProtected<NamespaceEventMap> {
  public readonly name: string;

  /** Correlates this instance's log lines and events */
  public readonly id: string = ulid();

  /** Set exactly once, when the namespace reaches TERMINATE */
  public readonly shutdownComplete = new ShutdownSignal();

  public readonly importModule: ModuleImporter;

  /** Dependency graph built by apply(), kept for inspection */
  public graph: DependencyGraph | null = null;

  protected readonly logger: LoggerService;

  private _state: NamespaceState | null = null;
  private _started = 0;
  private _components: StartStopComponent[] = [];
  private _bootSteps: Component[] = [];
  private applied = false;
  private stopping: Promise<void> | null = null;
  private terminateRequested = false;

  private readonly registry: ComponentRegistry;
  private readonly extraModules: readonly string[];
  private readonly shutdownSocketTimeoutMS: number;
  private readonly stopErrorPolicy: StopErrorPolicy;
  private readonly onStart?: () => Promise<void> | void;
  private readonly onClose?: () => Promise<void> | void;
  private readonly onStopped?: () => Promise<void> | void;

  /**
   * @throws {RangeError} If `shutdownSocketTimeoutMS` is negative or not finite
   */
  constructor(options: NamespaceOptions) {
    super();

    this.name = options.name;
    this.logger = options.logger.service(`bootsteps:${options.name}`);
    this.registry = options.registry ?? defaultRegistry;
    this.importModule = options.importModule ?? defaultModuleImporter;
    this.extraModules = options.modules ?? [];
    this.shutdownSocketTimeoutMS =
      options.shutdownSocketTimeoutMS ?? SHUTDOWN_SOCKET_TIMEOUT_MS;
    assertSocketTimeout(this.shutdownSocketTimeoutMS);
    this.stopErrorPolicy = options.stopErrorPolicy ?? 'propagate';
    this.onStart = options.onStart;
    this.onClose = options.onClose;
    this.onStopped = options.onStopped;
  }

  public get state(): NamespaceState | null {
    return this._state;
  }

  /** Number of components whose start() has been called */
  public get started(): number {
    return this._started;
  }

  /** Included StartStop components, in boot order */
  public get components(): readonly StartStopComponent[] {
    return this._components;
  }

  /** Every bound component, in boot order */
  public get bootSteps(): readonly Component[] {
    return this._bootSteps;
  }

  public get isApplied(): boolean {
    return this.applied;
  }

  public get isShutdownComplete(): boolean {
    return this.shutdownComplete.isSet;
  }

  /**
   * Module identifiers to load before claiming; subclasses override this to
   * pull in the modules that register their components
   */
  public modules(): string[] {
    return [];
  }

  /**
   * Claim, order, bind and include this namespace's components
   *
   * @param options - Keyword configuration handed to every component
   * @throws {NamespaceStateError} When called a second time
   * @throws {DependencyCycleError} When the requirements have no valid order
   * @throws {MissingDependencyError} When a requirement isn't registered
   */
  public async apply(
    parent: TParent,
    options: Readonly<Record<string, unknown>> = {},
  ): Promise<this> {
    if (this.applied) {
      throw new NamespaceStateError({
        namespace: this.name,
        operation: 'apply',
        state: 'applied',
      });
    }
    this.applied = true;

    this.logger.debug('Loading modules.');
    await this.loadModules();

    this.logger.debug('Claiming components.');
    const claimed = this.registry.claim(this.name);

    this.logger.debug('Building boot step graph.');
    const order = this.resolveBootOrder(claimed);

    this._bootSteps = order.map((blueprint) =>
      this.bindComponent(blueprint, parent, options),
    );

    this.logger.debug('New boot order: {{{order}}}', {
      params: { order: this.getBootOrder() },
    });

    for (const component of this._bootSteps) {
      const included = await component.include(parent);

      if (included && isStartStopComponent(component)) {
        this._components.push(component);
      }

      this.emit('component:included', {
        namespaceID: this.id,
        name: component.name,
        included,
      });
    }

    this.emit('namespace:applied', {
      namespaceID: this.id,
      bootOrder: this.getBootOrder(),
      components: this._components.map((component) => component.name),
    });

    return this;
  }

  /**
   * Start every included component in boot order
   *
   * A start failure propagates unchanged; the namespace stays in RUN with
   * `started` counting the failed component, so a later stop() skips the
   * component stop calls. If shutdown begins while a start call is pending,
   * the remaining components are not started.
   *
   * @throws {NamespaceStateError} Before apply() or when already started
   */
  public async start(parent: TParent): Promise<void> {
    if (!this.applied || this._state !== null) {
      throw new NamespaceStateError({
        namespace: this.name,
        operation: 'start',
        state: this.applied ? (this._state ?? 'unset') : 'unapplied',
      });
    }

    this.setState('RUN');

    if (this.onStart) {
      await this.onStart();
    }

    for (const [index, component] of this._components.entries()) {
      if (this.isShuttingDown()) {
        this.logger.debug(
          'Shutdown requested during startup, not starting {{name}}',
          { params: { name: component.name } },
        );
        return;
      }

      this.logger.debug('Starting {{name}}...', {
        params: { name: component.name },
      });
      this.emit('component:starting', {
        namespaceID: this.id,
        name: component.name,
        index,
      });

      this._started = index + 1;
      await component.start(parent);

      this.logger.debug('{{name}} OK!', { params: { name: component.name } });
      this.emit('component:started', {
        namespaceID: this.id,
        name: component.name,
        index,
      });
    }
  }

  /**
   * Run `onClose`, then close() every component on the host
   *
   * Called by stop() on every shutdown, including after a partial start.
   */
  public async close(parent: TParent): Promise<void> {
    if (this.onClose) {
      await this.onClose();
    }

    for (const component of [...parent.components]) {
      await component.close(parent);
    }
  }

  /**
   * Stop the components in reverse boot order and set the shutdown signal
   *
   * Runs at most once: a call made while a stop is in progress waits for it,
   * and calls after TERMINATE return immediately. A terminate request that
   * arrives during a warm stop switches the components not yet stopped to
   * terminate().
   */
  public async stop(parent: TParent, terminate = false): Promise<void> {
    if (this.stopping) {
      if (terminate && !this.terminateRequested) {
        this.terminateRequested = true;
        this.logger.debug('Terminate requested, escalating shutdown');
      } else {
        this.logger.debug('Shutdown already in progress');
      }
      return this.stopping;
    }

    if (this._state === 'CLOSE' || this._state === 'TERMINATE') {
      return;
    }

    this.terminateRequested = terminate;
    this.stopping = withDefaultSocketTimeout(this.shutdownSocketTimeoutMS, () =>
      this.shutdown(parent),
    );

    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }
  }

  public terminate(parent: TParent): Promise<void> {
    return this.stop(parent, true);
  }

  /**
   * Wait for the shutdown signal; never rejects
   */
  public join(options?: WaitOptions): Promise<WaitOutcome> {
    return this.shutdownComplete.wait(options);
  }

  public getBootOrder(): string[] {
    return this._bootSteps.map((component) => component.name);
  }

  public getComponent(name: string): Component | undefined {
    return this._bootSteps.find((component) => component.name === name);
  }

  /**
   * Load the modules that register this namespace's components
   */
  protected async loadModules(): Promise<void> {
    for (const moduleID of [...this.modules(), ...this.extraModules]) {
      await this.importModule(moduleID);
    }
  }

  /**
   * @returns The claimed blueprints in boot order
   */
  private resolveBootOrder(
    claimed: ReadonlyMap<string, Blueprint>,
  ): Blueprint[] {
    const blueprints = [...claimed.values()];
    const graph = new DependencyGraph(
      blueprints.map((blueprint) => [blueprint.name, blueprint.requires]),
      this.name,
    );

    const [last, ...ignoredLast] = blueprints.filter(
      (blueprint) => blueprint.last,
    );

    if (ignoredLast.length > 0 && last) {
      this.logger.warn(
        'Several components are marked last; using {{chosen}}, ignoring {{ignored}}',
        {
          params: {
            chosen: last.name,
            ignored: ignoredLast.map((blueprint) => blueprint.name),
          },
        },
      );
    }

    if (last) {
      for (const node of graph) {
        if (node !== last.name) {
          graph.addEdge(last.name, node);
        }
      }
    }

    this.graph = graph;

    // topsort() throws for unknown requirements, so every name is claimed
    return graph.topsort().flatMap((name) => claimed.get(name) ?? []);
  }

  private bindComponent(
    blueprint: Blueprint,
    parent: TParent,
    options: Readonly<Record<string, unknown>>,
  ): Component {
    const component = blueprint.bind(parent, {
      options,
      logger: this.logger.entity(blueprint.name),
    });
    component.namespace = this;

    return component;
  }

  private async shutdown(parent: TParent): Promise<void> {
    const fullyStarted =
      this._state === 'RUN' && this._started === this._components.length;
    let failures = 0;

    try {
      await this.close(parent);

      if (!fullyStarted) {
        this.logger.debug(
          'Not fully started ({{started}} of {{total}}), skipping component shutdown',
          {
            params: { started: this._started, total: this._components.length },
          },
        );
        return;
      }

      this.setState('CLOSE');

      for (const component of [...this._components].reverse()) {
        // Read per component: terminate() may escalate a running warm stop
        const terminate = this.terminateRequested;
        const verb = terminate ? 'Terminating' : 'Stopping';

        this.logger.debug(`${verb} {{name}}...`, {
          params: { name: component.name },
        });
        this.emit('component:stopping', {
          namespaceID: this.id,
          name: component.name,
          terminate,
        });

        try {
          if (terminate) {
            await component.terminate(parent);
          } else {
            await component.stop(parent);
          }
        } catch (error) {
          failures++;

          if (this.stopErrorPolicy === 'propagate') {
            throw error;
          }

          this.logger
            .entity(component.name)
            .errorObject(`${verb} failed`, error);
          this.emit('component:stop-failed', {
            namespaceID: this.id,
            name: component.name,
            terminate,
            error,
          });
          continue;
        }

        this.emit('component:stopped', {
          namespaceID: this.id,
          name: component.name,
          terminate,
        });
      }

      if (this.onStopped) {
        await this.onStopped();
      }
    } finally {
      this.finishShutdown(this.terminateRequested, fullyStarted, failures);
    }
  }

  private finishShutdown(
    terminate: boolean,
    fullyStarted: boolean,
    failures: number,
  ): void {
    this.setState('TERMINATE');

    if (this.shutdownComplete.set()) {
      this.emit('namespace:shutdown-completed', {
        namespaceID: this.id,
        terminate,
        fullyStarted,
        failures,
      });
    }
  }

  private isShuttingDown(): boolean {
    return this.stopping !== null || this._state !== 'RUN';
  }

  private setState(state: NamespaceState): void {
    const from = this._state;
    if (from === state) {
      return;
    }

    this._state = state;
    this.emit('namespace:state-changed', {
      namespaceID: this.id,
      from,
      to: state,
    });
  }
}
