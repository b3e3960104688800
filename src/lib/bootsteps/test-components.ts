/**
 * Test hosts and components for bootsteps unit and integration tests
 *
 * The mock services record every lifecycle call in the host's `calls` list so
 * tests can assert exact ordering without real timers, pools or sockets.
 */

import { sleep } from '../sleep';
import { Component, StartStopComponent } from './component';
import type { ComponentRegistry } from './registry';
import { registerComponent } from './registry';
import type {
  Blueprint,
  ComponentClass,
  LifecycleComponent,
  ServiceObject,
} from './types';

/**
 * Minimal host object, shaped like a worker
 */
export class TestWorker {
  public components: LifecycleComponent[] = [];

  /** `start:a`, `stop:a`, `close:a`, `terminate:a`, `create:a`, in call order */
  public calls: string[] = [];

  /** Components whose service throws from start() */
  public startFailures = new Set<string>();

  /** Components whose service throws from stop() and terminate() */
  public stopFailures = new Set<string>();

  /** Components left out by includeIf() */
  public excluded = new Set<string>();

  /** Per component delay (ms) before start() finishes */
  public startDelays = new Map<string, number>();

  /** Set by HubComponent, which has no lifecycle of its own */
  public hub: MockHub | null = null;

  public callsOfKind(kind: string): string[] {
    return this.calls
      .filter((call) => call.startsWith(`${kind}:`))
      .map((call) => call.slice(kind.length + 1));
  }
}

export class MockService implements ServiceObject {
  public running = false;
  private readonly name: string;
  private readonly worker: TestWorker;

  constructor(name: string, worker: TestWorker) {
    this.name = name;
    this.worker = worker;
  }

  public async start(): Promise<void> {
    this.worker.calls.push(`start:${this.name}`);

    const delay = this.worker.startDelays.get(this.name);
    if (delay !== undefined) {
      await sleep(delay);
    }

    if (this.worker.startFailures.has(this.name)) {
      throw new Error(`${this.name} failed to start`);
    }
    this.running = true;
  }

  public stop(): void {
    this.worker.calls.push(`stop:${this.name}`);
    this.shutDown();
  }

  public terminate(): void {
    this.worker.calls.push(`terminate:${this.name}`);
    this.shutDown();
  }

  private shutDown(): void {
    if (this.worker.stopFailures.has(this.name)) {
      throw new Error(`${this.name} failed to stop`);
    }
    this.running = false;
  }
}

/**
 * StartStop component backed by a MockService named after the component
 */
export class RecordingComponent extends StartStopComponent<
  TestWorker,
  MockService
> {
  public create(worker: TestWorker): MockService {
    worker.calls.push(`create:${this.name}`);
    return new MockService(this.name, worker);
  }

  public includeIf(worker: TestWorker): boolean {
    return this.enabled && !worker.excluded.has(this.name);
  }

  public close(worker: TestWorker): void {
    worker.calls.push(`close:${this.name}`);
  }

  public terminate(_worker: TestWorker): void {
    this.obj?.terminate();
  }
}

export class MockHub {
  public readonly listeners: string[] = [];
}

/**
 * Plain boot-step: creates a shared object on the host, nothing to start
 */
export class HubComponent extends Component<TestWorker, MockHub> {
  public create(worker: TestWorker): MockHub {
    worker.calls.push(`create:${this.name}`);
    worker.hub = new MockHub();
    return worker.hub;
  }
}

export interface TestComponentDefinition {
  name: string;
  requires?: string[];
  last?: boolean;
  enabled?: boolean;
  /** Register a HubComponent instead of a RecordingComponent */
  plain?: boolean;
}

/**
 * Register one component per definition under `namespace`, in the given order
 */
export function registerTestComponents(
  registry: ComponentRegistry,
  namespace: string,
  definitions: TestComponentDefinition[],
): Blueprint<TestWorker>[] {
  return definitions.map(({ plain, ...definition }) => {
    const componentClass: ComponentClass<TestWorker> = plain
      ? HubComponent
      : RecordingComponent;

    return registerComponent(componentClass, { ...definition, namespace }, registry);
  });
}
