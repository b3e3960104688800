/**
 * Worker boot-steps demo
 *
 * Demonstrates:
 * - Declaring components with requires / last
 * - Boot order resolution
 * - Start in order, stop in reverse
 * - Warm shutdown on Ctrl+C, cold shutdown on a second Ctrl+C
 */

import { ConsoleSink, LogLevel, Logger } from '../../logger';
import { sleep } from '../../sleep';
import {
  Component,
  ComponentRegistry,
  Namespace,
  StartStopComponent,
  attachShutdownSignals,
  registerComponent,
} from '../index';
import type { LifecycleComponent, ServiceObject } from '../index';

class Worker {
  public components: LifecycleComponent[] = [];
  public concurrency = 4;
  public hub: EventHub | null = null;
}

class EventHub {
  public readonly handlers = new Map<string, () => void>();
}

class Timer implements ServiceObject {
  private interval: ReturnType<typeof setInterval> | null = null;

  public start(): void {
    this.interval = setInterval(() => {}, 1000);
  }

  public stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }
}

class Pool implements ServiceObject {
  private readonly size: number;
  private readonly logger: Logger;

  constructor(size: number, logger: Logger) {
    this.size = size;
    this.logger = logger;
  }

  public async start(): Promise<void> {
    await sleep(200);
    this.logger.info(`Pool running with ${this.size} processes`);
  }

  public async stop(): Promise<void> {
    await sleep(100);
    this.logger.info('Pool drained');
  }
}

class Consumer implements ServiceObject {
  public async start(): Promise<void> {
    await sleep(100);
  }

  public async stop(): Promise<void> {
    await sleep(50);
  }
}

const logger = new Logger({
  sinks: [new ConsoleSink({ minLevel: LogLevel.DEBUG })],
});
const registry = new ComponentRegistry();

class HubComponent extends Component<Worker, EventHub> {
  public create(worker: Worker): EventHub {
    worker.hub = new EventHub();
    return worker.hub;
  }
}

class TimerComponent extends StartStopComponent<Worker, Timer> {
  public create(): Timer {
    return new Timer();
  }
}

class PoolComponent extends StartStopComponent<Worker, Pool> {
  public create(worker: Worker): Pool {
    return new Pool(worker.concurrency, logger);
  }
}

class ConsumerComponent extends StartStopComponent<Worker, Consumer> {
  public create(): Consumer {
    return new Consumer();
  }
}

registerComponent(HubComponent, { name: 'worker.hub' }, registry);
registerComponent(ConsumerComponent, { name: 'worker.consumer', last: true }, registry);
registerComponent(PoolComponent, { name: 'worker.pool', requires: ['timer'] }, registry);
registerComponent(TimerComponent, { name: 'worker.timer', requires: ['hub'] }, registry);

async function main() {
  logger.info('=== Boot-steps Demo ===\n');

  const worker = new Worker();
  const namespace = new Namespace<Worker>({ name: 'worker', logger, registry });

  namespace.on('component:started', (data) => {
    logger.success(`✓ ${data.name} started`);
  });

  namespace.on('namespace:shutdown-completed', (data) => {
    logger.success(
      `Shutdown complete (${data.terminate ? 'cold' : 'warm'})`,
    );
  });

  await namespace.apply(worker);
  logger.info(`Boot order: ${namespace.getBootOrder().join(' → ')}\n`);

  await namespace.start(worker);

  const detach = attachShutdownSignals({ namespace, parent: worker, logger });

  logger.info('\n=== Demo Running ===');
  logger.info('Press Ctrl+C for a warm shutdown, twice for a cold one\n');

  await namespace.join();
  detach();
  await logger.close();
}

main().catch((error: unknown) => {
  logger.errorObject('Demo failed', error);
  process.exitCode = 1;
});
