/**
 * bootsteps - dependency-ordered boot-step orchestration
 *
 * Components declare what they require; a Namespace resolves the order, binds
 * them to a host object, starts them in order and stops them in reverse.
 *
 * @module bootsteps
 */

export { Namespace } from './namespace';
export {
  Component,
  StartStopComponent,
  isStartStopComponent,
} from './component';
export {
  ComponentRegistry,
  defaultRegistry,
  normalizeDefinition,
  registerComponent,
} from './registry';
export { DependencyGraph, type DependencyGraphEntry } from './dependency-graph';
export {
  ShutdownSignal,
  type WaitOptions,
  type WaitOutcome,
} from './shutdown-signal';
export {
  SHUTDOWN_SOCKET_TIMEOUT_MS,
  applyDefaultSocketTimeout,
  assertSocketTimeout,
  getDefaultSocketTimeout,
  setDefaultSocketTimeout,
  withDefaultSocketTimeout,
  type TimeoutConfigurable,
} from './socket-timeout';
export {
  defaultModuleImporter,
  instantiate,
  parseQualifiedName,
  symbolByName,
  type ModuleImporter,
  type QualifiedName,
} from './instantiate';
export {
  attachShutdownSignals,
  type AttachShutdownSignalsOptions,
  type ShutdownSignalName,
  type SignalSource,
} from './shutdown-signals';
export type { NamespaceEventMap, NamespaceEventName } from './events';

export type {
  BindInput,
  Blueprint,
  BlueprintInfo,
  ComponentClass,
  ComponentContext,
  ComponentDefinition,
  ComponentHost,
  LifecycleComponent,
  NamespaceOptions,
  NamespaceState,
  ServiceObject,
  StopErrorPolicy,
} from './types';

export {
  ComponentDefinitionError,
  DependencyCycleError,
  MissingDependencyError,
  NamespaceStateError,
  NotConstructableError,
  SymbolNotFoundError,
  bootstepsErrPrefix,
  bootstepsErrTypes,
  bootstepsErrCodes,
} from './errors';
