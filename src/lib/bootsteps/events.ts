import type { NamespaceState } from './types';

/**
 * Events emitted by a Namespace
 *
 * Every payload carries the namespace `id`, so several namespaces sharing a
 * process (or a log stream) can be told apart.
 */
export interface NamespaceEventMap {
  'namespace:applied': {
    namespaceID: string;
    bootOrder: string[];
    components: string[];
  };
  'namespace:state-changed': {
    namespaceID: string;
    from: NamespaceState | null;
    to: NamespaceState;
  };
  'namespace:shutdown-completed': {
    namespaceID: string;
    terminate: boolean;
    /** false when shutdown skipped component stop calls after a partial start */
    fullyStarted: boolean;
    failures: number;
  };
  'component:included': {
    namespaceID: string;
    name: string;
    included: boolean;
  };
  'component:starting': { namespaceID: string; name: string; index: number };
  'component:started': { namespaceID: string; name: string; index: number };
  'component:stopping': {
    namespaceID: string;
    name: string;
    terminate: boolean;
  };
  'component:stopped': {
    namespaceID: string;
    name: string;
    terminate: boolean;
  };
  'component:stop-failed': {
    namespaceID: string;
    name: string;
    terminate: boolean;
    error: unknown;
  };
}

export type NamespaceEventName = keyof NamespaceEventMap;
