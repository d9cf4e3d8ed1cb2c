/**
 * In-Memory Component Registry
 *
 * Holds capability implementations registered by the application at startup.
 * Priorities missing from metadata are normalized to DEFAULT_PRIORITY here,
 * so consumers always see an explicit number.
 *
 * @module registry/componentRegistry
 */

import { createLogger } from '../utils/logger';
import {
  DEFAULT_PRIORITY,
  type Capability,
  type ComponentMetadata,
  type ComponentRegistry,
  type RegisteredComponent,
} from './types';

const log = createLogger('REGISTRY');

/**
 * Create a capability marker
 *
 * @example
 * const AUDIT_SINK = defineCapability<AuditSink>('AuditSink');
 */
export function defineCapability<T>(name: string): Capability<T> {
  return { id: Symbol(name), name };
}

/**
 * Order components by priority, highest first
 *
 * Array.prototype.sort is stable, so components sharing a priority keep
 * their registration order (first registered wins).
 */
export function orderByPriority<T>(components: RegisteredComponent<T>[]): RegisteredComponent<T>[] {
  return [...components].sort((a, b) => b.priority - a.priority);
}

export class InMemoryComponentRegistry implements ComponentRegistry {
  private readonly buckets = new Map<symbol, RegisteredComponent<unknown>[]>();

  /**
   * Register an implementation of a capability
   */
  register<T>(capability: Capability<T>, instance: T, metadata: ComponentMetadata = {}): this {
    const priority = metadata.priority ?? DEFAULT_PRIORITY;
    if (!Number.isInteger(priority)) {
      throw new TypeError(`Priority for ${capability.name} must be an integer, got ${priority}`);
    }

    const bucket = this.buckets.get(capability.id) ?? [];
    bucket.push({ instance, priority });
    this.buckets.set(capability.id, bucket);

    log.debug('Component registered', { capability: capability.name, priority });
    return this;
  }

  /**
   * Remove an implementation; returns false if it was not registered
   */
  unregister<T>(capability: Capability<T>, instance: T): boolean {
    const bucket = this.buckets.get(capability.id);
    if (!bucket) return false;

    const index = bucket.findIndex((entry) => entry.instance === instance);
    if (index === -1) return false;

    bucket.splice(index, 1);
    log.debug('Component unregistered', { capability: capability.name });
    return true;
  }

  listImplementations<T>(capability: Capability<T>): RegisteredComponent<T>[] {
    const bucket = this.buckets.get(capability.id) ?? [];
    // Buckets are keyed by the capability's symbol, so every instance was registered as T
    return bucket.map((entry) => ({ instance: entry.instance as T, priority: entry.priority }));
  }
}

/**
 * Create an empty registry
 */
export function createComponentRegistry(): InMemoryComponentRegistry {
  return new InMemoryComponentRegistry();
}
