/**
 * Component Registry Types
 *
 * The registry answers one question: which instances implement a given
 * capability, and with what priority. How instances are constructed is
 * left to whoever registers them.
 *
 * @module registry/types
 */

/**
 * Priority applied when registration metadata omits one
 */
export const DEFAULT_PRIORITY = 1000;

/**
 * Typed capability marker
 *
 * The type parameter only exists at compile time; it ties the marker to the
 * interface its implementations satisfy.
 */
export interface Capability<T> {
  readonly id: symbol;
  readonly name: string;
  /** Phantom field carrying the implementation type */
  readonly __type?: T;
}

/**
 * Metadata attached to a component at registration time
 */
export interface ComponentMetadata {
  /**
   * Higher = consulted first
   * @default 1000
   */
  priority?: number;
}

/**
 * An implementation paired with its normalized priority
 */
export interface RegisteredComponent<T> {
  instance: T;
  priority: number;
}

/**
 * Capability query interface consumed by the MVC core
 */
export interface ComponentRegistry {
  /**
   * All implementations of a capability, in registration order
   */
  listImplementations<T>(capability: Capability<T>): RegisteredComponent<T>[];
}
