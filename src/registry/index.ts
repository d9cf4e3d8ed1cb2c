/**
 * Component Registry Module
 *
 * @module registry
 */

export {
  InMemoryComponentRegistry,
  createComponentRegistry,
  defineCapability,
  orderByPriority,
} from './componentRegistry';

export { DEFAULT_PRIORITY } from './types';
export type {
  Capability,
  ComponentMetadata,
  ComponentRegistry,
  RegisteredComponent,
} from './types';
