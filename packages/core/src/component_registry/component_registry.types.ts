/**
 * ComponentRegistry Types
 */

import type { EventBus } from '../event_bus/event_bus';
import type { Logger } from '../logger';
import type { StateManager } from '../state_manager/state_manager';
import type { JsonObject } from '../utils/json';
import type { ComponentRegistry } from './component_registry';

export type ComponentType = 'view' | 'view_model' | 'service' | 'utility' | 'dialog' | 'custom';

export const COMPONENT_TYPES: readonly ComponentType[] = [
  'view',
  'view_model',
  'service',
  'utility',
  'dialog',
  'custom',
];

/**
 * singleton: one instance per registry. scoped: one instance per scope id.
 * transient: a new instance on every request, never cached.
 */
export type ComponentScope = 'singleton' | 'transient' | 'scoped';

export const COMPONENT_SCOPES: readonly ComponentScope[] = ['singleton', 'transient', 'scoped'];

export type ComponentState =
  | 'registered'
  | 'initializing'
  | 'initialized'
  | 'active'
  | 'inactive'
  | 'disposing'
  | 'disposed'
  | 'error';

/** States in which instances exist and can be handed out */
export const LIVE_STATES: readonly ComponentState[] = ['initialized', 'active', 'inactive'];

export type LifecycleHookType = 'afterInitialize' | 'beforeDispose' | 'afterActivate' | 'beforeDeactivate';

/**
 * Called with the instance the transition applies to, or null when the
 * component has no live instance (transient components).
 */
export type LifecycleHook = (instance: unknown) => void;

export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Everything a component receives at construction: its own identity and
 * configuration, its resolved dependencies and the framework's common services.
 */
export interface ComponentContext {
  readonly componentId: string;
  readonly scopeId: string;
  /** Copy of the component's configuration */
  readonly config: JsonObject;
  /** Declared dependencies that resolved, keyed by component id */
  readonly dependencies: Readonly<Record<string, unknown>>;
  /**
   * Resolved dependency narrowed to the given class.
   * Returns undefined when the dependency is absent or of another class.
   */
  get<T>(componentId: string, type: Constructor<T>): T | undefined;
  readonly eventBus: EventBus;
  readonly stateManager: StateManager;
  readonly registry: ComponentRegistry;
  /** Logger prefixed with the component id */
  readonly logger: Logger;
}

export type ComponentClass<T = unknown> = new (context: ComponentContext) => T;

export type ComponentFactory<T = unknown> = (context: ComponentContext) => T;

export type ComponentDescriptor<T = unknown> = {
  /** Defaults to `<ClassName>_<8 hex chars>` */
  id?: string;
  componentClass: ComponentClass<T>;
  type: ComponentType;
  /** Defaults to the class name */
  name?: string;
  description?: string;
  /** Defaults to "1.0.0" */
  version?: string;
  /** Defaults to singleton */
  scope?: ComponentScope;
  dependencies?: string[];
  tags?: string[];
  config?: JsonObject;
  /** Used instead of the class constructor when present */
  factory?: ComponentFactory<T>;
  parentId?: string;
};

/**
 * Plain serialisable view of a component's metadata
 */
export type ComponentSnapshot = {
  componentId: string;
  componentType: ComponentType;
  componentClass: string;
  name: string;
  description: string | null;
  version: string;
  scope: ComponentScope;
  state: ComponentState;
  dependencies: string[];
  tags: string[];
  config: JsonObject;
  parentId: string | null;
  childrenIds: string[];
  error: string | null;
  hasInstance: boolean;
  createdAt: string | null;
  initializedAt: string | null;
  disposedAt: string | null;
  lastActiveAt: string | null;
};

export type ComponentTreeNode = ComponentSnapshot & {
  children: Record<string, ComponentTreeNode>;
};

// Optional capabilities of a component instance

export interface Initializable {
  initialize(): void;
}

export interface Disposable {
  dispose(): void;
}

export interface Cleanable {
  cleanup(): void;
}

export interface Activatable {
  activate(): void;
}

export interface Deactivatable {
  deactivate(): void;
}

export function isInitializable(value: unknown): value is Initializable {
  return typeof value === 'object' && value !== null && 'initialize' in value && typeof value.initialize === 'function';
}

export function isDisposable(value: unknown): value is Disposable {
  return typeof value === 'object' && value !== null && 'dispose' in value && typeof value.dispose === 'function';
}

export function isCleanable(value: unknown): value is Cleanable {
  return typeof value === 'object' && value !== null && 'cleanup' in value && typeof value.cleanup === 'function';
}

export function isActivatable(value: unknown): value is Activatable {
  return typeof value === 'object' && value !== null && 'activate' in value && typeof value.activate === 'function';
}

export function isDeactivatable(value: unknown): value is Deactivatable {
  return (
    typeof value === 'object' && value !== null && 'deactivate' in value && typeof value.deactivate === 'function'
  );
}

export function isComponentType(value: unknown): value is ComponentType {
  return typeof value === 'string' && COMPONENT_TYPES.some((type) => type === value);
}

export function isComponentScope(value: unknown): value is ComponentScope {
  return typeof value === 'string' && COMPONENT_SCOPES.some((scope) => scope === value);
}
