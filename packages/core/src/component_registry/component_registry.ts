/**
 * ComponentRegistry - Lifecycle and dependency management for components
 *
 * Components are registered with a descriptor, constructed on demand from a
 * ComponentContext carrying their resolved dependencies and the common
 * services, and moved through the lifecycle state machine:
 *
 *   registered → initializing → initialized ⇄ active ⇄ inactive → disposing → disposed
 *
 * with `error` reachable from every transition that runs component code.
 * Every transition emits `component.state.changed`; every failure emits
 * `component.error` and `error.occurred`. Failures never propagate to the
 * caller, who gets `null` or `false` instead.
 */

import { createEvent } from '../event_bus/event_factory';
import type { EventBus } from '../event_bus/event_bus';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { StateManager } from '../state_manager/state_manager';
import { generateComponentId } from '../utils/id_generator';
import { cloneJson } from '../utils/json';
import type { JsonObject } from '../utils/json';
import { ComponentMetadata } from './component_metadata';
import {
  CircularDependencyError,
  ComponentNotFoundError,
  InvalidLifecycleTransitionError,
} from './component_registry.errors';
import {
  LIVE_STATES,
  isActivatable,
  isCleanable,
  isDeactivatable,
  isDisposable,
  isInitializable,
} from './component_registry.types';
import type {
  ComponentClass,
  ComponentContext,
  ComponentDescriptor,
  ComponentFactory,
  ComponentState,
  ComponentTreeNode,
  ComponentType,
  Constructor,
  LifecycleHook,
  LifecycleHookType,
} from './component_registry.types';

export const DEFAULT_SCOPE_ID = 'default';

const EVENT_SOURCE = 'ComponentRegistry';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

function addToIndex<K>(index: Map<K, Set<string>>, key: K, componentId: string): void {
  const ids = index.get(key) ?? new Set<string>();
  ids.add(componentId);
  index.set(key, ids);
}

function removeFromIndex<K>(index: Map<K, Set<string>>, key: K, componentId: string): void {
  const ids = index.get(key);
  if (!ids) {
    return;
  }
  ids.delete(componentId);
  if (ids.size === 0) {
    index.delete(key);
  }
}

function isLive(state: ComponentState): boolean {
  return LIVE_STATES.includes(state);
}

/**
 * @example
 * ```typescript
 * const registry = new ComponentRegistry(eventBus, stateManager);
 *
 * const storeId = registry.register({ id: 'documentStore', componentClass: DocumentStore, type: 'service' });
 * registry.register({
 *   id: 'editor',
 *   componentClass: EditorView,
 *   type: 'view',
 *   dependencies: [storeId],
 * });
 *
 * const editor = registry.createInstance('editor'); // DocumentStore is created first
 * registry.activate('editor');
 * ```
 */
export class ComponentRegistry {
  private readonly logger: Logger;

  private readonly components = new Map<string, ComponentMetadata>();
  /** scopeId → componentId → instance */
  private readonly scopes = new Map<string, Map<string, unknown>>();
  private readonly typeIndex = new Map<ComponentType, Set<string>>();
  private readonly tagIndex = new Map<string, Set<string>>();
  /** componentId → ids it depends on */
  private readonly dependencyGraph = new Map<string, Set<string>>();
  private readonly hooks = new Map<string, Map<LifecycleHookType, LifecycleHook[]>>();
  /** Ids under construction, outermost first */
  private readonly resolving: string[] = [];

  constructor(
    private readonly eventBus: EventBus,
    private readonly stateManager: StateManager
  ) {
    this.logger = createLogger('[ComponentRegistry] ');
  }

  // ==================== Registration ====================

  /**
   * Registers a component and returns its id.
   * A duplicate id keeps the existing registration.
   */
  register<T>(descriptor: ComponentDescriptor<T>): string {
    const componentId = descriptor.id || generateComponentId(descriptor.componentClass.name);

    if (this.components.has(componentId)) {
      this.logger.warn(`Component ${componentId} is already registered`);
      return componentId;
    }

    const metadata = new ComponentMetadata(componentId, descriptor);

    if (metadata.parentId !== null) {
      const parent = this.components.get(metadata.parentId);
      if (parent) {
        parent.childrenIds.push(componentId);
      } else {
        this.logger.warn(`Parent ${metadata.parentId} of ${componentId} not found, registering without parent`);
        metadata.parentId = null;
      }
    }

    this.components.set(componentId, metadata);
    addToIndex(this.typeIndex, metadata.componentType, componentId);
    for (const tag of metadata.tags) {
      addToIndex(this.tagIndex, tag, componentId);
    }
    this.dependencyGraph.set(componentId, new Set(metadata.dependencies));

    this.logger.debug(`Registered ${metadata.componentType} component ${componentId}`);
    this.eventBus.emit(
      createEvent(
        'component.registered',
        { componentId, componentType: metadata.componentType, componentName: metadata.name },
        { source: EVENT_SOURCE }
      )
    );

    return componentId;
  }

  /**
   * Removes a component. Refused (false) while it has children or dependents.
   */
  unregister(componentId: string): boolean {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return false;
    }

    if (metadata.childrenIds.length > 0) {
      this.logger.warn(`Cannot unregister ${componentId}: it has children (${metadata.childrenIds.join(', ')})`);
      return false;
    }

    const dependents = this.getComponentDependents(componentId);
    if (dependents.length > 0) {
      this.logger.warn(`Cannot unregister ${componentId}: required by ${dependents.join(', ')}`);
      return false;
    }

    if (isLive(metadata.state)) {
      this.dispose(componentId);
    }

    if (metadata.parentId !== null) {
      const siblings = this.components.get(metadata.parentId)?.childrenIds;
      const index = siblings ? siblings.indexOf(componentId) : -1;
      if (siblings && index !== -1) {
        siblings.splice(index, 1);
      }
    }

    removeFromIndex(this.typeIndex, metadata.componentType, componentId);
    for (const tag of metadata.tags) {
      removeFromIndex(this.tagIndex, tag, componentId);
    }
    this.dependencyGraph.delete(componentId);
    this.hooks.delete(componentId);
    this.releaseInstances(metadata);
    this.components.delete(componentId);

    this.logger.debug(`Unregistered component ${componentId}`);
    this.eventBus.emit(
      createEvent(
        'component.unregistered',
        { componentId, componentType: metadata.componentType, componentName: metadata.name },
        { source: EVENT_SOURCE }
      )
    );

    return true;
  }

  // ==================== Instances ====================

  /**
   * Returns an existing instance: the singleton, the instance of `scopeId`,
   * or a fresh instance for transient components. Null when the component is
   * unknown or has no live instances.
   */
  getInstance(componentId: string, scopeId: string = DEFAULT_SCOPE_ID): unknown {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return null;
    }

    if (!isLive(metadata.state)) {
      this.logger.warn(`Component ${componentId} is not initialized`);
      return null;
    }

    if (metadata.scope === 'transient') {
      return this.createInstance(componentId, scopeId);
    }
    return this.cachedInstance(metadata, scopeId);
  }

  /**
   * Creates (or returns the cached) instance, resolving declared dependencies first.
   * Returns null when construction, initialization or dependency resolution fails.
   * Called from inside a factory, a circular request throws CircularDependencyError
   * so every component on the cycle fails.
   */
  createInstance(componentId: string, scopeId: string = DEFAULT_SCOPE_ID): unknown {
    try {
      return this.instantiate(componentId, scopeId);
    } catch (error) {
      // A cycle entered from inside a factory unwinds every component on it
      if (error instanceof CircularDependencyError && this.resolving.length > 0) {
        throw error;
      }
      if (error instanceof ComponentNotFoundError) {
        this.logger.warn(error.message);
      }
      return null;
    }
  }

  /**
   * Typed variant of getInstance; null when the instance is not of `type`.
   */
  resolve<T>(componentId: string, type: Constructor<T>, scopeId: string = DEFAULT_SCOPE_ID): T | null {
    const instance = this.getInstance(componentId, scopeId) ?? this.createInstance(componentId, scopeId);
    return instance instanceof type ? instance : null;
  }

  // ==================== Lifecycle ====================

  dispose(componentId: string): boolean {
    return this.runLifecycle(componentId, 'dispose', ['initialized', 'active', 'inactive'], (metadata) => {
      this.transition(metadata, 'disposing');

      const instances = this.instancesOrNull(metadata);
      this.releaseInstances(metadata);
      for (const instance of instances) {
        this.runHooks(metadata, 'beforeDispose', instance);
        if (isDisposable(instance)) {
          instance.dispose();
        } else if (isCleanable(instance)) {
          instance.cleanup();
        }
      }

      metadata.disposedAt = new Date();
      this.transition(metadata, 'disposed');
    });
  }

  activate(componentId: string): boolean {
    return this.runLifecycle(componentId, 'activate', ['initialized', 'inactive'], (metadata) => {
      for (const instance of this.instancesOrNull(metadata)) {
        if (isActivatable(instance)) {
          instance.activate();
        }
        this.runHooks(metadata, 'afterActivate', instance);
      }

      metadata.lastActiveAt = new Date();
      this.transition(metadata, 'active');
    });
  }

  deactivate(componentId: string): boolean {
    return this.runLifecycle(componentId, 'deactivate', ['active'], (metadata) => {
      for (const instance of this.instancesOrNull(metadata)) {
        this.runHooks(metadata, 'beforeDeactivate', instance);
        if (isDeactivatable(instance)) {
          instance.deactivate();
        }
      }

      this.transition(metadata, 'inactive');
    });
  }

  /**
   * Hooks run in registration order. A throwing hook is reported and skipped.
   */
  addLifecycleHook(componentId: string, hookType: LifecycleHookType, hook: LifecycleHook): boolean {
    if (!this.components.has(componentId)) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return false;
    }

    const byType = this.hooks.get(componentId) ?? new Map<LifecycleHookType, LifecycleHook[]>();
    byType.set(hookType, [...(byType.get(hookType) ?? []), hook]);
    this.hooks.set(componentId, byType);
    return true;
  }

  removeLifecycleHook(componentId: string, hookType: LifecycleHookType, hook: LifecycleHook): boolean {
    const byType = this.hooks.get(componentId);
    const registered = byType?.get(hookType);
    const index = registered ? registered.indexOf(hook) : -1;
    if (!byType || !registered || index === -1) {
      return false;
    }

    registered.splice(index, 1);
    if (registered.length === 0) {
      byType.delete(hookType);
    }
    if (byType.size === 0) {
      this.hooks.delete(componentId);
    }
    return true;
  }

  // ==================== Configuration & Factories ====================

  setComponentConfig(componentId: string, config: JsonObject): boolean {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return false;
    }
    metadata.config = cloneJson(config);
    return true;
  }

  getComponentConfig(componentId: string): JsonObject | null {
    const metadata = this.components.get(componentId);
    return metadata ? cloneJson(metadata.config) : null;
  }

  setComponentFactory(componentId: string, factory: ComponentFactory): boolean {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return false;
    }
    metadata.factory = factory;
    return true;
  }

  getComponentFactory(componentId: string): ComponentFactory | null {
    return this.components.get(componentId)?.factory ?? null;
  }

  // ==================== Queries ====================

  getComponent(componentId: string): ComponentMetadata | null {
    return this.components.get(componentId) ?? null;
  }

  getAllComponents(): Map<string, ComponentMetadata> {
    return new Map(this.components);
  }

  getComponentsByType(componentType: ComponentType): ComponentMetadata[] {
    return this.lookup(this.typeIndex.get(componentType));
  }

  getComponentsByTag(tag: string): ComponentMetadata[] {
    return this.lookup(this.tagIndex.get(tag));
  }

  getComponentsByClass(componentClass: ComponentClass): ComponentMetadata[] {
    return [...this.components.values()].filter((metadata) => metadata.componentClass === componentClass);
  }

  getAllTags(): string[] {
    return [...this.tagIndex.keys()];
  }

  getComponentState(componentId: string): ComponentState | null {
    return this.components.get(componentId)?.state ?? null;
  }

  getComponentError(componentId: string): string | null {
    return this.components.get(componentId)?.error ?? null;
  }

  getComponentDependencies(componentId: string): string[] | null {
    const dependencies = this.dependencyGraph.get(componentId);
    return dependencies ? [...dependencies] : null;
  }

  /**
   * Ids of the components that declare a dependency on `componentId`
   */
  getComponentDependents(componentId: string): string[] {
    const dependents: string[] = [];
    for (const [dependentId, dependencies] of this.dependencyGraph) {
      if (dependencies.has(componentId)) {
        dependents.push(dependentId);
      }
    }
    return dependents;
  }

  getComponentChildren(componentId: string): string[] | null {
    const metadata = this.components.get(componentId);
    return metadata ? [...metadata.childrenIds] : null;
  }

  getComponentParent(componentId: string): string | null {
    return this.components.get(componentId)?.parentId ?? null;
  }

  /**
   * Ancestor chain from the root down to `componentId` (inclusive)
   */
  getComponentHierarchy(componentId: string): string[] {
    const hierarchy = [componentId];
    let parentId = this.getComponentParent(componentId);
    while (parentId !== null && !hierarchy.includes(parentId)) {
      hierarchy.unshift(parentId);
      parentId = this.getComponentParent(parentId);
    }
    return hierarchy;
  }

  /**
   * Nested view of the parent/child hierarchy. Without a root, returns every
   * root component keyed by id; with an unknown root, an empty object.
   */
  getComponentTree(): Record<string, ComponentTreeNode>;
  getComponentTree(rootId: string): ComponentTreeNode | Record<string, never>;
  getComponentTree(rootId?: string): Record<string, ComponentTreeNode> | ComponentTreeNode | Record<string, never> {
    if (rootId === undefined) {
      const forest: Record<string, ComponentTreeNode> = {};
      for (const metadata of this.components.values()) {
        if (metadata.parentId === null) {
          forest[metadata.componentId] = this.buildTree(metadata);
        }
      }
      return forest;
    }

    const root = this.components.get(rootId);
    return root ? this.buildTree(root) : {};
  }

  /**
   * Disposes every live component and forgets every registration.
   */
  clear(): void {
    for (const metadata of [...this.components.values()]) {
      if (isLive(metadata.state)) {
        this.dispose(metadata.componentId);
      }
    }

    this.components.clear();
    this.scopes.clear();
    this.typeIndex.clear();
    this.tagIndex.clear();
    this.dependencyGraph.clear();
    this.hooks.clear();
    this.logger.debug('Registry cleared');
  }

  // ==================== Private Methods ====================

  private instantiate(componentId: string, scopeId: string): unknown {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      throw new ComponentNotFoundError(componentId);
    }

    const cached = this.cachedInstance(metadata, scopeId);
    if (cached !== null) {
      return cached;
    }

    const cycleStart = this.resolving.indexOf(componentId);
    if (cycleStart !== -1) {
      throw new CircularDependencyError([...this.resolving.slice(cycleStart), componentId]);
    }

    this.resolving.push(componentId);
    this.transition(metadata, 'initializing');
    try {
      const context = this.createContext(metadata, scopeId);
      const instance = metadata.factory ? metadata.factory(context) : new metadata.componentClass(context);

      if (isInitializable(instance)) {
        instance.initialize();
      }
      this.runHooks(metadata, 'afterInitialize', instance);
      this.storeInstance(metadata, scopeId, instance);

      metadata.error = null;
      metadata.initializedAt = new Date();
      this.transition(metadata, 'initialized');
      return instance;
    } catch (error) {
      this.markError(metadata, 'createInstance', error);
      throw error;
    } finally {
      this.resolving.pop();
    }
  }

  private createContext(metadata: ComponentMetadata, scopeId: string): ComponentContext {
    const dependencies = Object.freeze(this.resolveDependencies(metadata, scopeId));

    return {
      componentId: metadata.componentId,
      scopeId,
      config: cloneJson(metadata.config),
      dependencies,
      get: <T>(dependencyId: string, type: Constructor<T>): T | undefined => {
        const dependency = dependencies[dependencyId];
        return dependency instanceof type ? dependency : undefined;
      },
      eventBus: this.eventBus,
      stateManager: this.stateManager,
      registry: this,
      logger: createLogger(`[${metadata.componentId}] `),
    };
  }

  /**
   * Missing or failing dependencies are left out; cycles abort the whole resolution.
   */
  private resolveDependencies(metadata: ComponentMetadata, scopeId: string): Record<string, unknown> {
    const resolved: Record<string, unknown> = {};

    for (const dependencyId of metadata.dependencies) {
      if (!this.components.has(dependencyId)) {
        this.logger.warn(`Dependency ${dependencyId} of ${metadata.componentId} is not registered`);
        continue;
      }

      try {
        resolved[dependencyId] = this.instantiate(dependencyId, scopeId);
      } catch (error) {
        if (error instanceof CircularDependencyError) {
          throw error;
        }
        this.logger.warn(
          `Dependency ${dependencyId} of ${metadata.componentId} could not be created: ${errorMessage(error)}`
        );
      }
    }

    return resolved;
  }

  private cachedInstance(metadata: ComponentMetadata, scopeId: string): unknown {
    switch (metadata.scope) {
      case 'singleton':
        return metadata.instance ?? null;
      case 'scoped':
        return this.scopes.get(scopeId)?.get(metadata.componentId) ?? null;
      case 'transient':
        return null;
    }
  }

  private storeInstance(metadata: ComponentMetadata, scopeId: string, instance: unknown): void {
    if (metadata.scope === 'singleton') {
      metadata.instance = instance;
    } else if (metadata.scope === 'scoped') {
      const bucket = this.scopes.get(scopeId) ?? new Map<string, unknown>();
      bucket.set(metadata.componentId, instance);
      this.scopes.set(scopeId, bucket);
    }
  }

  private releaseInstances(metadata: ComponentMetadata): void {
    metadata.instance = null;
    for (const bucket of this.scopes.values()) {
      bucket.delete(metadata.componentId);
    }
  }

  /**
   * Live instances (singleton slot or every scope bucket), or a single null
   * when there are none so that hooks still run once.
   */
  private instancesOrNull(metadata: ComponentMetadata): unknown[] {
    const instances: unknown[] = [];
    if (metadata.instance !== null) {
      instances.push(metadata.instance);
    }
    for (const bucket of this.scopes.values()) {
      if (bucket.has(metadata.componentId)) {
        instances.push(bucket.get(metadata.componentId));
      }
    }
    return instances.length > 0 ? instances : [null];
  }

  private runLifecycle(
    componentId: string,
    operation: string,
    allowedFrom: readonly ComponentState[],
    apply: (metadata: ComponentMetadata) => void
  ): boolean {
    const metadata = this.components.get(componentId);
    if (!metadata) {
      this.logger.warn(new ComponentNotFoundError(componentId).message);
      return false;
    }

    if (!allowedFrom.includes(metadata.state)) {
      this.logger.warn(new InvalidLifecycleTransitionError(componentId, metadata.state, operation).message);
      return false;
    }

    try {
      apply(metadata);
      return true;
    } catch (error) {
      this.markError(metadata, operation, error);
      return false;
    }
  }

  private runHooks(metadata: ComponentMetadata, hookType: LifecycleHookType, instance: unknown): void {
    const hooks = this.hooks.get(metadata.componentId)?.get(hookType) ?? [];
    for (const hook of [...hooks]) {
      try {
        hook(instance);
      } catch (error) {
        this.logger.error(`Error in ${hookType} hook for ${metadata.componentId}:`, error);
        this.reportError(metadata.componentId, hookType, error);
      }
    }
  }

  private transition(metadata: ComponentMetadata, state: ComponentState): void {
    const previousState = metadata.state;
    metadata.state = state;
    this.eventBus.emit(
      createEvent(
        'component.state.changed',
        { componentId: metadata.componentId, previousState, state },
        { source: EVENT_SOURCE }
      )
    );
  }

  private markError(metadata: ComponentMetadata, operation: string, error: unknown): void {
    metadata.error = errorMessage(error);
    this.transition(metadata, 'error');
    this.logger.error(`Failed to ${operation} ${metadata.componentId}: ${metadata.error}`);
    this.reportError(metadata.componentId, operation, error);
  }

  private reportError(componentId: string, operation: string, error: unknown): void {
    this.eventBus.emit(
      createEvent(
        'component.error',
        { componentId, operation, errorMessage: errorMessage(error) },
        { source: EVENT_SOURCE }
      )
    );
    this.eventBus.emitErrorOccurred(errorName(error), errorMessage(error), `${operation} ${componentId}`);
  }

  private lookup(ids: Set<string> | undefined): ComponentMetadata[] {
    const found: ComponentMetadata[] = [];
    for (const id of ids ?? []) {
      const metadata = this.components.get(id);
      if (metadata) {
        found.push(metadata);
      }
    }
    return found;
  }

  private buildTree(metadata: ComponentMetadata): ComponentTreeNode {
    const children: Record<string, ComponentTreeNode> = {};
    for (const childId of metadata.childrenIds) {
      const child = this.components.get(childId);
      if (child) {
        children[childId] = this.buildTree(child);
      }
    }
    return { ...metadata.toJSON(), children };
  }
}
