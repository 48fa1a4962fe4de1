import { cloneJson } from '../utils/json';
import type { JsonObject } from '../utils/json';
import type {
  ComponentClass,
  ComponentDescriptor,
  ComponentFactory,
  ComponentScope,
  ComponentSnapshot,
  ComponentState,
  ComponentType,
} from './component_registry.types';

const DEFAULT_VERSION = '1.0.0';

function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Registry record of one component: its declaration, lifecycle state and the
 * singleton slot. Owned by the registry; read it, do not mutate it.
 */
export class ComponentMetadata {
  readonly componentId: string;
  readonly componentType: ComponentType;
  readonly componentClass: ComponentClass;
  readonly name: string;
  readonly description: string | null;
  readonly version: string;
  readonly scope: ComponentScope;
  readonly dependencies: string[];
  readonly tags: string[];
  config: JsonObject;
  factory: ComponentFactory | null;
  parentId: string | null;
  readonly childrenIds: string[] = [];

  state: ComponentState = 'registered';
  /** Singleton instance; always null for scoped and transient components */
  instance: unknown = null;
  error: string | null = null;

  readonly createdAt: Date = new Date();
  initializedAt: Date | null = null;
  disposedAt: Date | null = null;
  lastActiveAt: Date | null = null;

  constructor(componentId: string, descriptor: ComponentDescriptor) {
    this.componentId = componentId;
    this.componentType = descriptor.type;
    this.componentClass = descriptor.componentClass;
    this.name = descriptor.name ?? descriptor.componentClass.name;
    this.description = descriptor.description ?? null;
    this.version = descriptor.version ?? DEFAULT_VERSION;
    this.scope = descriptor.scope ?? 'singleton';
    this.dependencies = [...new Set(descriptor.dependencies ?? [])];
    this.tags = [...new Set(descriptor.tags ?? [])];
    this.config = cloneJson(descriptor.config ?? {});
    this.factory = descriptor.factory ?? null;
    this.parentId = descriptor.parentId ?? null;
  }

  toJSON(): ComponentSnapshot {
    return {
      componentId: this.componentId,
      componentType: this.componentType,
      componentClass: this.componentClass.name,
      name: this.name,
      description: this.description,
      version: this.version,
      scope: this.scope,
      state: this.state,
      dependencies: [...this.dependencies],
      tags: [...this.tags],
      config: cloneJson(this.config),
      parentId: this.parentId,
      childrenIds: [...this.childrenIds],
      error: this.error,
      hasInstance: this.instance !== null,
      createdAt: isoOrNull(this.createdAt),
      initializedAt: isoOrNull(this.initializedAt),
      disposedAt: isoOrNull(this.disposedAt),
      lastActiveAt: isoOrNull(this.lastActiveAt),
    };
  }
}
