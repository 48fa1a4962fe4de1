/**
 * ComponentDiscovery Interface
 *
 * Finds component classes outside the application's own wiring and registers
 * them. A class takes part by carrying a static `component` annotation:
 *
 * ```typescript
 * export class OutlinePanel {
 *   static readonly component: ComponentAnnotation = { type: 'view', id: 'outline', tags: ['navigation'] };
 *   constructor(context: ComponentContext) {}
 * }
 * ```
 *
 * @module component_discovery
 */

import type { ComponentRegistry } from '../component_registry/component_registry';
import type { ComponentClass, ComponentScope, ComponentType } from '../component_registry/component_registry.types';
import { createLogger } from '../logger';
import { SchemaValidationCache, Schemas, describeSchemaErrors } from '../schemas/schema_cache';
import type { JsonObject } from '../utils/json';

const logger = createLogger('[ComponentDiscovery] ');

/**
 * Registration data a class declares about itself
 */
export type ComponentAnnotation = {
  type: ComponentType;
  id?: string;
  name?: string;
  description?: string;
  version?: string;
  scope?: ComponentScope;
  dependencies?: string[];
  tags?: string[];
  config?: JsonObject;
  parentId?: string;
};

export type DiscoveredComponent = {
  componentClass: ComponentClass;
  annotation: ComponentAnnotation;
  modulePath: string;
  exportName: string;
};

export interface ComponentDiscovery {
  /** Adds a root to scan; already known roots are ignored */
  addDiscoveryPath(rootPath: string): void;
  removeDiscoveryPath(rootPath: string): boolean;
  getDiscoveryPaths(): string[];
  /**
   * Scans `rootPath`, or every known root, and registers the annotated
   * classes found. Resolves to the registered component ids.
   */
  discover(rootPath?: string): Promise<string[]>;
}

function isComponentClass(value: unknown): value is ComponentClass {
  return typeof value === 'function' && typeof value.prototype === 'object';
}

/**
 * Collects the annotated classes a loaded module exports.
 * Classes with an invalid annotation are logged and skipped.
 */
export function collectAnnotatedClasses(moduleExports: unknown, modulePath: string): DiscoveredComponent[] {
  if (typeof moduleExports !== 'object' || moduleExports === null) {
    return [];
  }

  const validate = SchemaValidationCache.getValidator<ComponentAnnotation>(Schemas.ComponentAnnotation);
  const seen = new Set<ComponentClass>();
  const discovered: DiscoveredComponent[] = [];

  for (const [exportName, value] of Object.entries(moduleExports)) {
    if (!isComponentClass(value) || !('component' in value) || seen.has(value)) {
      continue;
    }
    seen.add(value);

    const annotation = value.component;
    if (!validate(annotation)) {
      logger.warn(
        `Ignoring ${exportName} in ${modulePath}: invalid component annotation (${describeSchemaErrors(validate.errors).join('; ')})`
      );
      continue;
    }

    discovered.push({ componentClass: value, annotation, modulePath, exportName });
  }

  return discovered;
}

/**
 * Registers discovered classes, parents before the children that name them.
 */
export function registerDiscovered(registry: ComponentRegistry, discovered: DiscoveredComponent[]): string[] {
  const pending = [...discovered];
  const ids: string[] = [];

  const isReady = ({ annotation }: DiscoveredComponent): boolean =>
    annotation.parentId === undefined ||
    registry.getComponent(annotation.parentId) !== null ||
    !pending.some((other) => other.annotation.id === annotation.parentId);

  while (pending.length > 0) {
    const index = pending.findIndex(isReady);
    const [next] = pending.splice(Math.max(index, 0), 1);
    if (!next) {
      break;
    }

    ids.push(registry.register({ ...next.annotation, componentClass: next.componentClass }));
    logger.debug(`Registered ${next.exportName} from ${next.modulePath}`);
  }

  return ids;
}
