import type { ComponentState } from './component_registry.types';

/**
 * Base error class for all registry errors
 */
export class ComponentRegistryError extends Error {
  constructor(message: string, public readonly componentId: string) {
    super(message);
    this.name = 'ComponentRegistryError';
    Object.setPrototypeOf(this, ComponentRegistryError.prototype);
  }
}

/**
 * Error thrown when an operation names a component that is not registered
 */
export class ComponentNotFoundError extends ComponentRegistryError {
  constructor(componentId: string) {
    super(`Component not found: ${componentId}`, componentId);
    this.name = 'ComponentNotFoundError';
    Object.setPrototypeOf(this, ComponentNotFoundError.prototype);
  }
}

/**
 * Error thrown when dependency resolution reaches a component already being resolved.
 * `cycle` starts and ends with the same id.
 */
export class CircularDependencyError extends ComponentRegistryError {
  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, cycle[0] ?? '');
    this.name = 'CircularDependencyError';
    Object.setPrototypeOf(this, CircularDependencyError.prototype);
  }
}

/**
 * Error thrown when a lifecycle operation is not allowed from the current state
 */
export class InvalidLifecycleTransitionError extends ComponentRegistryError {
  constructor(
    componentId: string,
    public readonly from: ComponentState,
    public readonly operation: string
  ) {
    super(`Cannot ${operation} component ${componentId} in state ${from}`, componentId);
    this.name = 'InvalidLifecycleTransitionError';
    Object.setPrototypeOf(this, InvalidLifecycleTransitionError.prototype);
  }
}
