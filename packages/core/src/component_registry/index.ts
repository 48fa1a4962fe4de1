export { ComponentRegistry, DEFAULT_SCOPE_ID } from './component_registry';
export { ComponentMetadata } from './component_metadata';
export {
  ComponentRegistryError,
  ComponentNotFoundError,
  CircularDependencyError,
  InvalidLifecycleTransitionError,
} from './component_registry.errors';
export {
  COMPONENT_TYPES,
  COMPONENT_SCOPES,
  LIVE_STATES,
  isActivatable,
  isCleanable,
  isComponentScope,
  isComponentType,
  isDeactivatable,
  isDisposable,
  isInitializable,
} from './component_registry.types';
export type {
  Activatable,
  Cleanable,
  ComponentClass,
  ComponentContext,
  ComponentDescriptor,
  ComponentFactory,
  ComponentScope,
  ComponentSnapshot,
  ComponentState,
  ComponentTreeNode,
  ComponentType,
  Constructor,
  Deactivatable,
  Disposable,
  Initializable,
  LifecycleHook,
  LifecycleHookType,
} from './component_registry.types';
