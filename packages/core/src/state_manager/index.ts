export { StateManager } from './state_manager';
export type {
  StateChange,
  StateChangedListener,
  NestedStateChangedListener,
  StateManagerOptions,
} from './state_manager.types';
