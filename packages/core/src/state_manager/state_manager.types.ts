import type { StateSnapshotStore } from '../state_store/state_store';
import type { JsonValue } from '../utils/json';

/**
 * One recorded mutation, used for undo/redo.
 * Values are deep copies taken when the change was recorded.
 */
export type StateChange = {
  /** Flat key, or dot-joined path of a nested change */
  readonly key: string;
  /** Key sequence; length 1 for flat keys */
  readonly path: readonly string[];
  /** Previous value; null when the key was absent */
  readonly oldValue: JsonValue;
  /** New value; null when the key was cleared */
  readonly newValue: JsonValue;
  /** Epoch ms */
  readonly timestamp: number;
};

export type StateChangedListener = (key: string, value: JsonValue) => void;

export type NestedStateChangedListener = (path: readonly string[], value: JsonValue) => void;

export type StateManagerOptions = {
  /** Capacity of the undo and redo stacks (default: 100) */
  maxHistorySize?: number;
  /** Persistence backend; without one, persistent keys are only kept in memory */
  snapshotStore?: StateSnapshotStore;
  persistentKeys?: Iterable<string>;
  historyExcludedKeys?: Iterable<string>;
};
