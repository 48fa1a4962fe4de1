/**
 * StateManager - Hierarchical UI state with undo/redo and selective persistence
 *
 * Flat keys and nested paths share one tree. Every change notifies local
 * listeners and emits `ui.state.changed` on the EventBus; changes to keys
 * marked persistent rewrite the whole persistent snapshot.
 */

import type { EventBus } from '../event_bus/event_bus';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { FsStateSnapshotStore } from '../state_store/fs/fs_state_store';
import type { StateSnapshotStore } from '../state_store/state_store';
import { cloneJson, isJsonObject, jsonEquals } from '../utils/json';
import type { JsonObject, JsonValue } from '../utils/json';
import type {
  NestedStateChangedListener,
  StateChange,
  StateChangedListener,
  StateManagerOptions,
} from './state_manager.types';

const DEFAULT_MAX_HISTORY_SIZE = 100;

function hasOwn(object: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * ```typescript
 * const state = new StateManager(eventBus);
 * state.markAsPersistent('theme');
 * state.setPersistencePath('/path/to/project/.atelier/state.json');
 *
 * state.set('theme', 'dark');
 * state.setNested(['layout', 'sidebar', 'width'], 240);
 * state.undo(); // layout.sidebar.width removed, empty parents cleaned up
 * ```
 */
export class StateManager {
  private readonly logger: Logger;
  private readonly eventBus: EventBus;
  private readonly maxHistorySize: number;

  private state = new Map<string, JsonValue>();

  private history: StateChange[] = [];
  private redoStack: StateChange[] = [];
  private historyEnabled = true;
  private readonly historyExcludedKeys: Set<string>;

  private readonly persistentKeys: Set<string>;
  private snapshotStore: StateSnapshotStore | null;
  private loading = false;

  private readonly stateListeners = new Set<StateChangedListener>();
  private readonly nestedListeners = new Set<NestedStateChangedListener>();

  constructor(eventBus: EventBus, options: StateManagerOptions = {}) {
    this.logger = createLogger('[StateManager] ');
    this.eventBus = eventBus;
    this.maxHistorySize = Math.max(0, options.maxHistorySize ?? DEFAULT_MAX_HISTORY_SIZE);
    this.snapshotStore = options.snapshotStore ?? null;
    this.persistentKeys = new Set(options.persistentKeys ?? []);
    this.historyExcludedKeys = new Set(options.historyExcludedKeys ?? []);
  }

  // ==================== Flat state ====================

  /**
   * Returns a copy of the value stored under `key`, or `defaultValue` when absent.
   */
  get(key: string): JsonValue | undefined;
  get(key: string, defaultValue: JsonValue): JsonValue;
  get(key: string, defaultValue?: JsonValue): JsonValue | undefined {
    const value = this.state.get(key);
    return value === undefined ? defaultValue : cloneJson(value);
  }

  has(key: string): boolean {
    return this.state.has(key);
  }

  keys(): string[] {
    return Array.from(this.state.keys());
  }

  /**
   * Deep copy of the whole state tree.
   */
  snapshot(): JsonObject {
    const result: JsonObject = {};
    for (const [key, value] of this.state) {
      result[key] = cloneJson(value);
    }
    return result;
  }

  /**
   * Stores a value. No-op when the key already holds an equal value.
   */
  set(key: string, value: JsonValue, trackHistory: boolean = true): void {
    const current = this.state.get(key);
    if (current !== undefined && jsonEquals(current, value)) {
      return;
    }

    if (trackHistory && this.isTracked(key)) {
      this.record([key], current ?? null, value);
    }

    this.state.set(key, cloneJson(value));
    this.notifyFlat(key, value);

    if (this.persistentKeys.has(key)) {
      this.persist();
    }
    this.logger.debug(`State changed: ${key}`);
  }

  /**
   * Removes a key. No-op when the key is absent.
   */
  clear(key: string, trackHistory: boolean = true): void {
    const current = this.state.get(key);
    if (current === undefined) {
      return;
    }

    if (trackHistory && this.isTracked(key)) {
      this.record([key], current, null);
    }

    this.state.delete(key);
    this.notifyFlat(key, null);

    if (this.persistentKeys.has(key)) {
      this.persist();
    }
    this.logger.debug(`State cleared: ${key}`);
  }

  /**
   * Removes every key. Each tracked key is recorded as its own change.
   */
  clearAll(trackHistory: boolean = true): void {
    const entries = Array.from(this.state.entries());
    if (entries.length === 0) {
      return;
    }

    if (trackHistory) {
      for (const [key, value] of entries) {
        if (this.isTracked(key)) {
          this.record([key], value, null);
        }
      }
    }

    this.state.clear();
    for (const [key] of entries) {
      this.notifyFlat(key, null);
    }

    if (entries.some(([key]) => this.persistentKeys.has(key))) {
      this.persist();
    }
    this.logger.debug('All state cleared');
  }

  // ==================== Nested state ====================

  /**
   * Reads the value at `path`. Returns `defaultValue` for an empty or missing path.
   */
  getNested(path: readonly string[]): JsonValue | undefined;
  getNested(path: readonly string[], defaultValue: JsonValue): JsonValue;
  getNested(path: readonly string[], defaultValue?: JsonValue): JsonValue | undefined {
    const value = this.lookup(path);
    return value === undefined ? defaultValue : cloneJson(value);
  }

  /**
   * Stores a value at `path`, creating intermediate mappings and replacing
   * non-mapping intermediates.
   */
  setNested(path: readonly string[], value: JsonValue, trackHistory: boolean = true): void {
    const [head, ...rest] = path;
    if (head === undefined) {
      return;
    }

    const current = this.lookup(path);
    if (jsonEquals(current ?? null, value)) {
      return;
    }

    const stored = cloneJson(value);
    if (rest.length === 0) {
      this.state.set(head, stored);
    } else {
      const root = this.state.get(head);
      let node: JsonObject = isJsonObject(root) ? root : {};
      this.state.set(head, node);

      rest.forEach((key, index) => {
        if (index === rest.length - 1) {
          node[key] = stored;
          return;
        }
        const child = hasOwn(node, key) ? node[key] : undefined;
        const next: JsonObject = isJsonObject(child) ? child : {};
        node[key] = next;
        node = next;
      });
    }

    if (trackHistory && this.isTracked(path.join('.'), head)) {
      this.record(path, current ?? null, value);
    }

    this.notifyNested(path, value);

    if (this.persistentKeys.has(head)) {
      this.persist();
    }
    this.logger.debug(`Nested state changed: ${path.join('.')}`);
  }

  /**
   * Removes the value at `path`, then removes every ancestor mapping left empty.
   */
  clearNested(path: readonly string[], trackHistory: boolean = true): void {
    const [head] = path;
    if (head === undefined) {
      return;
    }

    const current = this.lookup(path);
    if (current === undefined) {
      return;
    }

    if (path.length === 1) {
      this.state.delete(head);
    } else {
      const parents = this.ancestors(path);
      const parent = parents[parents.length - 1];
      const leaf = path[path.length - 1];
      if (!parent || leaf === undefined) {
        return;
      }
      delete parent[leaf];
      this.removeEmptyAncestors(path, parents);
    }

    if (trackHistory && this.isTracked(path.join('.'), head)) {
      this.record(path, current, null);
    }

    this.notifyNested(path, null);

    if (this.persistentKeys.has(head)) {
      this.persist();
    }
    this.logger.debug(`Nested state cleared: ${path.join('.')}`);
  }

  // ==================== Listeners ====================

  /**
   * Listens to flat changes. Returns a function that removes the listener.
   */
  onStateChanged(listener: StateChangedListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Listens to nested changes. Returns a function that removes the listener.
   */
  onNestedStateChanged(listener: NestedStateChangedListener): () => void {
    this.nestedListeners.add(listener);
    return () => {
      this.nestedListeners.delete(listener);
    };
  }

  // ==================== History ====================

  /**
   * Reverts the most recent recorded change.
   */
  undo(): boolean {
    const change = this.history.pop();
    if (!change) {
      return false;
    }
    this.pushBounded(this.redoStack, change);
    this.apply(change, change.oldValue);
    this.logger.debug(`Undid change: ${change.key}`);
    return true;
  }

  /**
   * Re-applies the most recently undone change.
   */
  redo(): boolean {
    const change = this.redoStack.pop();
    if (!change) {
      return false;
    }
    this.pushBounded(this.history, change);
    this.apply(change, change.newValue);
    this.logger.debug(`Redid change: ${change.key}`);
    return true;
  }

  canUndo(): boolean {
    return this.history.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Recorded changes, oldest first.
   */
  getHistory(): StateChange[] {
    return this.history.map((change) => ({
      ...change,
      oldValue: cloneJson(change.oldValue),
      newValue: cloneJson(change.newValue),
    }));
  }

  clearHistory(): void {
    this.history = [];
    this.redoStack = [];
    this.logger.debug('History cleared');
  }

  enableHistory(enabled: boolean = true): void {
    this.historyEnabled = enabled;
    this.logger.debug(`History tracking ${enabled ? 'enabled' : 'disabled'}`);
  }

  isHistoryEnabled(): boolean {
    return this.historyEnabled;
  }

  /**
   * Stops recording changes of a key. For nested paths, both the dot-joined
   * path and its top-level key are checked.
   */
  excludeFromHistory(key: string): void {
    this.historyExcludedKeys.add(key);
  }

  includeInHistory(key: string): void {
    this.historyExcludedKeys.delete(key);
  }

  // ==================== Persistence ====================

  markAsPersistent(key: string): void {
    this.persistentKeys.add(key);
    this.logger.debug(`Key marked as persistent: ${key}`);
  }

  unmarkAsPersistent(key: string): void {
    this.persistentKeys.delete(key);
  }

  getPersistentKeys(): string[] {
    return Array.from(this.persistentKeys);
  }

  /**
   * Persists to a JSON file at `filePath`.
   */
  setPersistencePath(filePath: string): void {
    this.setSnapshotStore(new FsStateSnapshotStore(filePath));
  }

  setSnapshotStore(store: StateSnapshotStore): void {
    this.snapshotStore = store;
    this.logger.debug(`Persistence location set: ${store.location()}`);
  }

  /**
   * Replays the stored snapshot into the state without recording history.
   *
   * @returns true when a snapshot was found and applied
   */
  loadPersistentState(): boolean {
    const store = this.snapshotStore;
    if (!store) {
      this.logger.warn('Cannot load persistent state: no persistence location set');
      return false;
    }

    let snapshot: JsonObject | null;
    try {
      snapshot = store.load();
    } catch (error) {
      this.reportPersistenceError('Error loading persistent state', error, store);
      return false;
    }

    if (!snapshot) {
      this.logger.debug(`Persistent state not found: ${store.location()}`);
      return false;
    }

    this.loading = true;
    try {
      for (const [key, value] of Object.entries(snapshot)) {
        this.set(key, value, false);
      }
    } finally {
      this.loading = false;
    }

    this.logger.debug(`Persistent state loaded from ${store.location()}`);
    return true;
  }

  // ==================== Internals ====================

  private isTracked(key: string, topLevelKey: string = key): boolean {
    return (
      this.historyEnabled &&
      !this.historyExcludedKeys.has(key) &&
      !this.historyExcludedKeys.has(topLevelKey)
    );
  }

  private record(path: readonly string[], oldValue: JsonValue, newValue: JsonValue): void {
    const change: StateChange = Object.freeze({
      key: path.join('.'),
      path: Object.freeze([...path]),
      oldValue: cloneJson(oldValue),
      newValue: cloneJson(newValue),
      timestamp: Date.now(),
    });
    this.pushBounded(this.history, change);
    this.redoStack = [];
  }

  private pushBounded(stack: StateChange[], change: StateChange): void {
    stack.push(change);
    while (stack.length > this.maxHistorySize) {
      stack.shift();
    }
  }

  // Null means "absent": undo of a creation clears, redo of a clear clears
  private apply(change: StateChange, value: JsonValue): void {
    if (change.path.length > 1) {
      if (value === null) {
        this.clearNested(change.path, false);
      } else {
        this.setNested(change.path, value, false);
      }
    } else if (value === null) {
      this.clear(change.key, false);
    } else {
      this.set(change.key, value, false);
    }
  }

  private lookup(path: readonly string[]): JsonValue | undefined {
    const [head, ...rest] = path;
    if (head === undefined) {
      return undefined;
    }
    let current = this.state.get(head);
    for (const key of rest) {
      if (!isJsonObject(current) || !hasOwn(current, key)) {
        return undefined;
      }
      current = current[key];
    }
    return current;
  }

  /**
   * Mapping nodes along `path`, excluding the leaf: [state[p0], state[p0][p1], ...].
   */
  private ancestors(path: readonly string[]): JsonObject[] {
    const nodes: JsonObject[] = [];
    let current = this.state.get(path[0] ?? '');
    for (let index = 1; index < path.length; index++) {
      if (!isJsonObject(current)) {
        break;
      }
      nodes.push(current);
      const key = path[index];
      current = key !== undefined && hasOwn(current, key) ? current[key] : undefined;
    }
    return nodes;
  }

  private removeEmptyAncestors(path: readonly string[], parents: JsonObject[]): void {
    // parents[i] is the node at path[0..i]; walk from the deepest parent upwards
    for (let index = parents.length - 1; index >= 0; index--) {
      const node = parents[index];
      if (!node || Object.keys(node).length > 0) {
        return;
      }
      const key = path[index];
      if (key === undefined) {
        return;
      }
      if (index === 0) {
        this.state.delete(key);
      } else {
        const owner = parents[index - 1];
        if (owner) {
          delete owner[key];
        }
      }
    }
  }

  private notifyFlat(key: string, value: JsonValue): void {
    for (const listener of [...this.stateListeners]) {
      try {
        listener(key, value);
      } catch (error) {
        this.logger.error(`Error in state listener for ${key}:`, error);
      }
    }
    this.eventBus.emitUiStateChanged(key, value);
  }

  private notifyNested(path: readonly string[], value: JsonValue): void {
    for (const listener of [...this.nestedListeners]) {
      try {
        listener(path, value);
      } catch (error) {
        this.logger.error(`Error in nested state listener for ${path.join('.')}:`, error);
      }
    }
    this.eventBus.emitUiStateChanged(path.join('.'), value);
  }

  private persist(): void {
    if (this.loading) {
      return;
    }
    const store = this.snapshotStore;
    if (!store) {
      this.logger.warn('Cannot persist state: no persistence location set');
      return;
    }

    const snapshot: JsonObject = {};
    for (const key of this.persistentKeys) {
      const value = this.state.get(key);
      if (value !== undefined) {
        snapshot[key] = cloneJson(value);
      }
    }

    try {
      store.save(snapshot);
      this.logger.debug(`State persisted to ${store.location()}`);
    } catch (error) {
      this.reportPersistenceError('Error persisting state', error, store);
    }
  }

  private reportPersistenceError(message: string, error: unknown, store: StateSnapshotStore): void {
    this.logger.error(`${message}: ${errorMessage(error)}`);
    const errorType = error instanceof Error ? error.name : 'StatePersistenceError';
    this.eventBus.emitErrorOccurred(errorType, errorMessage(error), store.location());
  }
}
