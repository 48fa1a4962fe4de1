/**
 * MemoryStateSnapshotStore - In-memory implementation of StateSnapshotStore
 */

import type { StateSnapshotStore } from '../state_store';
import { cloneJson } from '../../utils/json';
import type { JsonObject } from '../../utils/json';

/**
 * In-memory store for tests. Holds a deep copy of the last saved snapshot.
 *
 * @example
 * ```typescript
 * const store = new MemoryStateSnapshotStore();
 * store.setSnapshot({ theme: 'dark' });
 * stateManager.setSnapshotStore(store);
 * stateManager.loadPersistentState(); // true
 * ```
 */
export class MemoryStateSnapshotStore implements StateSnapshotStore {
  private snapshot: JsonObject | null = null;
  private saves = 0;

  load(): JsonObject | null {
    return this.snapshot ? cloneJson(this.snapshot) : null;
  }

  save(snapshot: JsonObject): void {
    this.snapshot = cloneJson(snapshot);
    this.saves++;
  }

  location(): string {
    return 'memory';
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set snapshot directly (for test setup)
   */
  setSnapshot(snapshot: JsonObject | null): void {
    this.snapshot = snapshot ? cloneJson(snapshot) : null;
  }

  /**
   * Get the stored snapshot (for test assertions)
   */
  getSnapshot(): JsonObject | null {
    return this.snapshot;
  }

  /**
   * Number of save() calls since construction or clear()
   */
  saveCount(): number {
    return this.saves;
  }

  clear(): void {
    this.snapshot = null;
    this.saves = 0;
  }
}
