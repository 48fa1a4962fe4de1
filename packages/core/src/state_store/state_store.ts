/**
 * StateSnapshotStore - persistence backend of the StateManager
 *
 * Holds one JSON object mapping every persistent key to its value. The
 * StateManager rewrites the whole snapshot on each persistent mutation.
 *
 * Implementations:
 * - FsStateSnapshotStore: JSON file on disk (production)
 * - MemoryStateSnapshotStore: in-memory (tests, embedding)
 *
 * Calls are synchronous: state mutations complete, persistence included,
 * before `set` returns.
 */

import type { JsonObject } from '../utils/json';

export interface StateSnapshotStore {
  /**
   * Reads the stored snapshot.
   *
   * @returns The snapshot, or null when nothing has been stored yet
   * @throws StatePersistenceError when the stored data cannot be read or is not a JSON object
   */
  load(): JsonObject | null;

  /**
   * Replaces the stored snapshot.
   *
   * @throws StatePersistenceError when the snapshot cannot be written
   */
  save(snapshot: JsonObject): void;

  /**
   * Human-readable location of the snapshot, used in log messages.
   */
  location(): string;
}
