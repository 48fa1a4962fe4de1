/**
 * StateSnapshotStore - state persistence abstraction
 *
 * This module only exports the interface and its error.
 * For implementations, use:
 * - @atelier/core/fs for FsStateSnapshotStore
 * - @atelier/core/memory for MemoryStateSnapshotStore
 */

export type { StateSnapshotStore } from './state_store';
export { StatePersistenceError } from './state_store.errors';
export type { StatePersistenceErrorCode } from './state_store.errors';
