/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface and its error.
 * For implementations, use:
 * - @atelier/core/fs for FsConfigStore
 * - @atelier/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
export { ConfigValidationError } from './config_store.errors';
