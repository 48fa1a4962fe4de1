/**
 * ConfigStore Interface
 *
 * Abstraction for the project configuration file. Enables backend-agnostic
 * access to the framework configuration (filesystem, memory for tests).
 */

import type { AtelierConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (atelier.config.yml at the project root)
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * // Production with filesystem
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 *
 * // Tests with memory
 * const store = new MemoryConfigStore();
 * store.setConfig({ logLevel: 'debug' });
 * ```
 */
export interface ConfigStore {
  /**
   * @returns AtelierConfig, or null when the project has no configuration file
   * @throws ConfigValidationError when the file cannot be parsed or fails the schema
   */
  loadConfig(): Promise<AtelierConfig | null>;

  saveConfig(config: AtelierConfig): Promise<void>;
}
