/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for testing and embedded setups where the configuration is built in
 * code rather than read from the project root.
 */

import type { AtelierConfig } from '../../config_manager/config_manager.types';
import type { ConfigStore } from '../config_store';

/**
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ state: { persistentKeys: ['theme'] } });
 *
 * const manager = new ConfigManager(configStore);
 * const stateConfig = await manager.getStateConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: AtelierConfig | null = null;

  constructor(initial: AtelierConfig | null = null) {
    this.config = initial ? structuredClone(initial) : null;
  }

  /**
   * [EARS-A1] Returns null if no config set
   * [EARS-A2] Returns a copy of the config set via setConfig or saveConfig
   */
  async loadConfig(): Promise<AtelierConfig | null> {
    return this.config ? structuredClone(this.config) : null;
  }

  async saveConfig(config: AtelierConfig): Promise<void> {
    this.config = structuredClone(config);
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup). Accepts null to clear it.
   */
  setConfig(config: AtelierConfig | null): void {
    this.config = config ? structuredClone(config) : null;
  }

  getConfig(): AtelierConfig | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
