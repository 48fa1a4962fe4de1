/**
 * ConfigManager - Framework configuration with defaults
 *
 * Provides typed access to the project configuration file. Missing files,
 * sections and fields fall back to DEFAULT_CONFIG.
 *
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import * as path from 'path';

import type { ConfigStore } from '../config_store/config_store';
import type { LogLevel } from '../logger';
import type {
  AtelierConfig,
  EventBusConfig,
  IConfigManager,
  RegistryConfig,
  ResolvedConfig,
  StateConfig,
} from './config_manager.types';

export const DEFAULT_CONFIG: ResolvedConfig = {
  eventBus: { maxHistorySize: 100, debug: false },
  state: {
    maxHistorySize: 100,
    persistencePath: path.join('.atelier', 'state.json'),
    persistentKeys: [],
    historyExcludedKeys: [],
  },
  registry: { discoveryPaths: [] },
  logLevel: 'info',
};

/**
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@atelier/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@atelier/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ state: { persistentKeys: ['theme'] } });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Raw configuration, or null when the project has none.
   * Throws ConfigValidationError for a malformed file.
   */
  async loadConfig(): Promise<AtelierConfig | null> {
    return this.configStore.loadConfig();
  }

  async getEventBusConfig(): Promise<EventBusConfig> {
    const config = await this.loadConfig();
    return {
      maxHistorySize: config?.eventBus?.maxHistorySize ?? DEFAULT_CONFIG.eventBus.maxHistorySize,
      debug: config?.eventBus?.debug ?? DEFAULT_CONFIG.eventBus.debug,
    };
  }

  async getStateConfig(): Promise<StateConfig> {
    const config = await this.loadConfig();
    return {
      maxHistorySize: config?.state?.maxHistorySize ?? DEFAULT_CONFIG.state.maxHistorySize,
      persistencePath: config?.state?.persistencePath ?? DEFAULT_CONFIG.state.persistencePath,
      persistentKeys: [...(config?.state?.persistentKeys ?? DEFAULT_CONFIG.state.persistentKeys)],
      historyExcludedKeys: [...(config?.state?.historyExcludedKeys ?? DEFAULT_CONFIG.state.historyExcludedKeys)],
    };
  }

  async getRegistryConfig(): Promise<RegistryConfig> {
    const config = await this.loadConfig();
    return {
      discoveryPaths: [...(config?.registry?.discoveryPaths ?? DEFAULT_CONFIG.registry.discoveryPaths)],
    };
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.loadConfig();
    return config?.logLevel ?? DEFAULT_CONFIG.logLevel;
  }

  async resolvePersistencePath(projectRoot: string): Promise<string> {
    const { persistencePath } = await this.getStateConfig();
    return path.resolve(projectRoot, persistencePath);
  }

  async resolveDiscoveryPaths(projectRoot: string): Promise<string[]> {
    const { discoveryPaths } = await this.getRegistryConfig();
    return discoveryPaths.map((discoveryPath) => path.resolve(projectRoot, discoveryPath));
  }

  async getResolvedConfig(): Promise<ResolvedConfig> {
    const [eventBus, state, registry, logLevel] = await Promise.all([
      this.getEventBusConfig(),
      this.getStateConfig(),
      this.getRegistryConfig(),
      this.getLogLevel(),
    ]);
    return { eventBus, state, registry, logLevel };
  }
}
