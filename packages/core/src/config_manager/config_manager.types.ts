/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger';

/**
 * Framework configuration, as read from atelier.config.yml.
 * Every section and field is optional; see DEFAULT_CONFIG.
 */
export type AtelierConfig = {
  eventBus?: {
    maxHistorySize?: number;
    debug?: boolean;
  };
  state?: {
    maxHistorySize?: number;
    /** Relative paths resolve against the project root */
    persistencePath?: string;
    persistentKeys?: string[];
    historyExcludedKeys?: string[];
  };
  registry?: {
    /** Roots scanned for annotated components, relative to the project root */
    discoveryPaths?: string[];
  };
  logLevel?: LogLevel;
};

export type EventBusConfig = {
  maxHistorySize: number;
  debug: boolean;
};

export type StateConfig = {
  maxHistorySize: number;
  persistencePath: string;
  persistentKeys: string[];
  historyExcludedKeys: string[];
};

export type RegistryConfig = {
  discoveryPaths: string[];
};

export type ResolvedConfig = {
  eventBus: EventBusConfig;
  state: StateConfig;
  registry: RegistryConfig;
  logLevel: LogLevel;
};

/**
 * Public interface for ConfigManager
 */
export interface IConfigManager {
  loadConfig(): Promise<AtelierConfig | null>;
  getEventBusConfig(): Promise<EventBusConfig>;
  getStateConfig(): Promise<StateConfig>;
  getRegistryConfig(): Promise<RegistryConfig>;
  getLogLevel(): Promise<LogLevel>;
  /** Absolute path of the state snapshot file */
  resolvePersistencePath(projectRoot: string): Promise<string>;
  /** Absolute discovery roots */
  resolveDiscoveryPaths(projectRoot: string): Promise<string[]>;
  /** Every section with defaults applied */
  getResolvedConfig(): Promise<ResolvedConfig>;
}
