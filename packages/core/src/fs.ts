/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @atelier/core/memory for in-memory alternatives.
 */

// StateSnapshotStore
export { FsStateSnapshotStore } from './state_store/fs/fs_state_store';

// ConfigStore + ConfigManager factory
export { FsConfigStore, CONFIG_FILE_NAMES, createConfigManager } from './config_store/fs/fs_config_store';

// ComponentDiscovery
export {
  FsComponentDiscovery,
  DEFAULT_DISCOVERY_INCLUDE,
  DEFAULT_DISCOVERY_EXCLUDE,
  defaultDiscoveryInclude,
} from './component_discovery/fs/fs_component_discovery';
export type { FsComponentDiscoveryOptions } from './component_discovery/fs/fs_component_discovery';

// Framework bootstrap from a project directory
export { bootstrapFramework } from './framework/fs/bootstrap';
export type { BootstrapOptions } from './framework/fs/bootstrap';
