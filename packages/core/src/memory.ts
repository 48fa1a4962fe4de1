/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for testing and for embedding the framework in hosts that keep
 * configuration and state themselves.
 */

// StateSnapshotStore
export { MemoryStateSnapshotStore } from './state_store/memory/memory_state_store';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory/memory_config_store';

// ComponentDiscovery
export { MemoryComponentDiscovery } from './component_discovery/memory/memory_component_discovery';
