/**
 * bootstrapFramework - builds a Framework from a project on disk
 *
 * Reads the project configuration, wires the services with it, restores the
 * persistent UI state and registers the components found on the configured
 * discovery paths.
 */

import * as path from 'path';

import type { FsComponentDiscoveryOptions } from '../../component_discovery/fs/fs_component_discovery';
import { FsComponentDiscovery } from '../../component_discovery/fs/fs_component_discovery';
import { ConfigManager } from '../../config_manager/config_manager';
import type { ConfigStore } from '../../config_store/config_store';
import { FsConfigStore } from '../../config_store/fs/fs_config_store';
import { setLogLevel } from '../../logger';
import { createFramework } from '../framework';
import type { Framework } from '../framework.types';

export type BootstrapOptions = {
  projectRoot: string;
  /** Configuration source; defaults to the config file at the project root */
  configStore?: ConfigStore;
  discovery?: FsComponentDiscoveryOptions;
  /** Skip component discovery (e.g. for commands that only read state) */
  skipDiscovery?: boolean;
};

/**
 * @example
 * ```typescript
 * const framework = await bootstrapFramework({ projectRoot: '/path/to/project' });
 * console.log(framework.registry.getComponentTree());
 * ```
 */
export async function bootstrapFramework(options: BootstrapOptions): Promise<Framework> {
  const projectRoot = path.resolve(options.projectRoot);
  const configManager = new ConfigManager(options.configStore ?? new FsConfigStore(projectRoot));

  const rawConfig = await configManager.loadConfig();
  if (rawConfig?.logLevel) {
    setLogLevel(rawConfig.logLevel);
  }

  const config = await configManager.getResolvedConfig();
  const framework = createFramework({
    eventBus: config.eventBus,
    state: {
      maxHistorySize: config.state.maxHistorySize,
      persistentKeys: config.state.persistentKeys,
      historyExcludedKeys: config.state.historyExcludedKeys,
    },
    createDiscovery: (registry, eventBus) => new FsComponentDiscovery(registry, eventBus, options.discovery),
  });

  framework.stateManager.setPersistencePath(await configManager.resolvePersistencePath(projectRoot));
  framework.stateManager.loadPersistentState();

  for (const discoveryPath of await configManager.resolveDiscoveryPaths(projectRoot)) {
    framework.discovery.addDiscoveryPath(discoveryPath);
  }
  if (!options.skipDiscovery) {
    await framework.discovery.discover();
  }

  framework.logger.debug(`Framework ready for ${projectRoot}`);
  return framework;
}
