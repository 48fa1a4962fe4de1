/**
 * Framework - composition root
 *
 * Wires the EventBus, StateManager, ComponentRegistry and a discovery
 * backend in dependency order. Applications create one Framework at startup
 * and pass its services down; nothing in the core is a process-wide singleton.
 */

import { MemoryComponentDiscovery } from '../component_discovery/memory/memory_component_discovery';
import { ComponentRegistry } from '../component_registry/component_registry';
import { EventBus } from '../event_bus/event_bus';
import { createLogger } from '../logger';
import { StateManager } from '../state_manager/state_manager';
import type { Framework, FrameworkOptions } from './framework.types';

/**
 * @example
 * ```typescript
 * const framework = createFramework({ state: { persistentKeys: ['theme'] } });
 * framework.registry.register({ id: 'outline', type: 'view', componentClass: OutlinePanel });
 * const outline = framework.registry.resolve('outline', OutlinePanel);
 * framework.dispose();
 * ```
 */
export function createFramework(options: FrameworkOptions = {}): Framework {
  const logger = createLogger('[Framework] ');
  const eventBus = new EventBus(options.eventBus);
  const stateManager = new StateManager(eventBus, options.state);
  const registry = new ComponentRegistry(eventBus, stateManager);
  const discovery = options.createDiscovery
    ? options.createDiscovery(registry, eventBus)
    : new MemoryComponentDiscovery(registry);

  let disposed = false;

  return {
    eventBus,
    stateManager,
    registry,
    discovery,
    logger,
    dispose(): void {
      if (disposed) {
        return;
      }
      disposed = true;
      registry.clear();
      eventBus.clearHandlers();
      logger.debug('Framework disposed');
    },
  };
}
