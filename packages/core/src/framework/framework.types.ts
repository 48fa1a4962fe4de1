import type { ComponentDiscovery } from '../component_discovery/component_discovery';
import type { ComponentRegistry } from '../component_registry/component_registry';
import type { EventBus } from '../event_bus/event_bus';
import type { EventBusOptions } from '../event_bus/types';
import type { Logger } from '../logger';
import type { StateManager } from '../state_manager/state_manager';
import type { StateManagerOptions } from '../state_manager/state_manager.types';

export type DiscoveryFactory = (registry: ComponentRegistry, eventBus: EventBus) => ComponentDiscovery;

export type FrameworkOptions = {
  eventBus?: EventBusOptions;
  state?: StateManagerOptions;
  /** Builds the discovery backend; defaults to an empty in-memory one */
  createDiscovery?: DiscoveryFactory;
};

/**
 * The wired set of framework services shared by every component.
 */
export interface Framework {
  readonly eventBus: EventBus;
  readonly stateManager: StateManager;
  readonly registry: ComponentRegistry;
  readonly discovery: ComponentDiscovery;
  readonly logger: Logger;
  /** Disposes every component and drops all event subscriptions */
  dispose(): void;
}
