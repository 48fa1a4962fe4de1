/**
 * Backend-agnostic API
 *
 * Filesystem implementations live in @atelier/core/fs, in-memory ones in
 * @atelier/core/memory.
 */

export * as EventBus from './event_bus';
export * as State from './state_manager';
export * as StateStore from './state_store';
export * as Registry from './component_registry';
export * as Discovery from './component_discovery';
export * as Config from './config_manager';
export * as ConfigStore from './config_store';
export * as Framework from './framework';
export * as Logger from './logger';
export * as Schemas from './schemas';
export * as Utils from './utils';
