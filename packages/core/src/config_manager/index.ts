export { ConfigManager, DEFAULT_CONFIG } from './config_manager';
export type {
  AtelierConfig,
  EventBusConfig,
  IConfigManager,
  RegistryConfig,
  ResolvedConfig,
  StateConfig,
} from './config_manager.types';
