export { collectAnnotatedClasses, registerDiscovered } from './component_discovery';
export type { ComponentAnnotation, ComponentDiscovery, DiscoveredComponent } from './component_discovery';
export { DiscoveryError } from './component_discovery.errors';
