export { createFramework } from './framework';
export type { DiscoveryFactory, Framework, FrameworkOptions } from './framework.types';
