export { EventBus } from './event_bus';
export { EventFilter } from './event_filter';
export type { EventFilterOptions } from './event_filter';
export { createEvent, isEventType, EVENT_DEFAULTS } from './event_factory';
export type { CreateEventOptions } from './event_factory';
export type * from './types';
