import { generateEventId } from '../utils/id_generator';
import type {
  EventCategory,
  EventOfType,
  EventPriority,
  EventType,
  PayloadOf,
} from './types';

type EventDefaults = { category: EventCategory; priority: EventPriority };

/**
 * Default category and priority of every event type. Declared as a full mapped
 * type so adding an event type without defaults fails to compile.
 */
export const EVENT_DEFAULTS: { readonly [K in EventType]: EventDefaults } = {
  'document.selected': { category: 'document', priority: 'normal' },
  'document.loaded': { category: 'document', priority: 'normal' },
  'document.saved': { category: 'document', priority: 'normal' },
  'document.modified': { category: 'document', priority: 'normal' },
  'document.created': { category: 'document', priority: 'normal' },
  'document.deleted': { category: 'document', priority: 'normal' },
  'project.loaded': { category: 'project', priority: 'normal' },
  'project.saved': { category: 'project', priority: 'normal' },
  'project.created': { category: 'project', priority: 'normal' },
  'project.closed': { category: 'project', priority: 'normal' },
  'ui.theme.changed': { category: 'ui', priority: 'normal' },
  'ui.state.changed': { category: 'ui', priority: 'normal' },
  'error.occurred': { category: 'error', priority: 'high' },
  'component.registered': { category: 'system', priority: 'normal' },
  'component.unregistered': { category: 'system', priority: 'normal' },
  'component.state.changed': { category: 'system', priority: 'low' },
  'component.error': { category: 'system', priority: 'high' },
  'custom': { category: 'custom', priority: 'normal' },
};

export function isEventType(value: string): value is EventType {
  return Object.prototype.hasOwnProperty.call(EVENT_DEFAULTS, value);
}

export type CreateEventOptions = {
  /** Producer identifier; left empty the bus infers it on emit */
  source?: string;
  priority?: EventPriority;
  category?: EventCategory;
  timestamp?: number;
};

/**
 * Builds an immutable event with metadata filled from EVENT_DEFAULTS.
 *
 * @example
 * ```typescript
 * const event = createEvent('document.saved', { documentId: 'chapter-1' }, { source: 'editor' });
 * eventBus.emit(event);
 * ```
 */
export function createEvent<K extends EventType>(
  type: K,
  payload: PayloadOf<K>,
  options: CreateEventOptions = {}
): EventOfType<K> {
  const defaults = EVENT_DEFAULTS[type];
  const timestamp = options.timestamp ?? Date.now();
  const frozenPayload = { ...payload };
  Object.freeze(frozenPayload);

  const event: EventOfType<K> = {
    type,
    payload: frozenPayload,
    metadata: Object.freeze({
      eventId: generateEventId(timestamp),
      timestamp,
      source: options.source ?? '',
      priority: options.priority ?? defaults.priority,
      category: options.category ?? defaults.category,
    }),
  };
  Object.freeze(event);
  return event;
}
