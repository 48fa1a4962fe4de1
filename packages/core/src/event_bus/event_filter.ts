import type { EventCategory, EventMetadata, EventPriority, EventType } from './types';

export type EventFilterOptions = {
  /** Accepted categories; absent or empty accepts any category */
  categories?: Iterable<EventCategory>;
  /** Accepted priorities; absent or empty accepts any priority */
  priorities?: Iterable<EventPriority>;
  /** Accepted event types; absent or empty accepts any type */
  eventTypes?: Iterable<EventType>;
};

function toDimension<T>(values: Iterable<T> | undefined): ReadonlySet<T> | null {
  if (!values) return null;
  const set = new Set(values);
  return set.size > 0 ? set : null;
}

/**
 * Predicate over event category, priority and type. Every specified
 * dimension must accept the event.
 */
export class EventFilter {
  readonly categories: ReadonlySet<EventCategory> | null;
  readonly priorities: ReadonlySet<EventPriority> | null;
  readonly eventTypes: ReadonlySet<EventType> | null;

  constructor(options: EventFilterOptions = {}) {
    this.categories = toDimension(options.categories);
    this.priorities = toDimension(options.priorities);
    this.eventTypes = toDimension(options.eventTypes);
  }

  matches(event: { readonly type: EventType; readonly metadata: EventMetadata }): boolean {
    if (this.categories && !this.categories.has(event.metadata.category)) {
      return false;
    }
    if (this.priorities && !this.priorities.has(event.metadata.priority)) {
      return false;
    }
    if (this.eventTypes && !this.eventTypes.has(event.type)) {
      return false;
    }
    return true;
  }
}
