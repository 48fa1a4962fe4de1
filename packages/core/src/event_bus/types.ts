/**
 * Event Bus types for the atelier event-driven core
 */

import type { JsonValue } from '../utils/json';

export type EventPriority = 'low' | 'normal' | 'high' | 'critical';

export type EventCategory = 'document' | 'project' | 'ui' | 'error' | 'system' | 'custom';

/**
 * Event metadata for ordering and debugging
 */
export type EventMetadata = {
  /** Unique event identifier */
  readonly eventId: string;
  /** Event creation timestamp (epoch ms) */
  readonly timestamp: number;
  /** Producer identifier, inferred from the call site when left empty */
  readonly source: string;
  readonly priority: EventPriority;
  readonly category: EventCategory;
};

/**
 * Base event structure
 */
export type BaseEvent<TType extends string = string, TPayload = unknown> = {
  /** Event type identifier */
  readonly type: TType;
  /** Event payload */
  readonly payload: TPayload;
  readonly metadata: EventMetadata;
};

/**
 * Payload of every event, keyed by event type
 */
export type DocumentPayload = { documentId: string };

export type ProjectPayload = { projectId: string };

export type ComponentPayload = {
  componentId: string;
  componentType: string;
  componentName: string;
};

export type EventPayloads = {
  'document.selected': DocumentPayload;
  'document.loaded': DocumentPayload;
  'document.saved': DocumentPayload;
  'document.modified': DocumentPayload;
  'document.created': DocumentPayload;
  'document.deleted': DocumentPayload;
  'project.loaded': ProjectPayload;
  'project.saved': ProjectPayload;
  'project.created': ProjectPayload;
  'project.closed': Record<string, never>;
  'ui.theme.changed': { themeName: string };
  'ui.state.changed': {
    /** Flat key, or dot-joined path for nested state */
    stateKey: string;
    /** New value; null when the key was cleared */
    stateValue: JsonValue;
  };
  'error.occurred': {
    errorType: string;
    errorMessage: string;
    context?: string;
  };
  'component.registered': ComponentPayload;
  'component.unregistered': ComponentPayload;
  'component.state.changed': {
    componentId: string;
    previousState: string;
    state: string;
  };
  'component.error': {
    componentId: string;
    /** Lifecycle operation that failed (createInstance, dispose, activate, ...) */
    operation: string;
    errorMessage: string;
  };
  /** Application-defined events */
  'custom': {
    name: string;
    data: JsonValue;
  };
};

export type EventType = keyof EventPayloads;

export type EventOfType<K extends EventType> = BaseEvent<K, EventPayloads[K]>;

export type PayloadOf<K extends EventType> = EventPayloads[K];

/**
 * Union of every event the bus dispatches
 */
export type AtelierEvent = { [K in EventType]: EventOfType<K> }[EventType];

export type DocumentSelectedEvent = EventOfType<'document.selected'>;
export type DocumentLoadedEvent = EventOfType<'document.loaded'>;
export type DocumentSavedEvent = EventOfType<'document.saved'>;
export type DocumentModifiedEvent = EventOfType<'document.modified'>;
export type DocumentCreatedEvent = EventOfType<'document.created'>;
export type DocumentDeletedEvent = EventOfType<'document.deleted'>;
export type ProjectLoadedEvent = EventOfType<'project.loaded'>;
export type ProjectSavedEvent = EventOfType<'project.saved'>;
export type ProjectCreatedEvent = EventOfType<'project.created'>;
export type ProjectClosedEvent = EventOfType<'project.closed'>;
export type UiThemeChangedEvent = EventOfType<'ui.theme.changed'>;
export type UiStateChangedEvent = EventOfType<'ui.state.changed'>;
export type ErrorOccurredEvent = EventOfType<'error.occurred'>;
export type ComponentRegisteredEvent = EventOfType<'component.registered'>;
export type ComponentUnregisteredEvent = EventOfType<'component.unregistered'>;
export type ComponentStateChangedEvent = EventOfType<'component.state.changed'>;
export type ComponentErrorEvent = EventOfType<'component.error'>;
export type CustomEvent = EventOfType<'custom'>;

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = AtelierEvent> = (event: T) => void;

/**
 * Returned by every handler registration
 */
export type HandlerSubscription = {
  /** Unique subscription identifier */
  readonly id: string;
  /** Event type key, or glob pattern for pattern handlers */
  readonly eventType: string;
  readonly kind: 'direct' | 'filtered' | 'pattern';
  /** Removes the registration; false when it was already gone */
  unsubscribe(): boolean;
};

/**
 * Options accepted by the EventBus constructor
 */
export type EventBusOptions = {
  /** Maximum number of events kept in history (default: 100) */
  maxHistorySize?: number;
  /** Log every emitted event at debug level (default: false) */
  debug?: boolean;
};

/**
 * Untyped channels kept for producers and consumers written against the
 * callback-style API. Tuple = listener arguments.
 */
export type LegacyChannels = {
  document_selected: [documentId: string];
  document_loaded: [documentId: string];
  document_saved: [documentId: string];
  document_modified: [documentId: string];
  document_created: [documentId: string];
  document_deleted: [documentId: string];
  project_loaded: [projectId: string];
  project_saved: [projectId: string];
  project_closed: [];
  project_created: [projectId: string];
  ui_theme_changed: [themeName: string];
  ui_state_changed: [stateKey: string, stateValue: JsonValue];
  error_occurred: [errorType: string, errorMessage: string];
  event_emitted: [event: AtelierEvent];
};

export type LegacyChannel = keyof LegacyChannels;

export type LegacyListener<C extends LegacyChannel> = (...args: LegacyChannels[C]) => void;
