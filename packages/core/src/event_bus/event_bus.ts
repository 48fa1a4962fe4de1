import picomatch from 'picomatch';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { generateSubscriptionId } from '../utils/id_generator';
import { inferCallerSource } from '../utils/caller';
import type { JsonValue } from '../utils/json';
import { createEvent } from './event_factory';
import { EventFilter } from './event_filter';
import type {
  AtelierEvent,
  EventBusOptions,
  EventHandler,
  EventOfType,
  EventType,
  HandlerSubscription,
  LegacyChannel,
  LegacyChannels,
  LegacyListener,
} from './types';

const DEFAULT_MAX_HISTORY_SIZE = 100;

type HandlerEntry<K extends EventType> = {
  readonly id: string;
  readonly ref: WeakRef<EventHandler<EventOfType<K>>>;
  readonly filter: EventFilter | null;
};

type HandlerTable = { [K in EventType]: HandlerEntry<K>[] };

type PatternEntry = {
  readonly id: string;
  readonly pattern: string;
  readonly matches: (eventType: string) => boolean;
  readonly ref: WeakRef<EventHandler<AtelierEvent>>;
};

type LegacyTable = { [C in LegacyChannel]: Set<LegacyListener<C>> };

function createHandlerTable(): HandlerTable {
  return {
    'document.selected': [],
    'document.loaded': [],
    'document.saved': [],
    'document.modified': [],
    'document.created': [],
    'document.deleted': [],
    'project.loaded': [],
    'project.saved': [],
    'project.created': [],
    'project.closed': [],
    'ui.theme.changed': [],
    'ui.state.changed': [],
    'error.occurred': [],
    'component.registered': [],
    'component.unregistered': [],
    'component.state.changed': [],
    'component.error': [],
    'custom': [],
  };
}

function createLegacyTable(): LegacyTable {
  return {
    document_selected: new Set(),
    document_loaded: new Set(),
    document_saved: new Set(),
    document_modified: new Set(),
    document_created: new Set(),
    document_deleted: new Set(),
    project_loaded: new Set(),
    project_saved: new Set(),
    project_closed: new Set(),
    project_created: new Set(),
    ui_theme_changed: new Set(),
    ui_state_changed: new Set(),
    error_occurred: new Set(),
    event_emitted: new Set(),
  };
}

/**
 * Synchronous, typed publish/subscribe hub.
 *
 * Handlers are held weakly: the bus never keeps a consumer alive, and a
 * handler that has been garbage collected is dropped silently. Keep a
 * reference to the handler (or its owner) for as long as it should receive
 * events, and call `unsubscribe()` on the returned subscription to stop
 * earlier.
 *
 * Dispatch order for every emitted event: unfiltered handlers, filtered
 * handlers whose filter matches, pattern handlers, then legacy channels.
 * A handler that throws is logged and the remaining handlers still run.
 */
export class EventBus {
  private readonly logger: Logger;
  private readonly maxHistorySize: number;
  private debug: boolean;

  private unfiltered: HandlerTable = createHandlerTable();
  private filtered: HandlerTable = createHandlerTable();
  private patterns: PatternEntry[] = [];
  private legacy: LegacyTable = createLegacyTable();
  private history: AtelierEvent[] = [];

  private readonly finalizer = new FinalizationRegistry<string>((subscriptionId) => {
    this.removeSubscription(subscriptionId);
  });

  constructor(options: EventBusOptions = {}) {
    this.logger = createLogger('[EventBus] ');
    this.maxHistorySize = Math.max(0, options.maxHistorySize ?? DEFAULT_MAX_HISTORY_SIZE);
    this.debug = options.debug ?? false;
  }

  /**
   * Registers a handler for one event type.
   *
   * @example
   * ```typescript
   * const onSaved = (event: DocumentSavedEvent) => refresh(event.payload.documentId);
   * const subscription = eventBus.registerHandler('document.saved', onSaved);
   * // later
   * subscription.unsubscribe();
   * ```
   */
  registerHandler<K extends EventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): HandlerSubscription {
    return this.addEntry(this.unfiltered, eventType, handler, null, 'direct');
  }

  /**
   * Registers a handler that only receives events of `eventType` accepted by `filter`.
   */
  registerFilteredHandler<K extends EventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>,
    filter: EventFilter
  ): HandlerSubscription {
    return this.addEntry(this.filtered, eventType, handler, filter, 'filtered');
  }

  /**
   * Receives every event whose type matches a glob over dot-separated types
   * ('component.*', 'document.save?', '*').
   */
  registerPatternHandler(pattern: string, handler: EventHandler<AtelierEvent>): HandlerSubscription {
    const id = generateSubscriptionId();
    const entry: PatternEntry = {
      id,
      pattern,
      matches: picomatch(pattern),
      ref: new WeakRef(handler),
    };
    this.patterns.push(entry);
    this.finalizer.register(handler, id, entry);

    return {
      id,
      eventType: pattern,
      kind: 'pattern',
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  /**
   * Removes an unfiltered handler. Returns false when it was not registered.
   */
  unregisterHandler<K extends EventType>(eventType: K, handler: EventHandler<EventOfType<K>>): boolean {
    return this.removeEntry(this.unfiltered[eventType], handler);
  }

  /**
   * Removes a filtered handler. Returns false when it was not registered.
   */
  unregisterFilteredHandler<K extends EventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): boolean {
    return this.removeEntry(this.filtered[eventType], handler);
  }

  /**
   * Removes any registration by subscription id.
   */
  unsubscribe(subscriptionId: string): boolean {
    return this.removeSubscription(subscriptionId);
  }

  /**
   * Subscribes a callback-style listener to an untyped channel.
   */
  onLegacy<C extends LegacyChannel>(channel: C, listener: LegacyListener<C>): void {
    this.legacy[channel].add(listener);
  }

  offLegacy<C extends LegacyChannel>(channel: C, listener: LegacyListener<C>): boolean {
    return this.legacy[channel].delete(listener);
  }

  /**
   * Publishes an event to every matching handler.
   *
   * When the event carries no source, a copy is dispatched whose source names
   * the calling module and function.
   */
  emit(event: AtelierEvent): void {
    this.publish(event, event.metadata.source ? '' : inferCallerSource(2));
  }

  // Convenience producers for the callback-style API

  emitDocumentSelected(documentId: string): void {
    this.emitFromCaller(createEvent('document.selected', { documentId }));
  }

  emitDocumentLoaded(documentId: string): void {
    this.emitFromCaller(createEvent('document.loaded', { documentId }));
  }

  emitDocumentSaved(documentId: string): void {
    this.emitFromCaller(createEvent('document.saved', { documentId }));
  }

  emitDocumentModified(documentId: string): void {
    this.emitFromCaller(createEvent('document.modified', { documentId }));
  }

  emitDocumentCreated(documentId: string): void {
    this.emitFromCaller(createEvent('document.created', { documentId }));
  }

  emitDocumentDeleted(documentId: string): void {
    this.emitFromCaller(createEvent('document.deleted', { documentId }));
  }

  emitProjectLoaded(projectId: string): void {
    this.emitFromCaller(createEvent('project.loaded', { projectId }));
  }

  emitProjectSaved(projectId: string): void {
    this.emitFromCaller(createEvent('project.saved', { projectId }));
  }

  emitProjectCreated(projectId: string): void {
    this.emitFromCaller(createEvent('project.created', { projectId }));
  }

  emitProjectClosed(): void {
    this.emitFromCaller(createEvent('project.closed', {}));
  }

  emitUiThemeChanged(themeName: string): void {
    this.emitFromCaller(createEvent('ui.theme.changed', { themeName }));
  }

  emitUiStateChanged(stateKey: string, stateValue: JsonValue): void {
    this.emitFromCaller(createEvent('ui.state.changed', { stateKey, stateValue }));
  }

  emitErrorOccurred(errorType: string, errorMessage: string, context?: string): void {
    const payload = context === undefined ? { errorType, errorMessage } : { errorType, errorMessage, context };
    this.emitFromCaller(createEvent('error.occurred', payload));
  }

  setDebugMode(enabled: boolean): void {
    this.debug = enabled;
    this.logger.info(`Debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  isDebugMode(): boolean {
    return this.debug;
  }

  /**
   * Returns recorded events oldest-first, optionally filtered and capped to the most recent `maxEvents`.
   */
  getHistory(maxEvents?: number, filter?: EventFilter): AtelierEvent[] {
    let events = filter ? this.history.filter((event) => filter.matches(event)) : [...this.history];
    if (maxEvents !== undefined) {
      events = maxEvents > 0 ? events.slice(-maxEvents) : [];
    }
    return events;
  }

  clearHistory(): void {
    this.history = [];
  }

  /**
   * Number of live unfiltered and filtered handlers for an event type.
   */
  getHandlerCount<K extends EventType>(eventType: K): number {
    const isLive = (entry: { ref: WeakRef<object> }) => entry.ref.deref() !== undefined;
    return (
      this.unfiltered[eventType].filter(isLive).length + this.filtered[eventType].filter(isLive).length
    );
  }

  /**
   * Drops every registration, legacy listeners included (for testing/cleanup).
   */
  clearHandlers(): void {
    for (const entry of this.allEntries()) {
      this.finalizer.unregister(entry);
    }
    this.unfiltered = createHandlerTable();
    this.filtered = createHandlerTable();
    this.patterns = [];
    this.legacy = createLegacyTable();
  }

  private emitFromCaller(event: AtelierEvent): void {
    // 1: inferCallerSource, 2: emitFromCaller, 3: emitXxx, 4: its caller
    this.publish(event, inferCallerSource(3));
  }

  private publish(event: AtelierEvent, callerSource: string): void {
    const dispatched = event.metadata.source ? event : withSource(event, callerSource || 'unknown');

    this.history.push(dispatched);
    while (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }

    if (this.debug) {
      this.logger.debug(
        `Event emitted: ${dispatched.type} from ${dispatched.metadata.source}`,
        dispatched.payload
      );
    }

    this.dispatch(dispatched);
    this.dispatchPatterns(dispatched);
    this.dispatchLegacy(dispatched);
  }

  private dispatch<K extends EventType>(event: EventOfType<K>): void {
    const type: K = event.type;

    for (const entry of [...this.unfiltered[type]]) {
      const handler = entry.ref.deref();
      if (handler) {
        this.invoke(type, () => handler(event));
      }
    }

    for (const entry of [...this.filtered[type]]) {
      const handler = entry.ref.deref();
      if (handler && entry.filter?.matches(event)) {
        this.invoke(type, () => handler(event));
      }
    }
  }

  private dispatchPatterns(event: AtelierEvent): void {
    for (const entry of [...this.patterns]) {
      const handler = entry.ref.deref();
      if (handler && entry.matches(event.type)) {
        this.invoke(event.type, () => handler(event));
      }
    }
  }

  private dispatchLegacy(event: AtelierEvent): void {
    switch (event.type) {
      case 'document.selected':
        this.fireLegacy('document_selected', event.payload.documentId);
        break;
      case 'document.loaded':
        this.fireLegacy('document_loaded', event.payload.documentId);
        break;
      case 'document.saved':
        this.fireLegacy('document_saved', event.payload.documentId);
        break;
      case 'document.modified':
        this.fireLegacy('document_modified', event.payload.documentId);
        break;
      case 'document.created':
        this.fireLegacy('document_created', event.payload.documentId);
        break;
      case 'document.deleted':
        this.fireLegacy('document_deleted', event.payload.documentId);
        break;
      case 'project.loaded':
        this.fireLegacy('project_loaded', event.payload.projectId);
        break;
      case 'project.saved':
        this.fireLegacy('project_saved', event.payload.projectId);
        break;
      case 'project.created':
        this.fireLegacy('project_created', event.payload.projectId);
        break;
      case 'project.closed':
        this.fireLegacy('project_closed');
        break;
      case 'ui.theme.changed':
        this.fireLegacy('ui_theme_changed', event.payload.themeName);
        break;
      case 'ui.state.changed':
        this.fireLegacy('ui_state_changed', event.payload.stateKey, event.payload.stateValue);
        break;
      case 'error.occurred':
        this.fireLegacy('error_occurred', event.payload.errorType, event.payload.errorMessage);
        break;
      case 'component.registered':
      case 'component.unregistered':
      case 'component.state.changed':
      case 'component.error':
      case 'custom':
        break;
      default: {
        const unhandled: never = event;
        this.logger.warn('No legacy mapping for event', unhandled);
      }
    }

    this.fireLegacy('event_emitted', event);
  }

  private fireLegacy<C extends LegacyChannel>(channel: C, ...args: LegacyChannels[C]): void {
    for (const listener of [...this.legacy[channel]]) {
      this.invoke(channel, () => listener(...args));
    }
  }

  private invoke(eventType: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error(`Error in event handler for ${eventType}:`, error);
    }
  }

  private addEntry<K extends EventType>(
    table: HandlerTable,
    eventType: K,
    handler: EventHandler<EventOfType<K>>,
    filter: EventFilter | null,
    kind: 'direct' | 'filtered'
  ): HandlerSubscription {
    // Unfiltered registration is idempotent per (type, handler)
    const existing =
      kind === 'direct' ? table[eventType].find((entry) => entry.ref.deref() === handler) : undefined;
    const id = existing?.id ?? generateSubscriptionId();
    if (!existing) {
      const entry: HandlerEntry<K> = { id, ref: new WeakRef(handler), filter };
      table[eventType].push(entry);
      this.finalizer.register(handler, id, entry);
    }

    return {
      id,
      eventType,
      kind,
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  private removeEntry<K extends EventType>(
    entries: HandlerEntry<K>[],
    handler: EventHandler<EventOfType<K>>
  ): boolean {
    let removed = false;
    for (let index = entries.length - 1; index >= 0; index--) {
      const entry = entries[index];
      if (entry && entry.ref.deref() === handler) {
        entries.splice(index, 1);
        this.finalizer.unregister(entry);
        removed = true;
      }
    }
    return removed;
  }

  private removeSubscription(subscriptionId: string): boolean {
    for (const table of [this.unfiltered, this.filtered]) {
      for (const eventType of Object.keys(table)) {
        if (isHandlerKey(table, eventType) && this.spliceById(table[eventType], subscriptionId)) {
          return true;
        }
      }
    }
    return this.spliceById(this.patterns, subscriptionId);
  }

  private spliceById(entries: { id: string }[], subscriptionId: string): boolean {
    const index = entries.findIndex((entry) => entry.id === subscriptionId);
    if (index === -1) {
      return false;
    }
    const [removed] = entries.splice(index, 1);
    if (removed) {
      this.finalizer.unregister(removed);
    }
    return true;
  }

  private allEntries(): { id: string }[] {
    const entries: { id: string }[] = [...this.patterns];
    for (const table of [this.unfiltered, this.filtered]) {
      for (const list of Object.values(table)) {
        entries.push(...list);
      }
    }
    return entries;
  }
}

function isHandlerKey(table: HandlerTable, key: string): key is EventType {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function withSource(event: AtelierEvent, source: string): AtelierEvent {
  const copy = { ...event, metadata: Object.freeze({ ...event.metadata, source }) };
  Object.freeze(copy);
  return copy;
}
