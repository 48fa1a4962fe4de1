/**
 * StateManager Unit Tests
 *
 * EARS Blocks:
 * - A: Flat state
 * - B: Nested state
 * - C: History, undo and redo
 * - D: Persistence
 * - E: Listeners
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EventBus } from '../event_bus/event_bus';
import type { ErrorOccurredEvent, UiStateChangedEvent } from '../event_bus/types';
import { MemoryStateSnapshotStore } from '../state_store/memory/memory_state_store';
import type { StateSnapshotStore } from '../state_store/state_store';
import { StatePersistenceError } from '../state_store/state_store.errors';
import type { JsonObject } from '../utils/json';
import { StateManager } from './state_manager';

describe('StateManager', () => {
  let bus: EventBus;
  let state: StateManager;

  beforeEach(() => {
    bus = new EventBus();
    state = new StateManager(bus);
  });

  afterEach(() => {
    bus.clearHandlers();
  });

  describe('Flat state (EARS-A)', () => {
    it('[EARS-A1] WHEN a value is set, THE SYSTEM SHALL return it and list its key', () => {
      state.set('theme', 'dark');

      expect(state.get('theme')).toBe('dark');
      expect(state.get('missing')).toBeUndefined();
      expect(state.get('missing', 'light')).toBe('light');
      expect(state.has('theme')).toBe(true);
      expect(state.keys()).toEqual(['theme']);
    });

    it('[EARS-A2] WHEN an equal value is set again, THE SYSTEM SHALL do nothing', () => {
      const listener = jest.fn();
      state.onStateChanged(listener);

      state.set('layout', { sidebar: true });
      state.set('layout', { sidebar: true });

      expect(listener).toHaveBeenCalledTimes(1);
      expect(state.getHistory()).toHaveLength(1);
    });

    it('[EARS-A8] WHEN an equal value with a different prototype is set, THE SYSTEM SHALL treat it as unchanged', () => {
      const listener = jest.fn();
      state.onStateChanged(listener);
      state.set('layout', { sidebar: true, panes: ['outline'] });

      const bare: JsonObject = { sidebar: true, panes: ['outline'] };
      Object.setPrototypeOf(bare, null);
      state.set('layout', bare);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(state.getHistory()).toHaveLength(1);
    });

    it('[EARS-A3] WHEN values are stored or read, THE SYSTEM SHALL copy them', () => {
      const recent = ['chapter-1'];
      state.set('recent', recent);
      recent.push('chapter-2');

      const read = state.get('recent');
      if (Array.isArray(read)) {
        read.push('chapter-3');
      }

      expect(state.get('recent')).toEqual(['chapter-1']);
    });

    it('[EARS-A4] WHEN a key is cleared, THE SYSTEM SHALL remove it and record a change to null', () => {
      state.set('theme', 'dark');
      state.clear('theme');
      state.clear('theme');

      expect(state.has('theme')).toBe(false);
      expect(state.getHistory().map((change) => [change.key, change.oldValue, change.newValue])).toEqual([
        ['theme', null, 'dark'],
        ['theme', 'dark', null],
      ]);
    });

    it('[EARS-A5] WHEN all state is cleared, THE SYSTEM SHALL notify and record every key', () => {
      const listener = jest.fn();
      state.set('theme', 'dark');
      state.set('font', 'serif');
      state.onStateChanged(listener);

      state.clearAll();

      expect(state.keys()).toEqual([]);
      expect(listener.mock.calls).toEqual([
        ['theme', null],
        ['font', null],
      ]);
      expect(state.getHistory()).toHaveLength(4);
    });

    it('[EARS-A6] WHEN a value changes, THE SYSTEM SHALL emit ui.state.changed on the bus', () => {
      const handler = jest.fn();
      bus.registerHandler('ui.state.changed', handler);

      state.set('theme', 'dark');

      const event: UiStateChangedEvent = handler.mock.calls[0][0];
      expect(event.payload).toEqual({ stateKey: 'theme', stateValue: 'dark' });
      expect(event.metadata.category).toBe('ui');
    });

    it('[EARS-A7] WHEN a snapshot is taken, THE SYSTEM SHALL return a detached copy of the tree', () => {
      state.set('theme', 'dark');
      state.setNested(['layout', 'sidebar'], true);

      const snapshot = state.snapshot();
      snapshot['theme'] = 'light';

      expect(state.snapshot()).toEqual({ theme: 'dark', layout: { sidebar: true } });
    });
  });

  describe('Nested state (EARS-B)', () => {
    it('[EARS-B1] WHEN a nested value is set, THE SYSTEM SHALL create the intermediate mappings', () => {
      state.setNested(['layout', 'sidebar', 'width'], 240);

      expect(state.get('layout')).toEqual({ sidebar: { width: 240 } });
      expect(state.getNested(['layout', 'sidebar', 'width'])).toBe(240);
    });

    it('[EARS-B2] WHEN an intermediate is not a mapping, THE SYSTEM SHALL replace it', () => {
      state.set('layout', 'compact');
      state.setNested(['layout', 'sidebar'], true);

      expect(state.get('layout')).toEqual({ sidebar: true });
    });

    it('[EARS-B3] WHEN a nested value is cleared, THE SYSTEM SHALL remove ancestors left empty and keep the others', () => {
      state.setNested(['a', 'b', 'c'], 1);
      state.setNested(['a', 'd'], 2);

      state.clearNested(['a', 'b', 'c']);
      expect(state.get('a')).toEqual({ d: 2 });

      state.clearNested(['a', 'd']);
      expect(state.has('a')).toBe(false);
    });

    it('[EARS-B4] WHEN the path is empty or missing, THE SYSTEM SHALL return the default and change nothing', () => {
      state.setNested([], 'ignored');
      state.clearNested([]);
      state.clearNested(['missing', 'leaf']);

      expect(state.getNested([], 'fallback')).toBe('fallback');
      expect(state.getNested(['missing', 'leaf'])).toBeUndefined();
      expect(state.keys()).toEqual([]);
      expect(state.getHistory()).toEqual([]);
    });

    it('[EARS-B5] WHEN a nested value changes, THE SYSTEM SHALL notify nested listeners and emit the dot-joined key', () => {
      const listener = jest.fn();
      const handler = jest.fn();
      state.onNestedStateChanged(listener);
      bus.registerHandler('ui.state.changed', handler);

      state.setNested(['layout', 'sidebar', 'width'], 240);

      expect(listener).toHaveBeenCalledWith(['layout', 'sidebar', 'width'], 240);
      const event: UiStateChangedEvent = handler.mock.calls[0][0];
      expect(event.payload).toEqual({ stateKey: 'layout.sidebar.width', stateValue: 240 });
    });

    it('[EARS-B6] WHEN a nested change is recorded, THE SYSTEM SHALL keep both the joined key and the path', () => {
      state.setNested(['layout', 'sidebar', 'width'], 240);

      const [change] = state.getHistory();
      expect(change).toMatchObject({
        key: 'layout.sidebar.width',
        path: ['layout', 'sidebar', 'width'],
        oldValue: null,
        newValue: 240,
      });
      expect(typeof change?.timestamp).toBe('number');
    });
  });

  describe('History, undo and redo (EARS-C)', () => {
    it('[EARS-C1] WHEN changes are undone and redone, THE SYSTEM SHALL restore each value in order', () => {
      state.set('count', 1);
      state.set('count', 2);

      expect(state.undo()).toBe(true);
      expect(state.get('count')).toBe(1);
      expect(state.undo()).toBe(true);
      expect(state.has('count')).toBe(false);
      expect(state.canUndo()).toBe(false);

      expect(state.redo()).toBe(true);
      expect(state.get('count')).toBe(1);
      expect(state.redo()).toBe(true);
      expect(state.get('count')).toBe(2);
      expect(state.canRedo()).toBe(false);
    });

    it('[EARS-C2] WHEN nothing can be undone or redone, THE SYSTEM SHALL return false', () => {
      expect(state.undo()).toBe(false);
      expect(state.redo()).toBe(false);
    });

    it('[EARS-C3] WHEN a new change is recorded, THE SYSTEM SHALL discard the redo stack', () => {
      state.set('a', 1);
      state.undo();
      expect(state.canRedo()).toBe(true);

      state.set('b', 1);

      expect(state.canRedo()).toBe(false);
    });

    it('[EARS-C4] WHEN a nested change is undone, THE SYSTEM SHALL clear the path and its empty ancestors', () => {
      state.setNested(['layout', 'sidebar', 'width'], 240);

      state.undo();
      expect(state.has('layout')).toBe(false);

      state.redo();
      expect(state.getNested(['layout', 'sidebar', 'width'])).toBe(240);
    });

    it('[EARS-C5] WHEN a flat key contains a dot, THE SYSTEM SHALL undo it as a flat key', () => {
      state.set('file.name', 'draft.md');

      state.undo();

      expect(state.has('file.name')).toBe(false);
      expect(state.has('file')).toBe(false);
    });

    it('[EARS-C6] WHEN more changes than the capacity are recorded, THE SYSTEM SHALL keep the most recent ones', () => {
      const small = new StateManager(bus, { maxHistorySize: 2 });
      small.set('count', 1);
      small.set('count', 2);
      small.set('count', 3);

      expect(small.getHistory().map((change) => change.newValue)).toEqual([2, 3]);
    });

    it('[EARS-C7] WHEN undoing, THE SYSTEM SHALL not record the reverting change', () => {
      state.set('count', 1);
      state.set('count', 2);

      state.undo();

      expect(state.getHistory().map((change) => change.newValue)).toEqual([1]);
    });

    it('[EARS-C8] WHEN history is disabled or untracked writes are made, THE SYSTEM SHALL record nothing', () => {
      state.enableHistory(false);
      state.set('theme', 'dark');
      expect(state.isHistoryEnabled()).toBe(false);

      state.enableHistory(true);
      state.set('font', 'serif', false);

      expect(state.getHistory()).toEqual([]);
    });

    it('[EARS-C9] WHEN a key is excluded from history, THE SYSTEM SHALL skip it and its nested paths until included again', () => {
      state.excludeFromHistory('selection');
      state.set('selection', 'chapter-1');
      state.setNested(['selection', 'range'], [0, 4]);
      expect(state.getHistory()).toEqual([]);

      state.includeInHistory('selection');
      state.set('selection', 'chapter-2');

      expect(state.getHistory().map((change) => change.key)).toEqual(['selection']);
    });

    it('[EARS-C10] WHEN history is cleared, THE SYSTEM SHALL empty both stacks', () => {
      state.set('a', 1);
      state.set('a', 2);
      state.undo();

      state.clearHistory();

      expect(state.canUndo()).toBe(false);
      expect(state.canRedo()).toBe(false);
    });

    it('[EARS-C11] WHEN a recorded value is mutated by the caller, THE SYSTEM SHALL keep its own copy', () => {
      state.set('layout', { sidebar: true });

      const [change] = state.getHistory();
      const newValue = change?.newValue;
      if (newValue && typeof newValue === 'object' && !Array.isArray(newValue)) {
        newValue['sidebar'] = false;
      }

      expect(state.getHistory()[0]?.newValue).toEqual({ sidebar: true });
    });
  });

  describe('Persistence (EARS-D)', () => {
    let store: MemoryStateSnapshotStore;

    beforeEach(() => {
      store = new MemoryStateSnapshotStore();
      state.setSnapshotStore(store);
    });

    it('[EARS-D1] WHEN a persistent key changes, THE SYSTEM SHALL save the snapshot; other keys SHALL not trigger saves', () => {
      state.markAsPersistent('theme');

      state.set('theme', 'dark');
      state.set('selection', 'chapter-1');

      expect(store.getSnapshot()).toEqual({ theme: 'dark' });
      expect(store.saveCount()).toBe(1);
    });

    it('[EARS-D2] WHEN saving, THE SYSTEM SHALL write every persistent key that has a value', () => {
      state.markAsPersistent('theme');
      state.markAsPersistent('font');
      state.markAsPersistent('unset');

      state.set('theme', 'dark');
      state.set('font', 'serif');

      expect(store.getSnapshot()).toEqual({ theme: 'dark', font: 'serif' });
      expect(state.getPersistentKeys()).toEqual(['theme', 'font', 'unset']);
    });

    it('[EARS-D3] WHEN a nested value under a persistent key changes, THE SYSTEM SHALL save the snapshot', () => {
      state.markAsPersistent('prefs');

      state.setNested(['prefs', 'autosave'], true);

      expect(store.getSnapshot()).toEqual({ prefs: { autosave: true } });
    });

    it('[EARS-D4] WHEN a change to a persistent key is undone, THE SYSTEM SHALL save the reverted value', () => {
      state.markAsPersistent('theme');
      state.set('theme', 'dark');
      state.set('theme', 'light');

      state.undo();

      expect(store.getSnapshot()).toEqual({ theme: 'dark' });
    });

    it('[EARS-D5] WHEN persistent state is loaded, THE SYSTEM SHALL apply it without history or saves', () => {
      state.markAsPersistent('theme');
      store.setSnapshot({ theme: 'dark', recent: ['chapter-1'] });

      expect(state.loadPersistentState()).toBe(true);

      expect(state.get('theme')).toBe('dark');
      expect(state.get('recent')).toEqual(['chapter-1']);
      expect(state.canUndo()).toBe(false);
      expect(store.saveCount()).toBe(0);
    });

    it('[EARS-D6] WHEN there is no snapshot or no store, THE SYSTEM SHALL return false', () => {
      expect(state.loadPersistentState()).toBe(false);
      expect(new StateManager(bus).loadPersistentState()).toBe(false);
    });

    it('[EARS-D7] WHEN saving fails, THE SYSTEM SHALL keep the value, not throw, and emit error.occurred', () => {
      const failing: StateSnapshotStore = {
        load: () => null,
        save: () => {
          throw new StatePersistenceError('disk full', 'WRITE_ERROR', '/tmp/state.json');
        },
        location: () => '/tmp/state.json',
      };
      const handler = jest.fn();
      bus.registerHandler('error.occurred', handler);
      state.setSnapshotStore(failing);
      state.markAsPersistent('theme');

      expect(() => state.set('theme', 'dark')).not.toThrow();

      expect(state.get('theme')).toBe('dark');
      const event: ErrorOccurredEvent = handler.mock.calls[0][0];
      expect(event.payload).toEqual({
        errorType: 'StatePersistenceError',
        errorMessage: 'disk full',
        context: '/tmp/state.json',
      });
    });

    it('[EARS-D8] WHEN the stored snapshot is unreadable, THE SYSTEM SHALL return false and emit error.occurred', () => {
      const broken: StateSnapshotStore = {
        load: () => {
          throw new StatePersistenceError('Invalid JSON', 'READ_ERROR', '/tmp/state.json');
        },
        save: () => undefined,
        location: () => '/tmp/state.json',
      };
      const handler = jest.fn();
      bus.registerHandler('error.occurred', handler);
      state.setSnapshotStore(broken);

      expect(state.loadPersistentState()).toBe(false);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('[EARS-D9] WHEN a key is unmarked, THE SYSTEM SHALL stop saving its changes', () => {
      const configured = new StateManager(bus, { persistentKeys: ['theme'], snapshotStore: store });
      configured.unmarkAsPersistent('theme');

      configured.set('theme', 'dark');

      expect(configured.getPersistentKeys()).toEqual([]);
      expect(store.saveCount()).toBe(0);
    });

    it('[EARS-D10] WHEN a persistence path is set, THE SYSTEM SHALL write the snapshot to that file', () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'atelier-state-manager-'));
      try {
        const filePath = path.join(tempDir, 'nested', 'state.json');
        state.setPersistencePath(filePath);
        state.markAsPersistent('theme');

        state.set('sidebarWidth', 240);
        state.set('theme', 'dark');

        expect(fs.readFileSync(filePath, 'utf-8')).toBe('{\n  "theme": "dark"\n}');

        const reloaded = new StateManager(bus);
        reloaded.setPersistencePath(filePath);
        expect(reloaded.loadPersistentState()).toBe(true);
        expect(reloaded.get('theme')).toBe('dark');
        expect(reloaded.has('sidebarWidth')).toBe(false);
        expect(reloaded.keys()).toEqual(['theme']);
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });
  });

  describe('Listeners (EARS-E)', () => {
    it('[EARS-E1] WHEN a listener unsubscribes, THE SYSTEM SHALL stop notifying it', () => {
      const listener = jest.fn();
      const unsubscribe = state.onStateChanged(listener);

      state.set('a', 1);
      unsubscribe();
      state.set('a', 2);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('[EARS-E2] WHEN a listener throws, THE SYSTEM SHALL still notify the others and apply the change', () => {
      const failing = jest.fn(() => {
        throw new Error('listener failure');
      });
      const healthy = jest.fn();
      state.onStateChanged(failing);
      state.onStateChanged(healthy);

      expect(() => state.set('a', 1)).not.toThrow();

      expect(healthy).toHaveBeenCalledWith('a', 1);
      expect(state.get('a')).toBe(1);
    });
  });
});
