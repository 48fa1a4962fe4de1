import { MemoryStateSnapshotStore } from './memory_state_store';

describe('MemoryStateSnapshotStore', () => {
  it('[EARS-A1] WHEN nothing has been saved, THE SYSTEM SHALL load null', () => {
    const store = new MemoryStateSnapshotStore();

    expect(store.load()).toBeNull();
    expect(store.location()).toBe('memory');
  });

  it('[EARS-A2] WHEN a snapshot is saved, THE SYSTEM SHALL keep a copy detached from the caller', () => {
    const store = new MemoryStateSnapshotStore();
    const snapshot = { recent: ['chapter-1'] };

    store.save(snapshot);
    snapshot.recent.push('chapter-2');

    expect(store.getSnapshot()).toEqual({ recent: ['chapter-1'] });
    expect(store.saveCount()).toBe(1);
  });

  it('[EARS-A3] WHEN a snapshot is loaded, THE SYSTEM SHALL return a copy', () => {
    const store = new MemoryStateSnapshotStore();
    store.setSnapshot({ theme: 'dark' });

    const loaded = store.load();
    if (loaded) {
      loaded['theme'] = 'light';
    }

    expect(store.load()).toEqual({ theme: 'dark' });
  });

  it('[EARS-A4] WHEN cleared, THE SYSTEM SHALL drop the snapshot and reset the save count', () => {
    const store = new MemoryStateSnapshotStore();
    store.save({ theme: 'dark' });

    store.clear();

    expect(store.getSnapshot()).toBeNull();
    expect(store.saveCount()).toBe(0);
  });
});
