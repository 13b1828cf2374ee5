import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import { MongoStorageAdapter } from '../src/persistence/mongo-adapter';
import type {
  StateSnapshot,
  StorageAdapter,
} from '../src/persistence/storage-adapter';
import { createEmptyState } from '../src/schema/state-schema';
import { FakeSnapshotCollection } from './fake-collection';

function snapshot(dialogId: string, version: number): StateSnapshot {
  return {
    dialogId,
    version,
    timestamp: new Date(Date.UTC(2024, 0, version)),
    state: {
      user: {},
      slots: { version },
      components: {},
    },
  };
}

const adapters: [string, () => StorageAdapter][] = [
  ['MemoryStorageAdapter', () => new MemoryStorageAdapter()],
  [
    'MongoStorageAdapter',
    () =>
      new MongoStorageAdapter(
        { uri: 'mongodb://localhost:27017', database: 'test' },
        new FakeSnapshotCollection()
      ),
  ],
];

describe.each(adapters)('%s', (_name, createAdapter) => {
  let adapter: StorageAdapter;

  beforeEach(async () => {
    adapter = createAdapter();
    for (const version of [1, 2, 3]) {
      await adapter.saveSnapshot(snapshot('chat:1', version));
    }
    await adapter.saveSnapshot(snapshot('chat:2', 1));
  });

  it('should load the latest snapshot', async () => {
    expect(await adapter.loadSnapshot('chat:1')).toEqual(snapshot('chat:1', 3));
  });

  it('should load a specific version', async () => {
    expect(await adapter.loadSnapshot('chat:1', 2)).toEqual(
      snapshot('chat:1', 2)
    );
    expect(await adapter.loadSnapshot('chat:1', 9)).toBeNull();
    expect(await adapter.loadSnapshot('chat:9')).toBeNull();
  });

  it('should load the history newest first', async () => {
    const history = await adapter.loadHistory('chat:1');
    expect(history.map((s) => s.version)).toEqual([3, 2, 1]);

    const limited = await adapter.loadHistory('chat:1', 2);
    expect(limited.map((s) => s.version)).toEqual([3, 2]);
  });

  it('should prune old snapshots', async () => {
    await adapter.pruneHistory('chat:1', 1);

    expect(await adapter.getSnapshotCount('chat:1')).toBe(1);
    expect((await adapter.loadSnapshot('chat:1'))?.version).toBe(3);
    expect(await adapter.getSnapshotCount('chat:2')).toBe(1);
  });

  it('should delete all snapshots of a dialog', async () => {
    expect(await adapter.dialogExists('chat:1')).toBe(true);

    await adapter.deleteDialog('chat:1');

    expect(await adapter.dialogExists('chat:1')).toBe(false);
    expect(await adapter.getSnapshotCount('chat:1')).toBe(0);
    expect(await adapter.dialogExists('chat:2')).toBe(true);
  });

  it('should not share stored state with the caller', async () => {
    const saved = snapshot('chat:3', 1);
    await adapter.saveSnapshot(saved);
    saved.state.slots.version = 100;

    const loaded = await adapter.loadSnapshot('chat:3');
    expect(loaded?.state.slots).toEqual({ version: 1 });
  });
});

describe('MemoryStorageAdapter', () => {
  it('should list and clear dialogs', async () => {
    const adapter = new MemoryStorageAdapter();
    await adapter.saveSnapshot(snapshot('chat:1', 1));
    await adapter.saveSnapshot(snapshot('chat:2', 1));

    expect(adapter.getAllDialogIds()).toEqual(['chat:1', 'chat:2']);

    adapter.clearAll();

    expect(adapter.getAllDialogIds()).toEqual([]);
    expect(await adapter.dialogExists('chat:1')).toBe(false);
  });
});

describe('MongoStorageAdapter', () => {
  it('should store snapshots with a unique id', async () => {
    const collection = new FakeSnapshotCollection();
    const adapter = new MongoStorageAdapter(
      { uri: 'mongodb://localhost:27017', database: 'test' },
      collection
    );

    await adapter.saveSnapshot(snapshot('chat:1', 1));

    expect(collection.docs.map((d) => d._id)).toEqual(['chat:1_v1']);
    await expect(adapter.saveSnapshot(snapshot('chat:1', 1))).rejects.toThrow(
      'duplicate key'
    );
  });

  it('should reject an invalid stored state', async () => {
    const collection = new FakeSnapshotCollection();
    const adapter = new MongoStorageAdapter(
      { uri: 'mongodb://localhost:27017', database: 'test' },
      collection
    );
    collection.docs.push({
      _id: 'chat:1_v1',
      dialogId: 'chat:1',
      version: 1,
      timestamp: new Date(),
      state: { slots: 'oops' },
    });

    await expect(adapter.loadSnapshot('chat:1')).rejects.toThrow(
      'Invalid state variables: slots: Expected object, received string'
    );
  });

  it('should fill in missing state variables', async () => {
    const collection = new FakeSnapshotCollection();
    const adapter = new MongoStorageAdapter(
      { uri: 'mongodb://localhost:27017', database: 'test' },
      collection
    );
    collection.docs.push({
      _id: 'chat:1_v1',
      dialogId: 'chat:1',
      version: 1,
      timestamp: new Date(),
      state: { user: { name: 'Ann' } },
    });

    const loaded = await adapter.loadSnapshot('chat:1');

    expect(loaded?.state).toEqual({
      ...createEmptyState(),
      user: { name: 'Ann' },
    });
  });

  it('should require a connection', async () => {
    const adapter = new MongoStorageAdapter({
      uri: 'mongodb://localhost:27017',
      database: 'test',
    });

    expect(adapter.isConnected).toBe(false);
    await expect(adapter.loadSnapshot('chat:1')).rejects.toThrow(
      'MongoStorageAdapter is not connected. Call connect() first.'
    );
  });

  it('should not connect when a collection is given', async () => {
    const collection = new FakeSnapshotCollection();
    const adapter = new MongoStorageAdapter(
      { uri: 'mongodb://localhost:27017', database: 'test' },
      collection
    );

    await adapter.connect();

    expect(adapter.isConnected).toBe(true);
    expect(collection.indexes).toEqual([]);
  });
});
