/**
 * MongoDB storage adapter for persistent state management
 */

import type { Collection, MongoClient } from 'mongodb';
import { StorageAdapter, StateSnapshot } from './storage-adapter';
import { FlowError, describeError } from '../errors';
import { logger } from '../logger';
import { parseStateVariables } from '../schema/state-schema';

/**
 * MongoDB configuration options
 */
export interface MongoStorageOptions {
  /** MongoDB connection URI */
  uri: string;
  /** Database name */
  database: string;
  /** Collection name for snapshots (defaults to 'dialog_state_snapshots') */
  collection?: string;
}

export type SnapshotDocument = {
  _id: string;
  dialogId: string;
  version: number;
  timestamp: Date;
  state: unknown;
};

type SnapshotFilter = {
  dialogId: string;
  version?: number | { $in: number[] };
};

type SortByVersion = { sort?: { version: 1 | -1 } };

/**
 * The part of a MongoDB collection used by the adapter
 */
export interface SnapshotCollection {
  insertOne(doc: SnapshotDocument): Promise<unknown>;
  findOne(
    filter: SnapshotFilter,
    options?: SortByVersion
  ): Promise<SnapshotDocument | null>;
  find(
    filter: SnapshotFilter,
    options?: SortByVersion & { limit?: number }
  ): { toArray(): Promise<SnapshotDocument[]> };
  deleteMany(filter: SnapshotFilter): Promise<unknown>;
  countDocuments(
    filter: SnapshotFilter,
    options?: { limit?: number }
  ): Promise<number>;
  createIndex(spec: Record<string, 1 | -1>): Promise<unknown>;
}

function wrapCollection(
  collection: Collection<SnapshotDocument>
): SnapshotCollection {
  return {
    insertOne: (doc) => collection.insertOne(doc),
    findOne: (filter, options) => collection.findOne(filter, options),
    find: (filter, options) => collection.find(filter, options),
    deleteMany: (filter) => collection.deleteMany(filter),
    countDocuments: (filter, options) =>
      collection.countDocuments(filter, options),
    createIndex: (spec) => collection.createIndex(spec),
  };
}

function toSnapshot(doc: SnapshotDocument): StateSnapshot {
  return {
    dialogId: doc.dialogId,
    version: doc.version,
    timestamp: new Date(doc.timestamp),
    state: parseStateVariables(doc.state, doc),
  };
}

/**
 * MongoDB-based storage adapter
 * Persists snapshots to MongoDB for production use
 */
export class MongoStorageAdapter extends StorageAdapter {
  private client: MongoClient | null = null;
  private collection: SnapshotCollection | null;
  private readonly options: Required<MongoStorageOptions>;

  /**
   * @param collection - use this collection instead of connecting,
   *   `connect()` then does nothing
   */
  constructor(options: MongoStorageOptions, collection?: SnapshotCollection) {
    super();
    this.options = {
      ...options,
      collection: options.collection ?? 'dialog_state_snapshots',
    };
    this.collection = collection ?? null;
  }

  get isConnected(): boolean {
    return this.collection !== null;
  }

  /**
   * Connect to MongoDB
   * Must be called before using the adapter
   */
  async connect(): Promise<void> {
    if (this.collection) {
      return;
    }

    try {
      // Loaded on demand so that the memory adapter works without a driver
      const { MongoClient } = await import('mongodb');

      const client = new MongoClient(this.options.uri);
      await client.connect();
      const collection = wrapCollection(
        client
          .db(this.options.database)
          .collection<SnapshotDocument>(this.options.collection)
      );

      await collection.createIndex({ dialogId: 1, version: -1 });

      this.client = client;
      this.collection = collection;
      logger.info({
        event: 'mongo_connected',
        database: this.options.database,
        collection: this.options.collection,
      });
    } catch (error) {
      throw new FlowError(
        `Failed to connect to MongoDB: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Disconnect from MongoDB
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.collection = null;
    }
  }

  private getCollection(): SnapshotCollection {
    if (!this.collection) {
      throw new FlowError(
        'MongoStorageAdapter is not connected. Call connect() first.'
      );
    }
    return this.collection;
  }

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    await this.getCollection().insertOne({
      _id: `${snapshot.dialogId}_v${snapshot.version}`,
      dialogId: snapshot.dialogId,
      version: snapshot.version,
      timestamp: new Date(snapshot.timestamp),
      state: snapshot.state,
    });
  }

  async loadSnapshot(
    dialogId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const filter: SnapshotFilter = { dialogId };
    if (version !== undefined) {
      filter.version = version;
    }

    // Latest first when no version is given
    const doc = await this.getCollection().findOne(filter, {
      sort: { version: -1 },
    });
    return doc ? toSnapshot(doc) : null;
  }

  async loadHistory(dialogId: string, limit?: number): Promise<StateSnapshot[]> {
    const docs = await this.getCollection()
      .find(
        { dialogId },
        {
          sort: { version: -1 },
          limit: limit ?? 0, // 0 means no limit
        }
      )
      .toArray();
    return docs.map(toSnapshot);
  }

  async deleteDialog(dialogId: string): Promise<void> {
    await this.getCollection().deleteMany({ dialogId });
  }

  async pruneHistory(dialogId: string, keepLast: number): Promise<void> {
    const collection = this.getCollection();
    const docs = await collection
      .find({ dialogId }, { sort: { version: -1 } })
      .toArray();
    if (docs.length <= keepLast) {
      return;
    }

    const versionsToDelete = docs.slice(keepLast).map((d) => d.version);
    await collection.deleteMany({
      dialogId,
      version: { $in: versionsToDelete },
    });
  }

  async getSnapshotCount(dialogId: string): Promise<number> {
    return this.getCollection().countDocuments({ dialogId });
  }

  async dialogExists(dialogId: string): Promise<boolean> {
    const count = await this.getCollection().countDocuments(
      { dialogId },
      { limit: 1 }
    );
    return count > 0;
  }
}
