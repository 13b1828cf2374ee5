/**
 * Versioned state variables of dialogs, kept in a storage adapter
 */

import {
  StateVariables,
  createEmptyState,
  parseStateVariables,
} from './schema/state-schema';
import { InvalidStateError } from './errors';
import { logger } from './logger';
import { StorageAdapter, StateSnapshot } from './persistence/storage-adapter';
import { MemoryStorageAdapter } from './persistence/memory-adapter';

/**
 * Loads and saves the state variables of dialogs
 *
 * Every save adds a snapshot with the next version number, so the
 * history of a dialog can be inspected and pruned.
 */
export class StateTracker {
  private readonly adapter: StorageAdapter;
  private readonly versionCounters: Map<string, number> = new Map();

  /**
   * @param adapter Storage adapter to use (defaults to in-memory)
   */
  constructor(adapter?: StorageAdapter) {
    this.adapter = adapter ?? new MemoryStorageAdapter();
  }

  /**
   * Load state variables of the latest or a specific version
   *
   * A stored snapshot that does not validate is logged and replaced by
   * empty state variables.
   *
   * @returns empty state variables when the dialog has no snapshots
   */
  async load(dialogId: string, version?: number): Promise<StateVariables> {
    let snapshot: StateSnapshot | null;
    try {
      snapshot = await this.adapter.loadSnapshot(dialogId, version);
    } catch (error) {
      if (!(error instanceof InvalidStateError)) {
        throw error;
      }
      logger.warn({
        event: 'invalid_state',
        dialog: dialogId,
        version: error.version,
        error: error.message,
      });
      if (version === undefined) {
        this.trackVersion(dialogId, error.version);
      }
      return createEmptyState();
    }
    if (!snapshot) {
      return createEmptyState();
    }
    if (version === undefined) {
      this.trackVersion(dialogId, snapshot.version);
    }
    return parseStateVariables(snapshot.state);
  }

  /**
   * Save state variables as a new snapshot
   *
   * @returns the version of the snapshot
   */
  async save(dialogId: string, state: StateVariables): Promise<number> {
    if (!this.versionCounters.has(dialogId)) {
      // Picks up the latest stored version
      await this.load(dialogId);
    }
    const version = (this.versionCounters.get(dialogId) ?? 0) + 1;
    this.versionCounters.set(dialogId, version);

    await this.adapter.saveSnapshot({
      dialogId,
      version,
      timestamp: new Date(),
      state,
    });
    return version;
  }

  /**
   * Snapshots of the dialog, newest first
   */
  async getHistory(dialogId: string, limit?: number): Promise<StateSnapshot[]> {
    return this.adapter.loadHistory(dialogId, limit);
  }

  /**
   * Keep only the most recent snapshots of the dialog
   */
  async pruneHistory(dialogId: string, keepLast: number): Promise<void> {
    await this.adapter.pruneHistory(dialogId, keepLast);
  }

  async delete(dialogId: string): Promise<void> {
    await this.adapter.deleteDialog(dialogId);
    this.versionCounters.delete(dialogId);
  }

  async exists(dialogId: string): Promise<boolean> {
    return this.adapter.dialogExists(dialogId);
  }

  async getSnapshotCount(dialogId: string): Promise<number> {
    return this.adapter.getSnapshotCount(dialogId);
  }

  getAdapter(): StorageAdapter {
    return this.adapter;
  }

  private trackVersion(dialogId: string, version: number): void {
    const current = this.versionCounters.get(dialogId) ?? 0;
    this.versionCounters.set(dialogId, Math.max(current, version));
  }
}
