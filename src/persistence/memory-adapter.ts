/**
 * In-memory storage adapter for development and testing
 * Stores all snapshots in memory (data is lost when process ends)
 */

import { StorageAdapter, StateSnapshot } from './storage-adapter';

/**
 * Copy a snapshot so that later changes of the live state variables
 * do not leak into the stored history
 */
function copySnapshot(snapshot: StateSnapshot): StateSnapshot {
  return {
    ...snapshot,
    timestamp: new Date(snapshot.timestamp),
    state: structuredClone(snapshot.state),
  };
}

/**
 * Memory-based storage adapter
 * All data stored in a Map, lost when process ends
 */
export class MemoryStorageAdapter extends StorageAdapter {
  private storage: Map<string, StateSnapshot[]> = new Map();

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    const dialogSnapshots = this.storage.get(snapshot.dialogId) ?? [];
    dialogSnapshots.push(copySnapshot(snapshot));
    this.storage.set(snapshot.dialogId, dialogSnapshots);
  }

  async loadSnapshot(
    dialogId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const dialogSnapshots = this.storage.get(dialogId);
    if (!dialogSnapshots || dialogSnapshots.length === 0) {
      return null;
    }

    if (version !== undefined) {
      const snapshot = dialogSnapshots.find((s) => s.version === version);
      return snapshot ? copySnapshot(snapshot) : null;
    }

    const latest = dialogSnapshots.reduce((a, b) =>
      b.version > a.version ? b : a
    );
    return copySnapshot(latest);
  }

  async loadHistory(dialogId: string, limit?: number): Promise<StateSnapshot[]> {
    const dialogSnapshots = this.storage.get(dialogId) ?? [];

    // Newest first
    const sorted = [...dialogSnapshots].sort((a, b) => b.version - a.version);
    const limited =
      limit !== undefined && limit > 0 ? sorted.slice(0, limit) : sorted;
    return limited.map(copySnapshot);
  }

  async deleteDialog(dialogId: string): Promise<void> {
    this.storage.delete(dialogId);
  }

  async pruneHistory(dialogId: string, keepLast: number): Promise<void> {
    const dialogSnapshots = this.storage.get(dialogId);
    if (!dialogSnapshots || dialogSnapshots.length <= keepLast) {
      return;
    }

    const sorted = [...dialogSnapshots].sort((a, b) => b.version - a.version);
    this.storage.set(dialogId, sorted.slice(0, keepLast).reverse());
  }

  async getSnapshotCount(dialogId: string): Promise<number> {
    return this.storage.get(dialogId)?.length ?? 0;
  }

  async dialogExists(dialogId: string): Promise<boolean> {
    return (await this.getSnapshotCount(dialogId)) > 0;
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.storage.clear();
  }

  getAllDialogIds(): string[] {
    return Array.from(this.storage.keys());
  }
}
