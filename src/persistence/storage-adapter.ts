/**
 * Storage adapter interface for state persistence
 * Supports versioned snapshots of dialog state variables
 */

import type { StateVariables } from '../schema/state-schema';

/**
 * Snapshot of the state variables of a dialog at a point in time
 */
export interface StateSnapshot {
  /** Dialog key, `channelName:userId` */
  dialogId: string;
  /** Version number (increments with each save) */
  version: number;
  /** Timestamp when snapshot was created */
  timestamp: Date;
  /** State variables after the turn */
  state: StateVariables;
}

/**
 * Abstract storage adapter interface
 * Implement this interface to create custom storage backends
 */
export abstract class StorageAdapter {
  /**
   * Save a new snapshot version for a dialog
   */
  abstract saveSnapshot(snapshot: StateSnapshot): Promise<void>;

  /**
   * Load a specific snapshot version or the latest if version not specified
   * @returns The snapshot or null if not found
   */
  abstract loadSnapshot(
    dialogId: string,
    version?: number
  ): Promise<StateSnapshot | null>;

  /**
   * Load the history of snapshots for a dialog
   * @param limit Optional limit on number of versions to return
   * @returns Snapshots ordered by version (newest first)
   */
  abstract loadHistory(
    dialogId: string,
    limit?: number
  ): Promise<StateSnapshot[]>;

  /**
   * Delete all snapshots for a dialog
   */
  abstract deleteDialog(dialogId: string): Promise<void>;

  /**
   * Prune old snapshots, keeping only the most recent N versions
   */
  abstract pruneHistory(dialogId: string, keepLast: number): Promise<void>;

  abstract getSnapshotCount(dialogId: string): Promise<number>;

  /**
   * Check if a dialog has at least one snapshot
   */
  abstract dialogExists(dialogId: string): Promise<boolean>;
}
