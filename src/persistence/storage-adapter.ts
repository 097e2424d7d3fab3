/**
 * Storage adapter interface for checkpoint persistence
 * Supports versioned snapshots of workflow state and tracker
 */

import type { Tracker } from '../types/graph.types';

/**
 * Snapshot of a session's graph execution at a point in time
 */
export interface StateSnapshot<T = unknown> {
  /** Session (client) identifier */
  sessionId: string;
  /** Version number (increments with each save) */
  version: number;
  /** Timestamp when snapshot was created */
  timestamp: Date;
  /** Workflow state data */
  state: T;
  /** Internal execution tracker */
  tracker: Tracker;
}

/**
 * Abstract storage adapter interface
 * Implement this interface to create custom storage backends
 */
export abstract class StorageAdapter {
  /**
   * Save a new snapshot version for a session
   */
  abstract saveSnapshot(snapshot: StateSnapshot): Promise<void>;

  /**
   * Load a specific snapshot version or the latest if version not specified
   * @returns The snapshot or null if not found
   */
  abstract loadSnapshot(
    sessionId: string,
    version?: number
  ): Promise<StateSnapshot | null>;

  /**
   * Load the history of snapshots for a session
   * @param limit Optional limit on number of versions to return
   * @returns Snapshots ordered by version (newest first)
   */
  abstract loadHistory(
    sessionId: string,
    limit?: number
  ): Promise<StateSnapshot[]>;

  /**
   * Delete all snapshots for a session
   */
  abstract deleteSession(sessionId: string): Promise<void>;

  /**
   * Prune old snapshots, keeping only the most recent N versions
   */
  abstract pruneHistory(sessionId: string, keepLast: number): Promise<void>;

  /**
   * Get the total number of snapshots for a session
   */
  abstract getSnapshotCount(sessionId: string): Promise<number>;

  /**
   * Check if a session has at least one snapshot
   */
  abstract sessionExists(sessionId: string): Promise<boolean>;
}
