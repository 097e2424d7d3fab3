/**
 * Checkpoint store for versioned session state and tracker persistence
 * Wraps a storage adapter and validates every snapshot it hands back
 */

import { InvariantViolationError } from './errors';
import { MemoryStorageAdapter } from './persistence/memory-adapter';
import type { StateSnapshot, StorageAdapter } from './persistence/storage-adapter';
import { parseState, type InferState, type StateSchema } from './schema/state-schema';
import { TrackerSchema } from './schema/tracker-schema';
import type { Tracker } from './types/graph.types';

export type CheckpointStoreOptions = {
  /** Keep at most this many versions per session; older ones are pruned */
  maxHistory?: number;
};

/**
 * Versioned checkpoints for the sessions of one workflow schema
 */
export class CheckpointStore<S extends StateSchema> {
  private readonly adapter: StorageAdapter;
  private readonly maxHistory?: number;
  private readonly versionCounters: Map<string, number> = new Map();

  /**
   * @param schema Schema every loaded state is parsed against
   * @param adapter Storage adapter to use (defaults to in-memory)
   */
  constructor(
    private readonly schema: S,
    adapter?: StorageAdapter,
    options: CheckpointStoreOptions = {}
  ) {
    this.adapter = adapter || new MemoryStorageAdapter();
    this.maxHistory = options.maxHistory;
  }

  /**
   * Save a new checkpoint for a session
   * Automatically increments the version number
   */
  async save(
    sessionId: string,
    state: InferState<S>,
    tracker: Tracker
  ): Promise<number> {
    const newVersion = (this.versionCounters.get(sessionId) || 0) + 1;
    this.versionCounters.set(sessionId, newVersion);

    await this.adapter.saveSnapshot({
      sessionId,
      version: newVersion,
      timestamp: new Date(),
      state,
      tracker,
    });

    if (this.maxHistory !== undefined && newVersion > this.maxHistory) {
      await this.adapter.pruneHistory(sessionId, this.maxHistory);
    }

    return newVersion;
  }

  /**
   * Load a specific checkpoint version or the latest
   * @throws InvariantViolationError if the stored snapshot no longer parses
   */
  async load(
    sessionId: string,
    version?: number
  ): Promise<StateSnapshot<InferState<S>> | null> {
    const snapshot = await this.adapter.loadSnapshot(sessionId, version);
    if (!snapshot) {
      return null;
    }

    const currentMax = this.versionCounters.get(sessionId) || 0;
    this.versionCounters.set(sessionId, Math.max(currentMax, snapshot.version));

    return this.validate(snapshot);
  }

  /**
   * Get the history of checkpoints for a session, newest first
   */
  async getHistory(
    sessionId: string,
    limit?: number
  ): Promise<StateSnapshot<InferState<S>>[]> {
    const history = await this.adapter.loadHistory(sessionId, limit);
    return history.map((snapshot) => this.validate(snapshot));
  }

  /**
   * Delete all checkpoints for a session
   */
  async delete(sessionId: string): Promise<void> {
    await this.adapter.deleteSession(sessionId);
    this.versionCounters.delete(sessionId);
  }

  /**
   * Get the number of checkpoints stored for a session
   */
  async getSnapshotCount(sessionId: string): Promise<number> {
    return await this.adapter.getSnapshotCount(sessionId);
  }

  /**
   * Check if a session has a checkpoint
   */
  async exists(sessionId: string): Promise<boolean> {
    return await this.adapter.sessionExists(sessionId);
  }

  private validate(snapshot: StateSnapshot): StateSnapshot<InferState<S>> {
    const tracker = TrackerSchema.safeParse(snapshot.tracker);
    if (!tracker.success) {
      throw new InvariantViolationError(
        `Checkpoint v${snapshot.version} of ${snapshot.sessionId} has a malformed tracker`
      );
    }

    return {
      ...snapshot,
      state: parseState(this.schema, snapshot.state),
      tracker: tracker.data,
    };
  }
}
