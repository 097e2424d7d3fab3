/**
 * In-memory storage adapter
 * Snapshots live for the lifetime of the process only
 */

import { StorageAdapter, StateSnapshot } from './storage-adapter';

/**
 * Memory-based storage adapter
 * Snapshots are deep-copied on the way in and out, so later mutations of a
 * live state never rewrite a stored checkpoint
 */
export class MemoryStorageAdapter extends StorageAdapter {
  private storage: Map<string, StateSnapshot[]> = new Map();

  async saveSnapshot(snapshot: StateSnapshot): Promise<void> {
    const sessionSnapshots = this.storage.get(snapshot.sessionId) || [];
    sessionSnapshots.push(structuredClone(snapshot));
    this.storage.set(snapshot.sessionId, sessionSnapshots);
  }

  async loadSnapshot(
    sessionId: string,
    version?: number
  ): Promise<StateSnapshot | null> {
    const sessionSnapshots = this.storage.get(sessionId);

    if (!sessionSnapshots || sessionSnapshots.length === 0) {
      return null;
    }

    if (version !== undefined) {
      const snapshot = sessionSnapshots.find((s) => s.version === version);
      return snapshot ? structuredClone(snapshot) : null;
    }

    return structuredClone(sessionSnapshots[sessionSnapshots.length - 1]);
  }

  async loadHistory(
    sessionId: string,
    limit?: number
  ): Promise<StateSnapshot[]> {
    const sessionSnapshots = this.storage.get(sessionId) || [];

    // Newest first
    const sorted = [...sessionSnapshots].sort((a, b) => b.version - a.version);
    const limited =
      limit !== undefined && limit > 0 ? sorted.slice(0, limit) : sorted;

    return limited.map((snapshot) => structuredClone(snapshot));
  }

  async deleteSession(sessionId: string): Promise<void> {
    this.storage.delete(sessionId);
  }

  async pruneHistory(sessionId: string, keepLast: number): Promise<void> {
    const sessionSnapshots = this.storage.get(sessionId);

    if (!sessionSnapshots || sessionSnapshots.length <= keepLast) {
      return;
    }

    const kept = [...sessionSnapshots]
      .sort((a, b) => b.version - a.version)
      .slice(0, keepLast)
      .reverse();

    this.storage.set(sessionId, kept);
  }

  async getSnapshotCount(sessionId: string): Promise<number> {
    return this.storage.get(sessionId)?.length ?? 0;
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    return (this.storage.get(sessionId)?.length ?? 0) > 0;
  }

  /**
   * Clear all data from memory (useful for testing)
   */
  clearAll(): void {
    this.storage.clear();
  }

  /**
   * Get all session IDs in storage (useful for debugging)
   */
  getAllSessionIds(): string[] {
    return Array.from(this.storage.keys());
  }
}
