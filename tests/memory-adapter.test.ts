/**
 * MemoryStorageAdapter Tests
 * Versioned snapshots, history, pruning and isolation between instances
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryStorageAdapter } from '../src/persistence/memory-adapter';
import type { StateSnapshot } from '../src/persistence/storage-adapter';

const createSnapshot = (
  sessionId: string,
  version: number,
  state: Record<string, unknown> = {}
): StateSnapshot => ({
  sessionId,
  version,
  state,
  timestamp: new Date(),
  tracker: {
    __sessionId: sessionId,
    __currentNodeId: 'clarify',
    __isActionTaken: true,
    __attempts: 0,
    __pendingQuestion: null,
    __status: 'suspended',
  },
});

describe('MemoryStorageAdapter', () => {
  let adapter: MemoryStorageAdapter;
  const sessionId = 'client-memory';

  beforeEach(() => {
    adapter = new MemoryStorageAdapter();
  });

  describe('Basic Operations', () => {
    it('should save and load a snapshot', async () => {
      await adapter.saveSnapshot(createSnapshot(sessionId, 1, { audience: 'gym members' }));
      const loaded = await adapter.loadSnapshot(sessionId);

      expect(loaded?.sessionId).toBe(sessionId);
      expect(loaded?.version).toBe(1);
      expect(loaded?.state).toEqual({ audience: 'gym members' });
      expect(loaded?.tracker.__currentNodeId).toBe('clarify');
    });

    it('should return null for an unknown session', async () => {
      expect(await adapter.loadSnapshot('nobody')).toBeNull();
    });

    it('should load the latest or a specific version', async () => {
      await adapter.saveSnapshot(createSnapshot(sessionId, 1, { count: 1 }));
      await adapter.saveSnapshot(createSnapshot(sessionId, 2, { count: 2 }));
      await adapter.saveSnapshot(createSnapshot(sessionId, 3, { count: 3 }));

      expect((await adapter.loadSnapshot(sessionId))?.state).toEqual({ count: 3 });
      expect((await adapter.loadSnapshot(sessionId, 2))?.state).toEqual({ count: 2 });
      expect(await adapter.loadSnapshot(sessionId, 999)).toBeNull();
    });

    it('should hand out copies that do not alias stored snapshots', async () => {
      const snapshot = createSnapshot(sessionId, 1, { tags: ['a'] });
      await adapter.saveSnapshot(snapshot);
      snapshot.tracker.__attempts = 5;

      const loaded = await adapter.loadSnapshot(sessionId);
      expect(loaded?.tracker.__attempts).toBe(0);

      if (loaded) {
        loaded.state = { tags: ['changed'] };
      }
      expect((await adapter.loadSnapshot(sessionId))?.state).toEqual({ tags: ['a'] });
    });

    it('should keep the timestamp a Date', async () => {
      await adapter.saveSnapshot(createSnapshot(sessionId, 1));
      expect((await adapter.loadSnapshot(sessionId))?.timestamp).toBeInstanceOf(Date);
    });
  });

  describe('History Management', () => {
    beforeEach(async () => {
      for (let i = 1; i <= 5; i++) {
        await adapter.saveSnapshot(createSnapshot(sessionId, i, { count: i }));
      }
    });

    it('should load history newest first', async () => {
      const history = await adapter.loadHistory(sessionId);

      expect(history.map((s) => s.version)).toEqual([5, 4, 3, 2, 1]);
    });

    it('should limit history results', async () => {
      const history = await adapter.loadHistory(sessionId, 3);

      expect(history.map((s) => s.version)).toEqual([5, 4, 3]);
    });

    it('should return an empty history for an unknown session', async () => {
      expect(await adapter.loadHistory('nobody')).toEqual([]);
    });
  });

  describe('Delete and Prune', () => {
    it('should delete a session', async () => {
      await adapter.saveSnapshot(createSnapshot(sessionId, 1));
      expect(await adapter.sessionExists(sessionId)).toBe(true);

      await adapter.deleteSession(sessionId);

      expect(await adapter.sessionExists(sessionId)).toBe(false);
      expect(await adapter.loadSnapshot(sessionId)).toBeNull();
    });

    it('should not throw when deleting an unknown session', async () => {
      await expect(adapter.deleteSession('nobody')).resolves.toBeUndefined();
    });

    it('should keep only the newest snapshots when pruning', async () => {
      for (let i = 1; i <= 10; i++) {
        await adapter.saveSnapshot(createSnapshot(sessionId, i, { count: i }));
      }

      await adapter.pruneHistory(sessionId, 3);

      expect(await adapter.getSnapshotCount(sessionId)).toBe(3);
      expect((await adapter.loadHistory(sessionId)).map((s) => s.version)).toEqual([10, 9, 8]);
      expect((await adapter.loadSnapshot(sessionId))?.version).toBe(10);
    });

    it('should leave short histories alone', async () => {
      await adapter.saveSnapshot(createSnapshot(sessionId, 1));
      await adapter.saveSnapshot(createSnapshot(sessionId, 2));

      await adapter.pruneHistory(sessionId, 20);

      expect(await adapter.getSnapshotCount(sessionId)).toBe(2);
    });
  });

  describe('Isolation', () => {
    it('should keep sessions independent', async () => {
      await adapter.saveSnapshot(createSnapshot('client-1', 1, { name: 'one' }));
      await adapter.saveSnapshot(createSnapshot('client-2', 1, { name: 'two' }));

      await adapter.deleteSession('client-1');

      expect(await adapter.sessionExists('client-1')).toBe(false);
      expect((await adapter.loadSnapshot('client-2'))?.state).toEqual({ name: 'two' });
      expect(adapter.getAllSessionIds()).toEqual(['client-2']);
    });

    it('should not share data between instances', async () => {
      const other = new MemoryStorageAdapter();
      await adapter.saveSnapshot(createSnapshot(sessionId, 1));

      expect(await other.sessionExists(sessionId)).toBe(false);
    });

    it('should clear all data', async () => {
      await adapter.saveSnapshot(createSnapshot('client-1', 1));
      await adapter.saveSnapshot(createSnapshot('client-2', 1));

      adapter.clearAll();

      expect(adapter.getAllSessionIds()).toEqual([]);
    });
  });
});
