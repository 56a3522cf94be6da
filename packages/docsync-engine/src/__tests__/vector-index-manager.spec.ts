import { describe, it, expect, beforeEach } from 'vitest';
import { canonicalIndexName, VectorIndexManager } from '../index-manager/vector-index-manager.js';
import { FakePlatform } from '../testing/fake-platform.js';

describe('VectorIndexManager', () => {
  let platform: FakePlatform;
  let manager: VectorIndexManager;

  beforeEach(() => {
    platform = new FakePlatform();
    manager = new VectorIndexManager(platform, 'asst_1');
  });

  describe('discoverIndexes', () => {
    it('should return the attached index ids', async () => {
      platform.addAssistant('asst_1', ['vs_a', 'vs_b']);
      expect(await manager.discoverIndexes()).toEqual(['vs_a', 'vs_b']);
    });

    it('should return nothing when the search capability is missing', async () => {
      platform.addAssistant('asst_1', null);
      expect(await manager.discoverIndexes()).toEqual([]);
    });

    it('should return nothing when the assistant cannot be read', async () => {
      expect(await manager.discoverIndexes()).toEqual([]);
    });
  });

  describe('emptyFilesDetailed', () => {
    it('should not touch anything when no index is attached', async () => {
      platform.addAssistant('asst_1', []);

      const report = await manager.emptyFilesDetailed();

      expect(report.ok).toBe(true);
      expect(report.listed).toBe(0);
      expect(platform.calls).toEqual(['assistants.retrieve:asst_1']);
    });

    it('should not touch anything when the search capability is missing', async () => {
      platform.addAssistant('asst_1', null);

      expect(await manager.emptyFiles()).toBe(true);
      expect(platform.calls).toEqual(['assistants.retrieve:asst_1']);
    });

    it('should delete extra indexes and clear the first one', async () => {
      platform.addAssistant('asst_1', ['vs_a', 'vs_b']);
      platform.addIndex('vs_a', [
        ['f1', 'completed'],
        ['f2', 'completed'],
      ]);
      platform.addIndex('vs_b', [['f3', 'completed']]);

      const report = await manager.emptyFilesDetailed();

      expect(report).toEqual({
        ok: true,
        indexId: 'vs_a',
        listed: 2,
        cleared: 2,
        indexDeleted: false,
        removedExtraIndexes: ['vs_b'],
        failedIndexEntries: [],
        failedRemoteFiles: [],
      });
      expect(platform.calls).toEqual([
        'assistants.retrieve:asst_1',
        'vectorIndexes.delete:vs_b',
        'vectorIndexes.listFiles:vs_a:all:',
        'vectorIndexes.deleteFile:vs_a:f1',
        'files.delete:f1',
        'vectorIndexes.deleteFile:vs_a:f2',
        'files.delete:f2',
        'vectorIndexes.retrieve:vs_a',
        'vectorIndexes.update:vs_a:asst_1_vector_store:30',
      ]);
      expect(platform.indexes.get('vs_a')?.files.size).toBe(0);
      expect(platform.assistantsById.get('asst_1')).toEqual(['vs_a']);
    });

    it('should skip an attached index that no longer exists', async () => {
      platform.addAssistant('asst_1', ['vs_main', 'vs_gone']);
      platform.addIndex('vs_main', [['f1', 'completed']]);

      const report = await manager.emptyFilesDetailed();

      expect(report).toEqual({
        ok: true,
        indexId: 'vs_main',
        listed: 1,
        cleared: 1,
        indexDeleted: false,
        removedExtraIndexes: ['vs_gone'],
        failedIndexEntries: [],
        failedRemoteFiles: [],
      });
      expect(platform.calls).toEqual([
        'assistants.retrieve:asst_1',
        'vectorIndexes.delete:vs_gone',
        'vectorIndexes.listFiles:vs_main:all:',
        'vectorIndexes.deleteFile:vs_main:f1',
        'files.delete:f1',
        'vectorIndexes.retrieve:vs_main',
        'vectorIndexes.update:vs_main:asst_1_vector_store:30',
      ]);
      expect(platform.indexes.get('vs_main')?.files.size).toBe(0);
    });

    it('should keep clearing when an extra index refuses deletion', async () => {
      platform.addAssistant('asst_1', ['vs_main', 'vs_stuck']);
      platform.addIndex('vs_main', [['f1', 'completed']]);
      platform.addIndex('vs_stuck');
      platform.undeletableIndexes.add('vs_stuck');

      const report = await manager.emptyFilesDetailed();

      expect(report.ok).toBe(true);
      expect(report.removedExtraIndexes).toEqual([]);
      expect(report.cleared).toBe(1);
      expect(platform.indexes.has('vs_stuck')).toBe(true);
    });

    it('should refresh the expiry of a kept index to 30 days', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [['f1', 'completed']]);

      await manager.emptyFilesDetailed();

      const index = platform.indexes.get('vs_a');
      expect(index?.name).toBe(canonicalIndexName('asst_1'));
      expect(index?.expiresAfter).toEqual({ anchor: 'last_active_at', days: 30 });
    });

    it('should delete the index when a file is still processing', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [
        ['f1', 'in_progress'],
        ['f2', 'completed'],
      ]);

      const report = await manager.emptyFilesDetailed();

      expect(report.indexDeleted).toBe(true);
      expect(report.cleared).toBe(2);
      expect(platform.callsMatching('vectorIndexes.delete')).toEqual(['vectorIndexes.delete:vs_a']);
      expect(platform.indexes.has('vs_a')).toBe(false);
      expect(platform.assistantsById.get('asst_1')).toEqual([]);
    });

    it('should delete an expired index without updating it', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [['f1', 'completed']], 'expired');

      const report = await manager.emptyFilesDetailed();

      expect(report.indexDeleted).toBe(true);
      expect(platform.callsMatching('vectorIndexes.update')).toEqual([]);
      expect(platform.callsMatching('vectorIndexes.delete')).toEqual(['vectorIndexes.delete:vs_a']);
    });

    it('should delete the index when an entry could not be removed', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [
        ['f1', 'completed'],
        ['f2', 'completed'],
      ]);
      platform.undeletableEntries.add('f1');

      const report = await manager.emptyFilesDetailed();

      expect(report.failedIndexEntries).toEqual(['f1']);
      expect(report.indexDeleted).toBe(true);
      expect(report.cleared).toBe(2);
      expect(report.ok).toBe(true);
    });

    it('should delete the index when a storage file could not be removed', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [['f1', 'completed']]);
      platform.undeletableFiles.add('f1');

      const report = await manager.emptyFilesDetailed();

      expect(report.failedRemoteFiles).toEqual(['f1']);
      expect(report.indexDeleted).toBe(true);
    });

    it('should count only removed entries when the index survives', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a', [
        ['f1', 'completed'],
        ['f2', 'completed'],
      ]);
      platform.undeletableEntries.add('f1');
      platform.undeletableIndexes.add('vs_a');

      const report = await manager.emptyFilesDetailed();

      expect(report.ok).toBe(true);
      expect(report.indexDeleted).toBe(false);
      expect(report.listed).toBe(2);
      expect(report.cleared).toBe(1);
    });

    it('should return false when an unexpected error escapes', async () => {
      platform.addAssistant('asst_1', ['vs_a']);
      platform.addIndex('vs_a');
      platform.listFilesError = new Error('service unavailable');

      const report = await manager.emptyFilesDetailed();

      expect(report.ok).toBe(false);
      expect(report.error).toBe('service unavailable');
      expect(await manager.emptyFiles()).toBe(false);
    });
  });

  describe('ensureCanonicalIndex', () => {
    it('should create and attach a 7-day index when none is attached', async () => {
      platform.addAssistant('asst_1', []);

      const indexId = await manager.ensureCanonicalIndex();

      expect(indexId).toBe('vs_1');
      expect(platform.calls).toEqual([
        'assistants.retrieve:asst_1',
        'vectorIndexes.create:vs_1:7',
        'assistants.update:asst_1:vs_1',
      ]);
      expect(platform.indexes.get('vs_1')?.name).toBe('asst_1_vector_store');
    });

    it('should narrow several attached indexes to the first', async () => {
      platform.addAssistant('asst_1', ['vs_a', 'vs_b']);

      expect(await manager.ensureCanonicalIndex()).toBe('vs_a');
      expect(platform.assistantsById.get('asst_1')).toEqual(['vs_a']);
      expect(platform.callsMatching('vectorIndexes.create')).toEqual([]);
    });

    it('should reuse a single attached index as is', async () => {
      platform.addAssistant('asst_1', ['vs_a']);

      expect(await manager.ensureCanonicalIndex()).toBe('vs_a');
      expect(platform.calls).toEqual(['assistants.retrieve:asst_1']);
    });
  });
});
