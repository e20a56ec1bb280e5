import { describe, it, expect } from 'vitest';
import { createMemoryBackend } from './memory-backend.js';
import { createEntry } from '../entry/entry.js';
import type { CacheEntry } from '../entry/types.js';
import { TEST_KEY, OTHER_KEY, TEST_TAG } from '../test/fixtures.js';

const entryFor = (key: string, tags: readonly string[] = [], expiresAt?: number): CacheEntry =>
  createEntry({ key, typeId: 't:v1', payload: key, createdAt: 0, expiresAt, tags });

describe('createMemoryBackend', () => {
  describe('read', () => {
    describe('given key does not exist', () => {
      it('returns undefined', async () => {
        const backend = createMemoryBackend();

        expect(await backend.read(TEST_KEY)).toBeUndefined();
      });
    });

    describe('given key was written', () => {
      it('returns the entry', async () => {
        const backend = createMemoryBackend();
        const entry = entryFor(TEST_KEY);
        await backend.write(entry);

        expect(await backend.read(TEST_KEY)).toBe(entry);
      });
    });
  });

  describe('readAll', () => {
    it('returns every entry', async () => {
      const backend = createMemoryBackend();
      await backend.write(entryFor(TEST_KEY));
      await backend.write(entryFor(OTHER_KEY));

      const entries = await backend.readAll();

      expect(entries.map((entry) => entry.key)).toEqual([TEST_KEY, OTHER_KEY]);
    });
  });

  describe('keysByTag', () => {
    describe('given entries with the tag', () => {
      it('returns their keys', async () => {
        const backend = createMemoryBackend();
        await backend.write(entryFor(TEST_KEY, [TEST_TAG]));
        await backend.write(entryFor(OTHER_KEY, [TEST_TAG, 'other-tag']));

        const keys = await backend.keysByTag(TEST_TAG);

        expect([...keys]).toEqual([TEST_KEY, OTHER_KEY]);
      });
    });

    describe('given an entry overwritten without the tag', () => {
      it('no longer lists the key', async () => {
        const backend = createMemoryBackend();
        await backend.write(entryFor(TEST_KEY, [TEST_TAG]));
        await backend.write(entryFor(TEST_KEY, []));

        const keys = await backend.keysByTag(TEST_TAG);

        expect(keys.size).toBe(0);
      });
    });

    describe('given a deleted entry', () => {
      it('no longer lists the key', async () => {
        const backend = createMemoryBackend();
        await backend.write(entryFor(TEST_KEY, [TEST_TAG]));
        await backend.delete(TEST_KEY);

        expect((await backend.keysByTag(TEST_TAG)).size).toBe(0);
      });
    });

    it('returns a copy of the index', async () => {
      const backend = createMemoryBackend();
      await backend.write(entryFor(TEST_KEY, [TEST_TAG]));

      const keys = await backend.keysByTag(TEST_TAG);
      await backend.delete(TEST_KEY);

      expect([...keys]).toEqual([TEST_KEY]);
    });
  });

  describe('deleteTag', () => {
    it('drops the index but keeps the entries', async () => {
      const backend = createMemoryBackend();
      await backend.write(entryFor(TEST_KEY, [TEST_TAG]));

      await backend.deleteTag(TEST_TAG);

      expect((await backend.keysByTag(TEST_TAG)).size).toBe(0);
      expect(await backend.read(TEST_KEY)).toBeDefined();
    });
  });

  describe('delete', () => {
    it('ignores a missing key', async () => {
      const backend = createMemoryBackend();

      await expect(backend.delete('missing')).resolves.toBeUndefined();
    });
  });

  describe('purgeExpired', () => {
    it('removes only entries expired at the given time', async () => {
      // Arrange
      const backend = createMemoryBackend();
      await backend.write(entryFor('expired', [TEST_TAG], 2_000));
      await backend.write(entryFor('fresh', [], 3_000));
      await backend.write(entryFor('forever'));

      // Act
      const removed = await backend.purgeExpired(2_000);

      // Assert
      expect(removed).toBe(1);
      expect(await backend.read('expired')).toBeUndefined();
      expect(await backend.read('fresh')).toBeDefined();
      expect(await backend.read('forever')).toBeDefined();
      expect((await backend.keysByTag(TEST_TAG)).size).toBe(0);
    });
  });

  describe('clear', () => {
    it('removes every entry and tag', async () => {
      const backend = createMemoryBackend();
      await backend.write(entryFor(TEST_KEY, [TEST_TAG]));

      await backend.clear();

      expect(await backend.readAll()).toEqual([]);
      expect((await backend.keysByTag(TEST_TAG)).size).toBe(0);
    });
  });
});
