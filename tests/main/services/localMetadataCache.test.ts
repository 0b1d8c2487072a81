/**
 * Tests for the in-memory metadata cache and the cache-backed metadata source
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import {
  computeChecksum,
  createLocalItemRef,
  deserializeMetadata,
  isMetadataStore,
  LocalCachedMetadataSource,
  MetadataCache,
  serializeMetadata,
} from '../../../src/main/services/localMetadataCache';
import { CacheError, ContractError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';
import type { LocalItemRef, OnlineMetadata } from '../../../src/shared/types';

// ─── Fixtures ────────────────────────────────────────────────────────────────

function createMetadata(overrides: Partial<OnlineMetadata> = {}): OnlineMetadata {
  return {
    itemId: 12345,
    setId: 67890,
    authorId: 1111,
    itemStatus: 'ranked',
    setStatus: 'ranked',
    dateRanked: new Date('2024-04-01T10:00:00.000Z'),
    dateSubmitted: null,
    checksum: 'cached-checksum',
    lastUpdated: new Date('2024-05-01T10:00:00.000Z'),
    userTags: ['dubstep', 'electronic'],
    ...overrides,
  };
}

const SET = { id: 'set-1' };

const ITEM: LocalItemRef = { checksum: 'cached-checksum', filename: 'track.dat', set: SET };

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'metadata-cache-test-'));
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('localMetadataCache', () => {
  describe('computeChecksum', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should return the MD5 hex digest of the file content', () => {
      const filePath = path.join(tempDir, 'hello.txt');
      fs.writeFileSync(filePath, 'hello');
      expect(computeChecksum(filePath)).toBe('5d41402abc4b2a76b9719d911017c592');
    });

    it('should hash an empty file', () => {
      const filePath = path.join(tempDir, 'empty.bin');
      fs.writeFileSync(filePath, '');
      expect(computeChecksum(filePath)).toBe('d41d8cd98f00b204e9800998ecf8427e');
    });

    it('should throw for a missing file', () => {
      expect(() => computeChecksum(path.join(tempDir, 'missing.bin'))).toThrow();
    });

    it('should build a local item reference from a file', () => {
      const filePath = path.join(tempDir, 'hello.txt');
      fs.writeFileSync(filePath, 'hello');
      expect(createLocalItemRef(filePath, SET)).toEqual({
        checksum: '5d41402abc4b2a76b9719d911017c592',
        filename: 'hello.txt',
        set: SET,
      });
    });
  });

  describe('serialization', () => {
    it('should restore dates and tags', () => {
      const metadata = createMetadata();
      expect(deserializeMetadata(serializeMetadata(metadata))).toEqual(metadata);
    });

    it('should reject invalid JSON', () => {
      expect(() => deserializeMetadata('{not json')).toThrow(CacheError);
    });

    it('should reject entries with an unexpected shape', () => {
      expect(() => deserializeMetadata(JSON.stringify({ itemId: 1 }))).toThrow(
        'Corrupt cache entry: unexpected shape',
      );
    });
  });

  describe('MetadataCache', () => {
    let cache: MetadataCache;

    beforeEach(() => {
      cache = new MetadataCache();
    });

    it('should start open and empty', () => {
      expect(cache.isOpen()).toBe(true);
      expect(cache.size).toBe(0);
    });

    it('should store and retrieve metadata by checksum', () => {
      const metadata = createMetadata();
      cache.set('cached-checksum', metadata);
      expect(cache.has('cached-checksum')).toBe(true);
      expect(cache.get('cached-checksum')).toEqual(metadata);
    });

    it('should return a fresh copy on every read', () => {
      cache.set('cached-checksum', createMetadata());
      const first = cache.get('cached-checksum');
      first?.userTags.push('mutated');
      expect(cache.get('cached-checksum')?.userTags).toEqual(['dubstep', 'electronic']);
      expect(cache.get('cached-checksum')).not.toBe(first);
    });

    it('should not be affected by later changes to the stored object', () => {
      const metadata = createMetadata();
      cache.set('cached-checksum', metadata);
      metadata.userTags.push('mutated');
      expect(cache.get('cached-checksum')?.userTags).toEqual(['dubstep', 'electronic']);
    });

    it('should return undefined for unknown checksums', () => {
      expect(cache.has('unknown')).toBe(false);
      expect(cache.get('unknown')).toBeUndefined();
    });

    it('should replace existing entries', () => {
      cache.set('cached-checksum', createMetadata());
      cache.set('cached-checksum', createMetadata({ itemId: 999 }));
      expect(cache.size).toBe(1);
      expect(cache.get('cached-checksum')?.itemId).toBe(999);
    });

    it('should delete entries', () => {
      cache.set('cached-checksum', createMetadata());
      expect(cache.delete('cached-checksum')).toBe(true);
      expect(cache.delete('cached-checksum')).toBe(false);
      expect(cache.size).toBe(0);
    });

    it('should clear all entries', () => {
      cache.set('a', createMetadata({ checksum: 'a' }));
      cache.set('b', createMetadata({ checksum: 'b' }));
      expect(cache.size).toBe(2);
      cache.clear();
      expect(cache.size).toBe(0);
    });

    it('should throw a CacheError once closed', () => {
      cache.close();
      expect(cache.isOpen()).toBe(false);
      expect(() => cache.get('x')).toThrow('MetadataCache is closed');
      expect(() => cache.set('x', createMetadata())).toThrow(CacheError);
    });

    it('should allow closing twice', () => {
      cache.close();
      expect(() => cache.close()).not.toThrow();
    });
  });

  describe('LocalCachedMetadataSource', () => {
    let cache: MetadataCache;
    let logger: Logger;
    let source: LocalCachedMetadataSource;

    beforeEach(() => {
      cache = new MetadataCache();
      logger = new Logger({ writeToFile: false });
      source = new LocalCachedMetadataSource(cache, logger);
    });

    it('should be a metadata store', () => {
      expect(isMetadataStore(source)).toBe(true);
    });

    it('should be available while the database is open', () => {
      expect(source.available).toBe(true);
      source.dispose();
      expect(source.available).toBe(false);
    });

    it('should return a hit for stored metadata', async () => {
      const metadata = createMetadata();
      source.store(metadata);

      const result = await source.tryLookup(ITEM);

      expect(result).toEqual({ found: true, metadata });
      expect(logger.getEntries({ source: 'LocalCachedMetadataSource' })[0].message).toBe(
        'Cached metadata mapped track.dat to 67890 / 12345.',
      );
    });

    it('should return an inconclusive miss for uncached items', async () => {
      expect(await source.tryLookup(ITEM)).toEqual({ found: false, metadata: null, reason: 'not-cached' });
    });

    it('should return an inconclusive miss for items without a checksum', async () => {
      source.store(createMetadata());
      expect(await source.tryLookup({ ...ITEM, checksum: null })).toEqual({
        found: false,
        metadata: null,
        reason: 'not-cached',
      });
    });

    it('should return unavailable once disposed', async () => {
      source.dispose();
      expect(await source.tryLookup(ITEM)).toEqual({ found: false, metadata: null, reason: 'unavailable' });
    });

    it('should throw a ContractError when the item has no containing set', async () => {
      await expect(source.tryLookup({ ...ITEM, set: null })).rejects.toBeInstanceOf(ContractError);
    });

    it('should log read failures as cache errors and report a miss', async () => {
      vi.spyOn(cache, 'get').mockImplementation(() => {
        throw new Error('entry unreadable');
      });

      const result = await source.tryLookup(ITEM);

      expect(result).toEqual({ found: false, metadata: null, reason: 'not-cached' });
      const [warning] = logger.getWarnings();
      expect(warning.message).toBe('Cache read failed for track.dat');
      expect(warning.category).toBe('CacheError');
      expect(warning.cause).toBe('entry unreadable');
    });
  });
});
