/**
 * Local Metadata Cache
 *
 * Keeps online metadata hits in memory, keyed by content checksum, so later lookups
 * for the same content can be answered without touching the network.
 * The cache is exposed as a metadata source in its own right and is meant to
 * sit in front of ApiMetadataSource in a MetadataLookup.
 *
 * Cache expiration: never; entries are replaced when a newer online hit is stored
 * and dropped when the cache is closed.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import type {
  ContainingSetRef,
  LocalItemRef,
  LookupResult,
  OnlineMetadata,
  OnlineMetadataSource,
  OnlineStatus,
} from '../../shared/types';
import { ONLINE_STATUSES } from '../../shared/types';
import { CacheError, ContractError, errorMessage, wrapError } from './errors';
import type { ItemLogger } from './logger';

const SOURCE_NAME = 'LocalCachedMetadataSource';

// ─── Local Item Helpers ──────────────────────────────────────────────────────

/**
 * Computes the MD5 hex checksum of a file's content, the key the online
 * service identifies items by.
 *
 * @throws Error if the file cannot be read
 */
export function computeChecksum(filePath: string): string {
  const content = fs.readFileSync(path.resolve(filePath));
  return crypto.createHash('md5').update(content).digest('hex');
}

/**
 * Builds a lookup reference for a file on disk.
 */
export function createLocalItemRef(filePath: string, set: ContainingSetRef): LocalItemRef {
  return {
    checksum: computeChecksum(filePath),
    filename: path.basename(filePath),
    set,
  };
}

// ─── Serialization ───────────────────────────────────────────────────────────

/** JSON form of OnlineMetadata as stored in the database */
interface StoredMetadata {
  itemId: number;
  setId: number;
  authorId: number;
  itemStatus: OnlineStatus;
  setStatus: OnlineStatus | null;
  dateRanked: string | null;
  dateSubmitted: string | null;
  checksum: string;
  lastUpdated: string;
  userTags: string[];
}

export function serializeMetadata(metadata: OnlineMetadata): string {
  const stored: StoredMetadata = {
    ...metadata,
    dateRanked: metadata.dateRanked?.toISOString() ?? null,
    dateSubmitted: metadata.dateSubmitted?.toISOString() ?? null,
    lastUpdated: metadata.lastUpdated.toISOString(),
    userTags: [...metadata.userTags],
  };
  return JSON.stringify(stored);
}

function isStatus(value: unknown): value is OnlineStatus {
  return ONLINE_STATUSES.some((status) => status === value);
}

function isStoredMetadata(value: unknown): value is StoredMetadata {
  if (value === null || typeof value !== 'object') return false;
  const field = (key: keyof StoredMetadata): unknown => Reflect.get(value, key);
  const userTags = field('userTags');
  const setStatus = field('setStatus');
  const dateRanked = field('dateRanked');
  const dateSubmitted = field('dateSubmitted');
  return (
    typeof field('itemId') === 'number' &&
    typeof field('setId') === 'number' &&
    typeof field('authorId') === 'number' &&
    isStatus(field('itemStatus')) &&
    (setStatus === null || isStatus(setStatus)) &&
    (dateRanked === null || typeof dateRanked === 'string') &&
    (dateSubmitted === null || typeof dateSubmitted === 'string') &&
    typeof field('checksum') === 'string' &&
    typeof field('lastUpdated') === 'string' &&
    Array.isArray(userTags) &&
    userTags.every((tag: unknown) => typeof tag === 'string')
  );
}

/**
 * Parses a stored metadata row back into OnlineMetadata.
 *
 * @throws CacheError if the JSON is corrupt
 */
export function deserializeMetadata(json: string): OnlineMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error: unknown) {
    throw new CacheError(`Corrupt cache entry: ${errorMessage(error)}`);
  }
  if (!isStoredMetadata(parsed)) {
    throw new CacheError('Corrupt cache entry: unexpected shape');
  }

  return {
    ...parsed,
    dateRanked: parsed.dateRanked ? new Date(parsed.dateRanked) : null,
    dateSubmitted: parsed.dateSubmitted ? new Date(parsed.dateSubmitted) : null,
    lastUpdated: new Date(parsed.lastUpdated),
    userTags: [...parsed.userTags],
  };
}

// ─── Metadata Cache ─────────────────────────────────────────────────────────

/**
 * In-memory cache of online metadata, keyed by content checksum.
 * Entries are kept serialized so every read hands out a fresh copy.
 */
export class MetadataCache {
  private cache: Map<string, string> | null = new Map();

  isOpen(): boolean {
    return this.cache !== null;
  }

  /** Check if metadata is cached for a checksum */
  has(checksum: string): boolean {
    return this.requireOpen().has(checksum);
  }

  /**
   * Returns a fresh copy of the cached metadata, or undefined if not cached.
   *
   * @throws CacheError if the stored entry is corrupt or the cache is closed
   */
  get(checksum: string): OnlineMetadata | undefined {
    const json = this.requireOpen().get(checksum);
    return json === undefined ? undefined : deserializeMetadata(json);
  }

  /** Stores metadata under a checksum, replacing any previous entry */
  set(checksum: string, metadata: OnlineMetadata): void {
    this.requireOpen().set(checksum, serializeMetadata(metadata));
  }

  delete(checksum: string): boolean {
    return this.requireOpen().delete(checksum);
  }

  clear(): void {
    this.requireOpen().clear();
  }

  get size(): number {
    return this.requireOpen().size;
  }

  /**
   * Drops every entry and closes the cache. Safe to call more than once.
   */
  close(): void {
    this.cache = null;
  }

  private requireOpen(): Map<string, string> {
    if (!this.cache) {
      throw new CacheError('MetadataCache is closed');
    }
    return this.cache;
  }
}

// ─── Cache Source ────────────────────────────────────────────────────────────

/**
 * Anything online hits can be written back to.
 */
export interface MetadataStore {
  store(metadata: OnlineMetadata): void;
}

export function isMetadataStore(value: object): value is MetadataStore {
  return 'store' in value && typeof value.store === 'function';
}

/**
 * Metadata source answering from the local cache.
 *
 * A cache miss is inconclusive: the cache never knows that the online
 * service has no match, so the next source should be asked.
 */
export class LocalCachedMetadataSource implements OnlineMetadataSource, MetadataStore {
  readonly name = SOURCE_NAME;

  constructor(
    private readonly cache: MetadataCache,
    private readonly logger: ItemLogger,
  ) {}

  get available(): boolean {
    return this.cache.isOpen();
  }

  async tryLookup(item: LocalItemRef): Promise<LookupResult> {
    if (!this.available) {
      return { found: false, metadata: null, reason: 'unavailable' };
    }

    const set = item.set;
    if (!set) {
      throw new ContractError('Lookup item must belong to a set', { item: item.filename });
    }

    if (!item.checksum) {
      return { found: false, metadata: null, reason: 'not-cached' };
    }

    let cached: OnlineMetadata | undefined;
    try {
      cached = this.cache.get(item.checksum);
    } catch (error: unknown) {
      const cacheError = wrapError(error, 'CacheError', { item: item.filename, step: 'read' });
      this.logger.logForItem(set, `Cache read failed for ${item.filename}`, {
        level: 'WARN',
        category: cacheError.category,
        item: item.filename,
        source: SOURCE_NAME,
        cause: cacheError.message,
      });
      return { found: false, metadata: null, reason: 'not-cached' };
    }

    if (!cached) {
      return { found: false, metadata: null, reason: 'not-cached' };
    }

    this.logger.logForItem(set, `Cached metadata mapped ${item.filename} to ${cached.setId} / ${cached.itemId}.`, {
      item: item.filename,
      source: SOURCE_NAME,
    });
    return { found: true, metadata: cached };
  }

  store(metadata: OnlineMetadata): void {
    this.cache.set(metadata.checksum, metadata);
  }

  /**
   * Closes the underlying cache.
   */
  dispose(): void {
    this.cache.close();
  }
}
