/**
 * Shared type definitions for the metadata lookup library.
 * These interfaces are used by every metadata source and by the wiring layer.
 */

/** Opaque handle to the collection (set) that owns a local item */
export interface ContainingSetRef {
  /** Stable identifier of the set in the local catalog */
  id: string;
  /** Human readable name, used only for log output */
  name?: string;
}

/** Identifies a local media item to look up online */
export interface LocalItemRef {
  /** Content checksum (MD5 hex), null when not yet computed */
  checksum: string | null;
  /** Filename of the item inside its set */
  filename: string;
  /** Owning set. Lookups require this to be present. */
  set: ContainingSetRef | null;
}

/** Ranking status of an item or set on the online service */
export type OnlineStatus =
  | 'none'
  | 'graveyard'
  | 'wip'
  | 'pending'
  | 'ranked'
  | 'approved'
  | 'qualified'
  | 'loved';

/** All valid online statuses */
export const ONLINE_STATUSES: readonly OnlineStatus[] = [
  'none',
  'graveyard',
  'wip',
  'pending',
  'ranked',
  'approved',
  'qualified',
  'loved',
] as const;

/** Canonical online metadata resolved for a local item */
export interface OnlineMetadata {
  /** Online item ID */
  itemId: number;
  /** Online set ID */
  setId: number;
  /** Online ID of the item's author */
  authorId: number;
  itemStatus: OnlineStatus;
  /** Null when the response carried no set information */
  setStatus: OnlineStatus | null;
  dateRanked: Date | null;
  dateSubmitted: Date | null;
  /** Checksum as known by the online service */
  checksum: string;
  lastUpdated: Date;
  /** Community tag names, most voted first */
  userTags: string[];
}

/** A community vote total for one tag on an item */
export interface TopTagVote {
  tagId: number;
  voteCount: number;
}

/** A tag definition from a set's tag catalog */
export interface TagCatalogEntry {
  tagId: number;
  name: string;
}

/** Set sub-object embedded in an item response */
export interface ApiItemSet {
  status: OnlineStatus;
  ranked: Date | null;
  submitted: Date | null;
}

/** Response of the item lookup endpoint */
export interface ApiItem {
  itemId: number;
  setId: number;
  authorId: number;
  status: OnlineStatus;
  lastUpdated: Date;
  checksum: string;
  set?: ApiItemSet | null;
  topTags?: TopTagVote[] | null;
}

/** Response of the set endpoint */
export interface ApiSet {
  setId: number;
  relatedTags?: TagCatalogEntry[] | null;
}

/** Why a lookup came back without metadata */
export type LookupMissReason =
  | 'unavailable'
  | 'transport-error'
  | 'empty-response'
  | 'not-cached'
  | 'not-found';

/**
 * Outcome of a single metadata source lookup.
 *
 * - `found: false` → inconclusive, try another source or retry later
 * - `found: true, metadata: null` → the source authoritatively has no match
 * - `found: true, metadata` → hit
 */
export type LookupResult =
  | {
      found: false;
      metadata: null;
      reason: Exclude<LookupMissReason, 'not-found'>;
    }
  | {
      found: true;
      metadata: null;
      reason: 'not-found';
    }
  | {
      found: true;
      metadata: OnlineMetadata;
    };

/** Common contract of every metadata source */
export interface OnlineMetadataSource {
  /** Name used in log output and lookup results */
  readonly name: string;
  /** Whether the source can currently answer lookups */
  readonly available: boolean;
  tryLookup(item: LocalItemRef): Promise<LookupResult>;
  dispose(): void;
}

/** Library settings */
export interface LookupSettings {
  /** Base URL of the online API */
  apiBaseUrl: string;
  /** HTTP timeout per request in milliseconds */
  requestTimeoutMs: number;
  /** User-Agent sent with every request */
  userAgent: string;
  /** Bearer token for the online API ('' = anonymous) */
  accessToken: string;
  /** Whether to keep an in-memory cache of online hits */
  useLocalCache: boolean;
  /** Log directory (null = platform default) */
  logDir: string | null;
  /** Minimum log level written */
  logLevel: 'ERROR' | 'WARN' | 'INFO';
}

/** Default library settings */
export const DEFAULT_SETTINGS: LookupSettings = {
  apiBaseUrl: 'https://metadata.example.org/api/v2',
  requestTimeoutMs: 10000,
  userAgent: 'MediaMetadataLookup/1.0.0',
  accessToken: '',
  useLocalCache: true,
  logDir: null,
  logLevel: 'INFO',
};
