/**
 * Online API requests
 *
 * A request describes one endpoint call and holds its outcome once a
 * transport has performed it: a completion state plus the typed response.
 * Transports call complete()/fail(); test doubles may call resolve() with an
 * already-typed response.
 */

import type { ApiItem, ApiItemSet, ApiSet, OnlineStatus, TagCatalogEntry, TopTagVote } from '../../shared/types';
import { ONLINE_STATUSES } from '../../shared/types';
import { ContractError, ResponseFormatError } from './errors';

// ─── Completion State ────────────────────────────────────────────────────────

export type RequestCompletionState = 'pending' | 'completed' | 'failed';

/** Query parameters sent with a request */
export type RequestParams = Record<string, string | number>;

/**
 * Base class for every API request.
 *
 * A request completes exactly once. Completing an already completed or
 * failed request is a programming error.
 */
export abstract class ApiRequest<T> {
  private state: RequestCompletionState = 'pending';
  private result: T | null = null;
  private failure: Error | null = null;

  /** Endpoint path relative to the API base URL */
  abstract readonly endpoint: string;

  /** Query parameters */
  abstract readonly params: RequestParams;

  /**
   * Converts a raw JSON body into the typed response.
   * Returns null for an empty body.
   *
   * @throws ResponseFormatError if the body has the wrong shape
   */
  protected abstract parseResponse(raw: unknown): T | null;

  get completionState(): RequestCompletionState {
    return this.state;
  }

  /** Typed response, null until completed or when the body was empty */
  get response(): T | null {
    return this.result;
  }

  /** Reason the request failed, if it did */
  get error(): Error | null {
    return this.failure;
  }

  /**
   * Completes the request from a raw JSON body.
   * If parsing throws, the request stays pending.
   */
  complete(raw: unknown): void {
    this.resolve(this.parseResponse(raw));
  }

  /**
   * Completes the request with an already typed response.
   */
  resolve(response: T | null): void {
    this.ensurePending();
    this.result = response;
    this.state = 'completed';
  }

  /**
   * Marks the request as rejected by the server.
   */
  fail(error: Error): void {
    this.ensurePending();
    this.failure = error;
    this.state = 'failed';
  }

  /** Short description used in log messages */
  toString(): string {
    return `${this.constructor.name}(${this.endpoint})`;
  }

  private ensurePending(): void {
    if (this.state !== 'pending') {
      throw new ContractError(`${this.toString()} has already ${this.state}`);
    }
  }
}

// ─── Body Parsing ────────────────────────────────────────────────────────────

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isEmptyBody(raw: unknown): boolean {
  return raw === null || raw === undefined || raw === '';
}

function readInteger(body: JsonRecord, key: string, endpoint: string): number {
  const value = body[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ResponseFormatError(`Expected integer "${key}" in ${endpoint} response`);
  }
  return value;
}

function readString(body: JsonRecord, key: string, endpoint: string): string {
  const value = body[key];
  if (typeof value !== 'string') {
    throw new ResponseFormatError(`Expected string "${key}" in ${endpoint} response`);
  }
  return value;
}

function readStatus(body: JsonRecord, key: string, endpoint: string): OnlineStatus {
  const value = readString(body, key, endpoint);
  const status = ONLINE_STATUSES.find((s) => s === value);
  if (!status) {
    throw new ResponseFormatError(`Unknown status "${value}" in ${endpoint} response`);
  }
  return status;
}

/** Reads an ISO 8601 timestamp. Missing or null values read as null. */
function readOptionalDate(body: JsonRecord, key: string, endpoint: string): Date | null {
  const value = body[key];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') {
    throw new ResponseFormatError(`Expected timestamp "${key}" in ${endpoint} response`);
  }
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new ResponseFormatError(`Invalid timestamp "${value}" for "${key}" in ${endpoint} response`);
  }
  return date;
}

function readDate(body: JsonRecord, key: string, endpoint: string): Date {
  const date = readOptionalDate(body, key, endpoint);
  if (!date) {
    throw new ResponseFormatError(`Expected timestamp "${key}" in ${endpoint} response`);
  }
  return date;
}

/** Reads an optional array of objects, mapping each element */
function readOptionalList<T>(
  body: JsonRecord,
  key: string,
  endpoint: string,
  mapElement: (element: JsonRecord) => T,
): T[] | null {
  const value = body[key];
  if (value === null || value === undefined) return null;
  if (!Array.isArray(value)) {
    throw new ResponseFormatError(`Expected array "${key}" in ${endpoint} response`);
  }
  return value.map((element: unknown) => {
    if (!isRecord(element)) {
      throw new ResponseFormatError(`Expected objects in "${key}" of ${endpoint} response`);
    }
    return mapElement(element);
  });
}

function requireRecord(raw: unknown, endpoint: string): JsonRecord {
  if (!isRecord(raw)) {
    throw new ResponseFormatError(`Expected a JSON object from ${endpoint}`);
  }
  return raw;
}

// ─── Item Lookup ─────────────────────────────────────────────────────────────

/**
 * Parses the item lookup body.
 *
 * Wire shape:
 * `{ id, set_id, user_id, status, last_updated, checksum,
 *    set?: { status, ranked_date, submitted_date },
 *    top_tag_ids?: [{ tag_id, count }] }`
 */
export function parseItemResponse(raw: unknown, endpoint: string): ApiItem | null {
  if (isEmptyBody(raw)) return null;
  const body = requireRecord(raw, endpoint);

  let set: ApiItemSet | null = null;
  if (isRecord(body.set)) {
    set = {
      status: readStatus(body.set, 'status', endpoint),
      ranked: readOptionalDate(body.set, 'ranked_date', endpoint),
      submitted: readOptionalDate(body.set, 'submitted_date', endpoint),
    };
  }

  const topTags = readOptionalList<TopTagVote>(body, 'top_tag_ids', endpoint, (tag) => ({
    tagId: readInteger(tag, 'tag_id', endpoint),
    voteCount: readInteger(tag, 'count', endpoint),
  }));

  return {
    itemId: readInteger(body, 'id', endpoint),
    setId: readInteger(body, 'set_id', endpoint),
    authorId: readInteger(body, 'user_id', endpoint),
    status: readStatus(body, 'status', endpoint),
    lastUpdated: readDate(body, 'last_updated', endpoint),
    checksum: readString(body, 'checksum', endpoint),
    set,
    topTags,
  };
}

/**
 * Looks up a single item by content checksum and filename.
 */
export class GetItemRequest extends ApiRequest<ApiItem> {
  readonly endpoint = 'items/lookup';
  readonly params: RequestParams;

  constructor(
    readonly checksum: string | null,
    readonly filename: string,
  ) {
    super();
    this.params = { filename };
    if (checksum !== null) {
      this.params.checksum = checksum;
    }
  }

  protected parseResponse(raw: unknown): ApiItem | null {
    return parseItemResponse(raw, this.endpoint);
  }
}

// ─── Set Lookup ──────────────────────────────────────────────────────────────

/**
 * Parses the set body.
 *
 * Wire shape: `{ id, related_tags?: [{ id, name }] }`
 */
export function parseSetResponse(raw: unknown, endpoint: string): ApiSet | null {
  if (isEmptyBody(raw)) return null;
  const body = requireRecord(raw, endpoint);

  const relatedTags = readOptionalList<TagCatalogEntry>(body, 'related_tags', endpoint, (tag) => ({
    tagId: readInteger(tag, 'id', endpoint),
    name: readString(tag, 'name', endpoint),
  }));

  return {
    setId: readInteger(body, 'id', endpoint),
    relatedTags,
  };
}

/**
 * Fetches a set, including its related tag catalog.
 */
export class GetSetRequest extends ApiRequest<ApiSet> {
  readonly endpoint: string;
  readonly params: RequestParams = {};

  constructor(readonly setId: number) {
    super();
    this.endpoint = `sets/${setId}`;
  }

  protected parseResponse(raw: unknown): ApiSet | null {
    return parseSetResponse(raw, this.endpoint);
  }
}
