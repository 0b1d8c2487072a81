/**
 * Online API Metadata Source
 *
 * Resolves canonical online metadata for a local item by content checksum and
 * filename, then enriches a hit with the item's community tags through a
 * second request for the owning set's tag catalog.
 *
 * Requests are awaited one after the other, never in parallel, to bound the
 * load a single lookup puts on the online service.
 */

import type {
  ApiItem,
  LocalItemRef,
  LookupResult,
  OnlineMetadata,
  OnlineMetadataSource,
  TagCatalogEntry,
  TopTagVote,
} from '../../shared/types';
import type { ApiTransport } from './apiTransport';
import { GetItemRequest, GetSetRequest } from './apiRequests';
import { ContractError, errorMessage, wrapError } from './errors';
import type { ItemLogger } from './logger';

const SOURCE_NAME = 'ApiMetadataSource';

// ─── Tag Ranking ─────────────────────────────────────────────────────────────

/**
 * Joins top tag votes with catalog entries on tagId and returns the tag names
 * ordered by vote count (descending), then name (ascending, ordinal).
 *
 * Votes without a catalog entry are dropped, as are catalog entries nobody
 * voted for. Duplicate catalog ids resolve to the last entry.
 */
export function rankUserTags(topTags: readonly TopTagVote[], catalog: readonly TagCatalogEntry[]): string[] {
  const tagsById = new Map<number, TagCatalogEntry>();
  for (const entry of catalog) {
    tagsById.set(entry.tagId, entry);
  }

  const pairs: Array<{ vote: TopTagVote; entry: TagCatalogEntry }> = [];
  for (const vote of topTags) {
    const entry = tagsById.get(vote.tagId);
    if (entry) {
      pairs.push({ vote, entry });
    }
  }

  return pairs
    .sort((a, b) => {
      if (a.vote.voteCount !== b.vote.voteCount) return b.vote.voteCount - a.vote.voteCount;
      if (a.entry.name < b.entry.name) return -1;
      if (a.entry.name > b.entry.name) return 1;
      return 0;
    })
    .map((pair) => pair.entry.name);
}

/**
 * Maps an item response onto a fresh OnlineMetadata with no user tags.
 */
export function mapItemToMetadata(item: ApiItem): OnlineMetadata {
  return {
    itemId: item.itemId,
    setId: item.setId,
    authorId: item.authorId,
    itemStatus: item.status,
    setStatus: item.set?.status ?? null,
    dateRanked: item.set?.ranked ?? null,
    dateSubmitted: item.set?.submitted ?? null,
    checksum: item.checksum,
    lastUpdated: item.lastUpdated,
    userTags: [],
  };
}

function describeItem(item: LocalItemRef): string {
  return item.checksum ? `${item.filename} (${item.checksum})` : item.filename;
}

// ─── Source ──────────────────────────────────────────────────────────────────

/**
 * Performs online metadata lookups against the online API.
 */
export class ApiMetadataSource implements OnlineMetadataSource {
  readonly name = SOURCE_NAME;

  constructor(
    private readonly transport: ApiTransport,
    private readonly logger: ItemLogger,
  ) {}

  /** Whether the online service is reachable right now */
  get available(): boolean {
    return this.transport.state === 'online';
  }

  /**
   * Looks up online metadata for a local item.
   *
   * Resolves to an inconclusive miss when offline, on transport errors and on
   * empty responses; to a definitive miss when the service rejects the lookup;
   * to a hit otherwise. Tag enrichment failures never affect the result.
   *
   * @throws ContractError if the item has no containing set
   */
  async tryLookup(item: LocalItemRef): Promise<LookupResult> {
    if (!this.available) {
      return { found: false, metadata: null, reason: 'unavailable' };
    }

    const set = item.set;
    if (!set) {
      throw new ContractError('Lookup item must belong to a set', { item: describeItem(item) });
    }

    const itemInfo = describeItem(item);
    const request = new GetItemRequest(item.checksum, item.filename);

    try {
      await this.transport.perform(request);
    } catch (error: unknown) {
      const lookupError = wrapError(error, 'TransportError', { item: itemInfo });
      this.logger.logForItem(set, `Online retrieval failed for ${itemInfo}`, {
        level: 'WARN',
        category: lookupError.category,
        item: itemInfo,
        source: SOURCE_NAME,
        cause: lookupError.message,
      });
      return { found: false, metadata: null, reason: 'transport-error' };
    }

    if (request.completionState === 'failed') {
      this.logger.logForItem(set, `Online retrieval failed for ${itemInfo}`, {
        level: 'WARN',
        item: itemInfo,
        source: SOURCE_NAME,
        cause: request.error?.message,
      });
      return { found: true, metadata: null, reason: 'not-found' };
    }

    const response = request.response;
    if (!response) {
      return { found: false, metadata: null, reason: 'empty-response' };
    }

    this.logger.logForItem(set, `Online retrieval mapped ${itemInfo} to ${response.setId} / ${response.itemId}.`, {
      item: itemInfo,
      source: SOURCE_NAME,
    });

    const metadata = mapItemToMetadata(response);

    try {
      await this.populateUserTags(metadata, response);
    } catch (error: unknown) {
      this.logger.logForItem(set, `Failed to populate user tags for ${itemInfo}`, {
        level: 'WARN',
        item: itemInfo,
        source: SOURCE_NAME,
        cause: errorMessage(error),
      });
    }

    return { found: true, metadata };
  }

  /**
   * Fetches the set's tag catalog and appends the ranked tag names.
   * Leaves userTags empty when there are no votes or no catalog.
   */
  private async populateUserTags(metadata: OnlineMetadata, item: ApiItem): Promise<void> {
    if (!item.topTags || item.topTags.length === 0) return;

    const setRequest = new GetSetRequest(item.setId);
    await this.transport.perform(setRequest);

    const relatedTags = setRequest.response?.relatedTags;
    if (setRequest.completionState !== 'completed' || !relatedTags) return;

    metadata.userTags.push(...rankUserTags(item.topTags, relatedTags));
  }

  dispose(): void {
    // Nothing held beyond the transport reference, which the caller owns.
  }
}
