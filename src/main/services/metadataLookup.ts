/**
 * Metadata Lookup Chain
 *
 * Asks an ordered list of metadata sources for an item's online metadata.
 * The first source that gives a definitive answer (hit or authoritative miss)
 * ends the search; inconclusive misses fall through to the next source.
 * Hits coming from a source that is not itself a store are written back to
 * every store in the chain.
 */

import type { ContainingSetRef, LocalItemRef, LookupResult, OnlineMetadata, OnlineMetadataSource } from '../../shared/types';
import { ContractError, wrapError } from './errors';
import type { ItemLogger } from './logger';
import { isMetadataStore, type MetadataStore } from './localMetadataCache';

/** Result of a chained lookup */
export interface MetadataLookupResult {
  /** Metadata from the answering source, null on any miss */
  metadata: OnlineMetadata | null;
  /** Name of the source that answered definitively, null if none did */
  source: string | null;
  /** Per-source results, in the order the sources were asked */
  attempts: Array<{ source: string; result: LookupResult }>;
}

/**
 * Tries each metadata source in turn.
 *
 * Usage:
 * ```typescript
 * const lookup = new MetadataLookup([cacheSource, apiSource], logger);
 * const { metadata, source } = await lookup.lookup(item);
 * ```
 */
export class MetadataLookup {
  private readonly stores: Array<OnlineMetadataSource & MetadataStore>;

  constructor(
    private readonly sources: readonly OnlineMetadataSource[],
    private readonly logger: ItemLogger,
  ) {
    this.stores = sources.filter((source): source is OnlineMetadataSource & MetadataStore =>
      isMetadataStore(source),
    );
  }

  /** Names of the configured sources, in lookup order */
  get sourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }

  /** Whether at least one source can currently answer */
  get available(): boolean {
    return this.sources.some((source) => source.available);
  }

  /**
   * Looks up an item across all available sources.
   * When no source is available the result is an empty miss, whatever the item.
   *
   * @throws ContractError if a source is available and the item has no containing set
   */
  async lookup(item: LocalItemRef): Promise<MetadataLookupResult> {
    const attempts: MetadataLookupResult['attempts'] = [];
    if (!this.available) {
      return this.unresolved(item, attempts);
    }

    const set = item.set;
    if (!set) {
      throw new ContractError('Lookup item must belong to a set', { item: item.filename });
    }

    for (const source of this.sources) {
      if (!source.available) continue;

      const result = await source.tryLookup(item);
      attempts.push({ source: source.name, result });

      if (!result.found) continue;

      if (result.metadata) {
        this.writeBack(result.metadata, source, item, set);
      }

      return { metadata: result.metadata, source: source.name, attempts };
    }

    return this.unresolved(item, attempts);
  }

  /**
   * Disposes every source, even when one of them throws.
   * The first failure is rethrown once all sources were disposed.
   */
  dispose(): void {
    let firstError: unknown = null;
    for (const source of this.sources) {
      try {
        source.dispose();
      } catch (error: unknown) {
        firstError ??= error;
      }
    }
    if (firstError !== null) {
      throw firstError;
    }
  }

  private unresolved(item: LocalItemRef, attempts: MetadataLookupResult['attempts']): MetadataLookupResult {
    if (item.set) {
      this.logger.logForItem(item.set, `No metadata source could resolve ${item.filename}`, {
        level: 'WARN',
        item: item.filename,
        source: 'MetadataLookup',
      });
    }
    return { metadata: null, source: null, attempts };
  }

  private writeBack(
    metadata: OnlineMetadata,
    answeredBy: OnlineMetadataSource,
    item: LocalItemRef,
    set: ContainingSetRef,
  ): void {
    for (const store of this.stores) {
      if (store === answeredBy || !store.available) continue;

      try {
        store.store(metadata);
      } catch (error: unknown) {
        const cacheError = wrapError(error, 'CacheError', { item: item.filename, step: 'write-back' });
        this.logger.logForItem(set, `Failed to store metadata for ${item.filename} in ${store.name}`, {
          level: 'WARN',
          category: cacheError.category,
          item: item.filename,
          source: 'MetadataLookup',
          cause: cacheError.message,
        });
      }
    }
  }
}
