/**
 * Media Metadata Lookup - library entry point
 *
 * Wires the HTTP transport, the online API source, the optional local cache
 * and the logger into a ready-to-use MetadataLookup.
 */

import type { LookupSettings } from '../shared/types';
import { ApiMetadataSource } from './services/apiMetadataSource';
import { ConnectivityState, HttpApiTransport } from './services/apiTransport';
import { LocalCachedMetadataSource, MetadataCache } from './services/localMetadataCache';
import { Logger } from './services/logger';
import { MetadataLookup } from './services/metadataLookup';

export * from '../shared/types';
export * from './services/errors';
export * from './services/logger';
export * from './services/apiRequests';
export * from './services/apiTransport';
export * from './services/apiMetadataSource';
export * from './services/localMetadataCache';
export * from './services/metadataLookup';
export * from './services/settingsManager';

/** Optional overrides for createMetadataLookup */
export interface CreateMetadataLookupOptions {
  /** Connectivity the transport starts in. Defaults to 'offline' */
  initialState?: ConnectivityState;
  /** Logger to use instead of one built from the settings */
  logger?: Logger;
}

/** Everything createMetadataLookup builds, for the caller to own */
export interface MetadataLookupStack {
  logger: Logger;
  transport: HttpApiTransport;
  apiSource: ApiMetadataSource;
  /** Null when useLocalCache is off */
  cacheSource: LocalCachedMetadataSource | null;
  lookup: MetadataLookup;
}

/**
 * Builds a MetadataLookup from settings. The cache source, when enabled,
 * is asked before the online API.
 */
export async function createMetadataLookup(
  settings: LookupSettings,
  options: CreateMetadataLookupOptions = {},
): Promise<MetadataLookupStack> {
  let logger = options.logger;
  if (!logger) {
    logger = new Logger({
      logDir: settings.logDir ?? undefined,
      minLevel: settings.logLevel,
    });
    await logger.initialize();
  }

  const transport = new HttpApiTransport({
    apiBaseUrl: settings.apiBaseUrl,
    timeoutMs: settings.requestTimeoutMs,
    userAgent: settings.userAgent,
    accessToken: settings.accessToken,
    initialState: options.initialState,
  });

  const apiSource = new ApiMetadataSource(transport, logger);

  let cacheSource: LocalCachedMetadataSource | null = null;
  if (settings.useLocalCache) {
    cacheSource = new LocalCachedMetadataSource(new MetadataCache(), logger);
  }

  const sources = cacheSource ? [cacheSource, apiSource] : [apiSource];
  const lookup = new MetadataLookup(sources, logger);

  return { logger, transport, apiSource, cacheSource, lookup };
}
