import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { CachingGeoProvider } from './cache.js';
import { IpWhoisProvider } from './ipwhois.js';
import { MaxMindGeoProvider } from './maxmind.js';
import type { GeoProvider } from './types.js';

/**
 * Build the configured provider, wrapped in an LRU cache unless
 * `cache_ttl_seconds` is 0.
 */
export async function createGeoProvider(config: Config['geo'], logger?: Logger): Promise<GeoProvider> {
  const provider: GeoProvider =
    config.provider === 'maxmind'
      ? await MaxMindGeoProvider.open(config.maxmind_db_path, logger)
      : new IpWhoisProvider({ baseUrl: config.base_url, timeoutMs: config.timeout_ms, logger });

  logger?.info({ provider: provider.name }, 'Geolocation provider ready');

  if (config.cache_ttl_seconds === 0) {
    return provider;
  }
  return new CachingGeoProvider(provider, {
    maxEntries: config.cache_max_entries,
    ttlMs: config.cache_ttl_seconds * 1000,
    logger,
  });
}

export { CachingGeoProvider, LRUCache } from './cache.js';
export { IpWhoisProvider, parseIpWhoisResponse, DEFAULT_IPWHOIS_URL } from './ipwhois.js';
export { MaxMindGeoProvider, cityToLookupResult } from './maxmind.js';
export type { GeoProvider, GeoLookupResult, LocationInfo, ConnectionInfo, TimezoneInfo } from './types.js';
