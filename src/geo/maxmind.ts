import { Reader } from '@maxmind/geoip2-node';
import type { ReaderModel } from '@maxmind/geoip2-node';
import { existsSync } from 'fs';
import type { Logger } from 'pino';
import { ReputationError, errorMessage } from '../errors/index.js';
import type { GeoLookupResult, GeoProvider } from './types.js';

type CityResponse = ReturnType<ReaderModel['city']>;

/**
 * Convert a GeoIP2/GeoLite2 City record. Connection fields are only present in
 * the commercial databases; they default to empty values.
 */
export function cityToLookupResult(ip: string, response: CityResponse): GeoLookupResult {
  const subdivision = response.subdivisions?.[0];
  return {
    ip,
    location: {
      type: ip.includes(':') ? 'IPv6' : 'IPv4',
      continent: response.continent?.names.en ?? '',
      continent_code: response.continent?.code ?? '',
      country: response.country?.names.en ?? '',
      country_code: response.country?.isoCode ?? '',
      region: subdivision?.names.en ?? '',
      region_code: subdivision?.isoCode ?? '',
      city: response.city?.names.en ?? '',
      latitude: response.location?.latitude ?? 0,
      longitude: response.location?.longitude ?? 0,
      is_eu: response.country?.isInEuropeanUnion ?? false,
      postal: response.postal?.code ?? '',
      calling_code: '',
      capital: '',
      borders: [],
      country_flag: '',
    },
    connection: {
      asn: response.traits?.autonomousSystemNumber ?? 0,
      org: response.traits?.organization ?? response.traits?.autonomousSystemOrganization ?? '',
      isp: response.traits?.isp ?? '',
      domain: response.traits?.domain ?? '',
    },
    timezone: {
      id: response.location?.timeZone ?? '',
      abbr: '',
      is_dst: false,
      offset: 0,
      utc: '',
      current_time: '',
    },
  };
}

/**
 * Offline lookups from a local MaxMind City database.
 */
export class MaxMindGeoProvider implements GeoProvider {
  readonly name = 'maxmind';
  private reader: ReaderModel;

  private constructor(reader: ReaderModel) {
    this.reader = reader;
  }

  static async open(dbPath: string, logger?: Logger): Promise<MaxMindGeoProvider> {
    const log = logger?.child({ module: 'geo-maxmind' });
    if (!existsSync(dbPath)) {
      log?.warn({ path: dbPath }, 'GeoIP database not found');
      throw new ReputationError('LookupFailed', `GeoIP database not found: ${dbPath}`);
    }

    try {
      const reader = await Reader.open(dbPath);
      log?.info({ path: dbPath }, 'GeoIP database loaded');
      return new MaxMindGeoProvider(reader);
    } catch (error) {
      log?.error({ err: error, path: dbPath }, 'Failed to load GeoIP database');
      throw new ReputationError('LookupFailed', `Failed to load GeoIP database: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async lookup(ip: string): Promise<GeoLookupResult> {
    try {
      return cityToLookupResult(ip, this.reader.city(ip));
    } catch (error) {
      // IP not found in database or invalid IP
      throw new ReputationError('LookupFailed', `GeoIP lookup failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
