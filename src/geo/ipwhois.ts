import type { Logger } from 'pino';
import { z } from 'zod';
import { ReputationError, errorMessage, formatZodError } from '../errors/index.js';
import type { GeoLookupResult, GeoProvider } from './types.js';

export const DEFAULT_IPWHOIS_URL = 'https://ipwho.is';

const Text = z.string().nullish().transform((value) => value ?? '');

// ipwho.is returns borders as "CA,MX"; older payloads used a list
const Borders = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform((value) => {
    if (!value) return [];
    if (Array.isArray(value)) return value;
    return value
      .split(',')
      .map((code) => code.trim())
      .filter((code) => code.length > 0);
  });

const IpWhoisResponseSchema = z.object({
  ip: z.string().optional(),
  success: z.boolean().default(true),
  message: z.string().optional(),
  type: Text,
  continent: Text,
  continent_code: Text,
  country: Text,
  country_code: Text,
  region: Text,
  region_code: Text,
  city: Text,
  latitude: z.coerce.number().default(0),
  longitude: z.coerce.number().default(0),
  is_eu: z.boolean().default(false),
  postal: Text,
  calling_code: Text,
  capital: Text,
  borders: Borders,
  flag: z.object({ emoji: Text }).partial().default({}),
  connection: z
    .object({
      asn: z.coerce.number().default(0),
      org: Text,
      isp: Text,
      domain: Text,
    })
    .default({}),
  timezone: z
    .object({
      id: Text,
      abbr: Text,
      is_dst: z.boolean().default(false),
      offset: z.coerce.number().default(0),
      utc: Text,
      current_time: Text,
    })
    .default({}),
});

export type IpWhoisResponse = z.infer<typeof IpWhoisResponseSchema>;

export interface IpWhoisProviderOptions {
  baseUrl?: string;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Normalize an ipwho.is payload. Throws `LookupFailed` when the payload is
 * malformed or reports failure.
 */
export function parseIpWhoisResponse(ip: string, body: unknown): GeoLookupResult {
  const result = IpWhoisResponseSchema.safeParse(body);
  if (!result.success) {
    throw new ReputationError('LookupFailed', `Malformed geolocation response: ${formatZodError(result.error)}`);
  }

  const data = result.data;
  if (!data.success) {
    throw new ReputationError('LookupFailed', `API Error: ${data.message ?? 'Unknown error'}`);
  }

  return {
    ip,
    location: {
      type: data.type,
      continent: data.continent,
      continent_code: data.continent_code,
      country: data.country,
      country_code: data.country_code,
      region: data.region,
      region_code: data.region_code,
      city: data.city,
      latitude: data.latitude,
      longitude: data.longitude,
      is_eu: data.is_eu,
      postal: data.postal,
      calling_code: data.calling_code,
      capital: data.capital,
      borders: data.borders,
      country_flag: data.flag.emoji ?? '',
    },
    connection: {
      asn: data.connection.asn,
      org: data.connection.org,
      isp: data.connection.isp,
      domain: data.connection.domain,
    },
    timezone: {
      id: data.timezone.id,
      abbr: data.timezone.abbr,
      is_dst: data.timezone.is_dst,
      offset: data.timezone.offset,
      utc: data.timezone.utc,
      current_time: data.timezone.current_time,
    },
  };
}

/**
 * HTTP lookups against ipwho.is (or a compatible endpoint).
 */
export class IpWhoisProvider implements GeoProvider {
  readonly name = 'ipwhois';
  private baseUrl: string;
  private timeoutMs: number;
  private logger?: Logger;

  constructor(options: IpWhoisProviderOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_IPWHOIS_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger?.child({ module: 'geo-ipwhois' });
  }

  async lookup(ip: string): Promise<GeoLookupResult> {
    const url = `${this.baseUrl}/${encodeURIComponent(ip)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger?.warn({ ip, err: error }, 'Geolocation request failed');
      throw new ReputationError('LookupFailed', `Failed to fetch IP data: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ReputationError('LookupFailed', `Failed to fetch IP data: HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ReputationError('LookupFailed', `Failed to parse API response: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.logger?.debug({ ip }, 'Geolocation lookup completed');
    return parseIpWhoisResponse(ip, body);
  }
}
