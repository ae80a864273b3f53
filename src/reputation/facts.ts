import type { Facts } from '../rules/index.js';
import type { GeoLookupResult } from '../geo/types.js';

/**
 * Flatten a lookup into the fact map rules are evaluated against. The typed
 * attributes are followed by pass-through facts that only rule conditions use.
 */
export function buildFacts(lookup: GeoLookupResult): Facts {
  const { location, connection, timezone } = lookup;
  return {
    is_eu: location.is_eu,
    country: location.country,
    country_code: location.country_code,
    city: location.city,
    continent: location.continent,
    continent_code: location.continent_code,
    region: location.region,
    region_code: location.region_code,
    latitude: location.latitude,
    longitude: location.longitude,
    connection_type: location.type,
    isp: connection.isp,
    org: connection.org,
    asn: connection.asn,

    domain: connection.domain,
    postal: location.postal,
    calling_code: location.calling_code,
    capital: location.capital,
    timezone: timezone.id,
  };
}
