// Geolocation record for one address
export interface LocationInfo {
  type: string;
  continent: string;
  continent_code: string;
  country: string;
  country_code: string;
  region: string;
  region_code: string;
  city: string;
  latitude: number;
  longitude: number;
  is_eu: boolean;
  postal: string;
  calling_code: string;
  capital: string;
  borders: string[];
  country_flag: string;
}

export interface ConnectionInfo {
  asn: number;
  org: string;
  isp: string;
  domain: string;
}

export interface TimezoneInfo {
  id: string;
  abbr: string;
  is_dst: boolean;
  offset: number;
  utc: string;
  current_time: string;
}

export interface GeoLookupResult {
  ip: string;
  location: LocationInfo;
  connection: ConnectionInfo;
  timezone: TimezoneInfo;
}

/**
 * Source of geolocation and connection facts. Implementations reject with a
 * `LookupFailed` ReputationError; retrying is up to the implementation.
 */
export interface GeoProvider {
  readonly name: string;
  lookup(ip: string): Promise<GeoLookupResult>;
}
