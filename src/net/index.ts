import net from 'net';
import IPCIDR from 'ip-cidr';
import { Address6 } from 'ip-address';

export type AddressFamily = 4 | 6;

export interface ParsedRange {
  /** Canonical text: a bare address for single hosts, `network/prefix` otherwise */
  canonical: string;
  family: AddressFamily;
  kind: 'single' | 'network';
  cidr: IPCIDR;
}

const PREFIX_REGEX = /^\d{1,3}$/;

/**
 * IPv4 or IPv6 literal, without prefix.
 */
export function isValidAddress(value: string): boolean {
  return net.isIP(value) !== 0;
}

function familyOf(address: string): AddressFamily | null {
  const version = net.isIP(address);
  if (version === 4 || version === 6) {
    return version;
  }
  return null;
}

function maxPrefix(family: AddressFamily): number {
  return family === 4 ? 32 : 128;
}

/**
 * Dotted quad for IPv4, RFC 5952 compressed lowercase text for IPv6.
 */
function formatAddress(address: string, family: AddressFamily): string {
  return family === 6 ? new Address6(address).correctForm() : address;
}

/**
 * Parse an address or a CIDR network. Host bits set inside a network are masked
 * (10.0.0.5/24 becomes 10.0.0.0/24). A network holding a single address is
 * reported as `single`. Returns null when the input is not valid.
 */
export function parseAddressOrNetwork(input: string): ParsedRange | null {
  const value = input.trim();
  if (!value) return null;

  const parts = value.split('/');
  if (parts.length > 2) return null;

  const [address, prefixText] = parts;
  const family = familyOf(address);
  if (family === null) return null;

  let prefix = maxPrefix(family);
  if (prefixText !== undefined) {
    if (!PREFIX_REGEX.test(prefixText)) return null;
    prefix = parseInt(prefixText, 10);
    if (prefix > maxPrefix(family)) return null;
  }

  let cidr: IPCIDR;
  try {
    cidr = new IPCIDR(`${address}/${prefix}`);
  } catch {
    return null;
  }

  const start = formatAddress(String(cidr.start()), family);
  if (prefix === maxPrefix(family)) {
    return { canonical: start, family, kind: 'single', cidr };
  }
  return { canonical: `${start}/${prefix}`, family, kind: 'network', cidr };
}

/**
 * Canonical form of a single address, so that differently written literals of the
 * same host compare equal.
 */
export function canonicalAddress(ip: string): string | null {
  const parsed = parseAddressOrNetwork(ip);
  if (!parsed || parsed.kind !== 'single' || ip.includes('/')) {
    return null;
  }
  return parsed.canonical;
}

export function rangeContains(range: ParsedRange, ip: string): boolean {
  const family = familyOf(ip);
  if (family === null || family !== range.family) {
    return false;
  }
  if (range.kind === 'single') {
    return canonicalAddress(ip) === range.canonical;
  }
  try {
    return range.cidr.contains(ip);
  } catch {
    return false;
  }
}
