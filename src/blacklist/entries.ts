import type { Logger } from 'pino';
import { ReputationError, formatZodError } from '../errors/index.js';
import { isValidAddress, parseAddressOrNetwork, rangeContains } from '../net/index.js';
import type { ParsedRange } from '../net/index.js';
import { BlacklistEntryInputSchema } from './types.js';
import type { BlacklistEntry, BlacklistEntriesDocument, BlacklistEntryInput } from './types.js';

interface StoredEntry {
  entry: BlacklistEntry;
  range: ParsedRange;
}

function isExpired(entry: BlacklistEntry, now: Date): boolean {
  return entry.expires_at !== null && new Date(entry.expires_at) < now;
}

/**
 * Validate and normalize a blacklist entry. Throws `ValidationError` for a bad
 * shape or expiry, `InvalidAddress` for an unparseable address.
 */
export function createBlacklistEntry(input: BlacklistEntryInput, now: Date = new Date()): BlacklistEntry {
  const result = BlacklistEntryInputSchema.safeParse(input);
  if (!result.success) {
    throw new ReputationError('ValidationError', formatZodError(result.error));
  }

  const data = result.data;
  const range = parseAddressOrNetwork(data.ip_or_cidr);
  if (!range) {
    throw new ReputationError('InvalidAddress', `Invalid IP address or CIDR: ${data.ip_or_cidr}`);
  }

  const addedAt = data.added_at ? new Date(data.added_at) : now;
  const expiresAt = data.expires_at ? new Date(data.expires_at) : null;
  if (expiresAt && expiresAt <= addedAt) {
    throw new ReputationError('ValidationError', 'expires_at must be after added_at');
  }

  return {
    ip_or_cidr: range.canonical,
    reason: data.reason,
    added_at: addedAt.toISOString(),
    expires_at: expiresAt ? expiresAt.toISOString() : null,
    notes: data.notes ?? null,
  };
}

/**
 * Individually managed blacklist entries with reasons and optional expiry.
 * Expiry is enforced when a lookup observes the entry, there is no sweeper.
 */
export class ManualBlacklist {
  private entries = new Map<string, StoredEntry>();
  private logger?: Logger;
  private now: () => Date;

  constructor(options: { logger?: Logger; now?: () => Date } = {}) {
    this.logger = options.logger?.child({ module: 'manual-blacklist' });
    this.now = options.now ?? (() => new Date());
  }

  add(input: BlacklistEntryInput): BlacklistEntry {
    const entry = createBlacklistEntry(input, this.now());
    this.store(entry);
    this.logger?.info({ target: entry.ip_or_cidr, reason: entry.reason }, 'Blacklist entry added');
    return entry;
  }

  remove(ipOrCidr: string): boolean {
    const range = parseAddressOrNetwork(ipOrCidr);
    if (!range) return false;
    return this.entries.delete(range.canonical);
  }

  /**
   * Return the entry covering `ip`, if any. An exact entry wins over a network entry.
   */
  check(ip: string): BlacklistEntry | null {
    if (!isValidAddress(ip)) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${ip}`);
    }

    const now = this.now();
    const exact = parseAddressOrNetwork(ip);
    const candidates: StoredEntry[] = [];
    const exactEntry = exact ? this.entries.get(exact.canonical) : undefined;
    if (exactEntry) {
      candidates.push(exactEntry);
    }
    for (const stored of this.entries.values()) {
      if (stored.range.kind === 'network' && rangeContains(stored.range, ip)) {
        candidates.push(stored);
      }
    }

    for (const stored of candidates) {
      if (isExpired(stored.entry, now)) {
        this.entries.delete(stored.range.canonical);
        this.logger?.debug({ target: stored.entry.ip_or_cidr }, 'Evicted expired blacklist entry');
        continue;
      }
      return stored.entry;
    }
    return null;
  }

  list(): BlacklistEntry[] {
    return [...this.entries.values()].map((stored) => stored.entry);
  }

  size(): number {
    return this.entries.size;
  }

  toDocument(): BlacklistEntriesDocument {
    const document: BlacklistEntriesDocument = {};
    for (const [key, stored] of this.entries) {
      document[key] = stored.entry;
    }
    return document;
  }

  /**
   * Replace all entries with the ones from a saved document.
   */
  loadDocument(document: BlacklistEntriesDocument): void {
    const next = new Map<string, StoredEntry>();
    for (const entry of Object.values(document)) {
      const range = parseAddressOrNetwork(entry.ip_or_cidr);
      if (!range) {
        this.logger?.warn({ target: entry.ip_or_cidr }, 'Ignored invalid blacklist entry');
        continue;
      }
      next.set(range.canonical, { entry: { ...entry, ip_or_cidr: range.canonical }, range });
    }
    this.entries = next;
  }

  private store(entry: BlacklistEntry): void {
    const range = parseAddressOrNetwork(entry.ip_or_cidr);
    if (!range) {
      throw new ReputationError('InvalidAddress', `Invalid IP address or CIDR: ${entry.ip_or_cidr}`);
    }
    this.entries.set(range.canonical, { entry, range });
  }
}
