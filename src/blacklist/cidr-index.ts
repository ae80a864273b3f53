import type { Logger } from 'pino';
import { z } from 'zod';
import { ReputationError } from '../errors/index.js';
import { canonicalAddress, isValidAddress, parseAddressOrNetwork, rangeContains } from '../net/index.js';
import type { ParsedRange } from '../net/index.js';
import type { BlacklistEntry } from './types.js';

const SAMPLE_SIZE = 5;

export const BlacklistIndexDocumentSchema = z.object({
  single_ips: z.array(z.string()).default([]),
  networks: z.array(z.string()).default([]),
  last_upload_time: z.string().nullable().default(null),
});

export type BlacklistIndexDocument = z.infer<typeof BlacklistIndexDocumentSchema>;

export interface UploadResult {
  processed: number;
  valid: number;
  invalid: number;
}

export interface BlacklistIndexStatus {
  singleCount: number;
  networkCount: number;
  lastUploadTime: string | null;
  sample: {
    singleIps: string[];
    networks: string[];
  };
}

/**
 * Immutable view of the index. Every mutation builds a new snapshot and swaps it
 * in with a single assignment, so a reader holds either the old or the new set.
 */
interface IndexSnapshot {
  readonly singles: ReadonlySet<string>;
  readonly networks: ReadonlyMap<string, ParsedRange>;
  readonly lastUploadTime: string | null;
}

const EMPTY_SNAPSHOT: IndexSnapshot = {
  singles: new Set(),
  networks: new Map(),
  lastUploadTime: null,
};

/**
 * Membership index over single addresses and CIDR networks.
 */
export class CidrBlacklistIndex {
  private snapshot: IndexSnapshot = EMPTY_SNAPSHOT;
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger?.child({ module: 'blacklist-index' });
  }

  add(entryOrCidr: string | BlacklistEntry): void {
    const value = typeof entryOrCidr === 'string' ? entryOrCidr : entryOrCidr.ip_or_cidr;
    const parsed = parseAddressOrNetwork(value);
    if (!parsed) {
      throw new ReputationError('InvalidAddress', `Invalid IP address or CIDR: ${value}`);
    }

    const current = this.snapshot;
    if (parsed.kind === 'single') {
      const singles = new Set(current.singles);
      singles.add(parsed.canonical);
      this.snapshot = { ...current, singles };
    } else {
      const networks = new Map(current.networks);
      networks.set(parsed.canonical, parsed);
      this.snapshot = { ...current, networks };
    }
  }

  /**
   * Remove an address or network. Removing something absent, or something that
   * does not parse, is a no-op.
   */
  remove(ipOrCidr: string): boolean {
    const parsed = parseAddressOrNetwork(ipOrCidr);
    if (!parsed) return false;

    const current = this.snapshot;
    if (parsed.kind === 'single') {
      if (!current.singles.has(parsed.canonical)) return false;
      const singles = new Set(current.singles);
      singles.delete(parsed.canonical);
      this.snapshot = { ...current, singles };
      return true;
    }

    if (!current.networks.has(parsed.canonical)) return false;
    const networks = new Map(current.networks);
    networks.delete(parsed.canonical);
    this.snapshot = { ...current, networks };
    return true;
  }

  contains(ip: string): boolean {
    const canonical = isValidAddress(ip) ? canonicalAddress(ip) : null;
    if (canonical === null) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${ip}`);
    }

    const snapshot = this.snapshot;
    if (snapshot.singles.has(canonical)) {
      return true;
    }
    for (const network of snapshot.networks.values()) {
      if (rangeContains(network, ip)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Replace the whole index with `entries`. Invalid entries are counted and skipped.
   */
  bulkReplace(entries: readonly string[]): UploadResult {
    const singles = new Set<string>();
    const networks = new Map<string, ParsedRange>();
    let valid = 0;
    let invalid = 0;

    for (const entry of entries) {
      const parsed = parseAddressOrNetwork(entry);
      if (!parsed) {
        invalid++;
        continue;
      }
      if (parsed.kind === 'single') {
        singles.add(parsed.canonical);
      } else {
        networks.set(parsed.canonical, parsed);
      }
      valid++;
    }

    this.snapshot = { singles, networks, lastUploadTime: new Date().toISOString() };

    this.logger?.info(
      { processed: entries.length, valid, invalid, singles: singles.size, networks: networks.size },
      'Blacklist replaced'
    );

    return { processed: entries.length, valid, invalid };
  }

  status(): BlacklistIndexStatus {
    const { singles, networks, lastUploadTime } = this.snapshot;
    return {
      singleCount: singles.size,
      networkCount: networks.size,
      lastUploadTime,
      sample: {
        singleIps: [...singles].slice(0, SAMPLE_SIZE),
        networks: [...networks.keys()].slice(0, SAMPLE_SIZE),
      },
    };
  }

  toDocument(): BlacklistIndexDocument {
    const { singles, networks, lastUploadTime } = this.snapshot;
    return {
      single_ips: [...singles],
      networks: [...networks.keys()],
      last_upload_time: lastUploadTime,
    };
  }

  /**
   * Restore a saved index. Entries that no longer parse are dropped and logged.
   */
  loadDocument(document: BlacklistIndexDocument): void {
    const singles = new Set<string>();
    const networks = new Map<string, ParsedRange>();
    const rejected: string[] = [];

    for (const entry of [...document.single_ips, ...document.networks]) {
      const parsed = parseAddressOrNetwork(entry);
      if (!parsed) {
        rejected.push(entry);
      } else if (parsed.kind === 'single') {
        singles.add(parsed.canonical);
      } else {
        networks.set(parsed.canonical, parsed);
      }
    }

    if (rejected.length > 0) {
      this.logger?.warn({ rejected }, 'Ignored invalid entries in blacklist document');
    }

    this.snapshot = { singles, networks, lastUploadTime: document.last_upload_time };
  }
}
