import type { ErrorKind } from '../errors/index.js';
import type { BlacklistEntry } from '../blacklist/index.js';
import type { GeoLookupResult } from '../geo/types.js';

export interface ReputationScore {
  subjectIp: string;
  totalScore: number;
  attributeScores: Record<string, number>;
  factors: string[];
  computedAt: string;
  blacklisted: boolean;
}

export type BlacklistSource = 'index' | 'entry';

export type AnalysisResult =
  | {
      status: 'blacklisted';
      ip: string;
      reputationScore: ReputationScore;
      source: BlacklistSource;
      blacklistEntry: BlacklistEntry | null;
    }
  | {
      status: 'active';
      ip: string;
      reputationScore: ReputationScore;
      source: 'computed' | 'cache';
      geo: GeoLookupResult | null;
    }
  | {
      status: 'error';
      ip: string;
      error: { kind: ErrorKind; message: string };
    };

export interface AnalyzeOptions {
  // Skip the stored-score cache
  refresh?: boolean;
}
