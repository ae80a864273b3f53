import type { Evaluation } from '../rules/index.js';
import type { GeoLookupResult } from '../geo/types.js';

export const BASELINE_SCORE = 100;

export const PROXY_DOMAIN_SUFFIXES = ['.proxy', '.vpn', '.tor'] as const;
export const PROXY_PENALTY = -20;
export const PROXY_PENALTY_KEY = 'proxy_penalty';
export const PROXY_PENALTY_FACTOR = 'Proxy/VPN detection penalty';

export interface AdjustedScore {
  totalScore: number;
  attributeScores: Record<string, number>;
  factors: string[];
}

export function isProxyDomain(domain: string): boolean {
  const normalized = domain.trim().toLowerCase();
  return PROXY_DOMAIN_SUFFIXES.some((suffix) => normalized.endsWith(suffix));
}

/**
 * Fixed adjustments applied after rule evaluation, in order: baseline offset,
 * proxy penalty, floor at zero.
 */
export function applyStructuralAdjustments(evaluation: Evaluation, lookup: GeoLookupResult): AdjustedScore {
  const attributeScores = { ...evaluation.breakdown };
  const factors = [...evaluation.factors];
  let total = BASELINE_SCORE + evaluation.total;

  if (isProxyDomain(lookup.connection.domain)) {
    total += PROXY_PENALTY;
    attributeScores[PROXY_PENALTY_KEY] = PROXY_PENALTY;
    factors.push(PROXY_PENALTY_FACTOR);
  }

  return { totalScore: Math.max(0, total), attributeScores, factors };
}
