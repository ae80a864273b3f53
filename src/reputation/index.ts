/**
 * Reputation orchestrator
 *
 * Scores an IP through a layered pipeline:
 *
 * 1. Validate - reject anything that is not an IPv4/IPv6 literal
 * 2. Blacklist - bulk CIDR index, then manual entries (short circuit to 0)
 * 3. Cache - reuse a stored score younger than the configured TTL
 * 4. Geo lookup - one provider call, failures become error results
 * 5. Rules - evaluate the current rule system against the fact map
 * 6. Adjustments - baseline, proxy penalty, floor
 * 7. Persist - upsert into the score store
 *
 * Every decision is logged with its outcome and duration.
 */

import type { Logger } from 'pino';
import { CidrBlacklistIndex, ManualBlacklist, BlacklistEntriesDocumentSchema, BlacklistIndexDocumentSchema } from '../blacklist/index.js';
import type { BlacklistEntry, BlacklistEntryInput, BlacklistIndexStatus, UploadResult } from '../blacklist/index.js';
import { ReputationError, errorMessage, isReputationError } from '../errors/index.js';
import type { GeoLookupResult, GeoProvider } from '../geo/types.js';
import { canonicalAddress, isValidAddress } from '../net/index.js';
import { RuleSystem } from '../rules/index.js';
import type { Evaluation, Facts, PointRule, RuleGroup } from '../rules/index.js';
import { readJsonDocument, writeJsonDocument } from '../storage/documents.js';
import type { BulkOutcome, ScoreStats, ScoreStore } from '../storage/index.js';
import { applyStructuralAdjustments } from './adjustments.js';
import { buildFacts } from './facts.js';
import type { AnalysisResult, AnalyzeOptions, BlacklistSource, ReputationScore } from './types.js';

export const BLACKLISTED_FACTOR = 'IP is blacklisted';

export interface OrchestratorOptions {
  // Reuse stored scores younger than this; 0 disables the cache
  cacheTtlSeconds?: number;
  // When set, uploads and manual entry changes are written through to these documents
  blacklistIndexPath?: string;
  blacklistEntriesPath?: string;
  now?: () => Date;
}

export interface OrchestratorDeps {
  ruleSystem: RuleSystem;
  blacklistIndex: CidrBlacklistIndex;
  manualBlacklist: ManualBlacklist;
  geoProvider: GeoProvider;
  scoreStore: ScoreStore;
  logger: Logger;
}

type PipelineOutcome = Exclude<AnalysisResult, { status: 'error' }>;

export class ReputationOrchestrator {
  private ruleSystem: RuleSystem;
  private blacklistIndex: CidrBlacklistIndex;
  private manualBlacklist: ManualBlacklist;
  private geoProvider: GeoProvider;
  private scoreStore: ScoreStore;
  private log: Logger;
  private options: OrchestratorOptions;
  private now: () => Date;

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.ruleSystem = deps.ruleSystem;
    this.blacklistIndex = deps.blacklistIndex;
    this.manualBlacklist = deps.manualBlacklist;
    this.geoProvider = deps.geoProvider;
    this.scoreStore = deps.scoreStore;
    this.log = deps.logger.child({ module: 'reputation' });
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Scoring
  // ==========================================================================

  async analyzeIp(ip: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const startTime = performance.now();
    let result: AnalysisResult;

    try {
      const outcome = await this.runPipeline(ip, options);
      if (outcome.status === 'blacklisted' || outcome.source === 'computed') {
        await this.scoreStore.put(outcome.reputationScore);
      }
      result = outcome;
    } catch (error) {
      result = {
        status: 'error',
        ip,
        error: {
          kind: isReputationError(error) ? error.kind : 'LookupFailed',
          message: errorMessage(error),
        },
      };
    }

    this.logDecision(result, performance.now() - startTime);
    return result;
  }

  /**
   * Score several IPs. Each IP succeeds or fails on its own.
   */
  async bulkAnalyze(ips: readonly string[]): Promise<Record<string, BulkOutcome>> {
    return this.scoreStore.bulkCompute(ips, async (ip) => {
      const outcome = await this.runPipeline(ip, {});
      return outcome.reputationScore;
    });
  }

  /**
   * Score a lookup that was obtained elsewhere. Nothing is persisted.
   */
  calculate(lookup: GeoLookupResult): ReputationScore {
    if (!isValidAddress(lookup.ip)) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${lookup.ip}`);
    }
    return this.scoreLookup(lookup);
  }

  private async runPipeline(ip: string, options: AnalyzeOptions): Promise<PipelineOutcome> {
    const subject = isValidAddress(ip) ? canonicalAddress(ip) : null;
    if (subject === null) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${ip}`);
    }

    const blacklisted = this.checkBlacklists(ip);
    if (blacklisted) {
      return {
        status: 'blacklisted',
        ip,
        reputationScore: this.blacklistedScore(subject),
        source: blacklisted.source,
        blacklistEntry: blacklisted.entry,
      };
    }

    if (!options.refresh) {
      const cached = await this.freshStoredScore(subject);
      if (cached) {
        return { status: 'active', ip, reputationScore: cached, source: 'cache', geo: null };
      }
    }

    const lookup = await this.geoProvider.lookup(ip);
    return { status: 'active', ip, reputationScore: this.scoreLookup(lookup), source: 'computed', geo: lookup };
  }

  private checkBlacklists(ip: string): { source: BlacklistSource; entry: BlacklistEntry | null } | null {
    if (this.blacklistIndex.contains(ip)) {
      return { source: 'index', entry: null };
    }
    const entry = this.manualBlacklist.check(ip);
    return entry ? { source: 'entry', entry } : null;
  }

  private async freshStoredScore(ip: string): Promise<ReputationScore | null> {
    const ttlSeconds = this.options.cacheTtlSeconds ?? 0;
    if (ttlSeconds <= 0) return null;

    const stored = await this.scoreStore.get(ip);
    // A stored blacklisted score may be stale once the entry is gone
    if (!stored || stored.blacklisted) return null;

    const age = this.now().getTime() - Date.parse(stored.computedAt);
    return age >= 0 && age < ttlSeconds * 1000 ? stored : null;
  }

  private scoreLookup(lookup: GeoLookupResult): ReputationScore {
    const evaluation = this.ruleSystem.evaluate(buildFacts(lookup));
    const adjusted = applyStructuralAdjustments(evaluation, lookup);
    return {
      subjectIp: canonicalAddress(lookup.ip) ?? lookup.ip,
      totalScore: adjusted.totalScore,
      attributeScores: adjusted.attributeScores,
      factors: adjusted.factors,
      computedAt: this.now().toISOString(),
      blacklisted: false,
    };
  }

  private blacklistedScore(ip: string): ReputationScore {
    return {
      subjectIp: ip,
      totalScore: 0,
      attributeScores: {},
      factors: [BLACKLISTED_FACTOR],
      computedAt: this.now().toISOString(),
      blacklisted: true,
    };
  }

  private logDecision(result: AnalysisResult, durationMs: number): void {
    const duration = Math.round(durationMs * 100) / 100;

    if (result.status === 'error') {
      this.log.warn({ ip: result.ip, kind: result.error.kind, error: result.error.message, durationMs: duration }, 'IP analysis failed');
      return;
    }

    this.log.info(
      {
        ip: result.ip,
        status: result.status,
        source: result.source,
        score: result.reputationScore.totalScore,
        factors: result.reputationScore.factors,
        durationMs: duration,
      },
      'IP analyzed'
    );
  }

  // ==========================================================================
  // Blacklist management
  // ==========================================================================

  async addBlacklistEntry(input: BlacklistEntryInput): Promise<BlacklistEntry> {
    const entry = this.manualBlacklist.add(input);
    await this.persistEntries();
    return entry;
  }

  async removeBlacklistEntry(ipOrCidr: string): Promise<boolean> {
    const removed = this.manualBlacklist.remove(ipOrCidr);
    if (removed) {
      await this.persistEntries();
    }
    return removed;
  }

  /**
   * Blacklist membership without scoring.
   */
  checkBlacklist(ip: string): { blacklisted: boolean; source: BlacklistSource | null; entry: BlacklistEntry | null } {
    if (!isValidAddress(ip)) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${ip}`);
    }
    const match = this.checkBlacklists(ip);
    return match ? { blacklisted: true, source: match.source, entry: match.entry } : { blacklisted: false, source: null, entry: null };
  }

  listBlacklistEntries(): BlacklistEntry[] {
    return this.manualBlacklist.list();
  }

  async uploadBlacklist(entries: readonly string[]): Promise<UploadResult> {
    const result = this.blacklistIndex.bulkReplace(entries);
    if (this.options.blacklistIndexPath) {
      await this.saveBlacklistIndex(this.options.blacklistIndexPath);
    }
    return result;
  }

  blacklistStatus(): BlacklistIndexStatus {
    return this.blacklistIndex.status();
  }

  async saveBlacklist(filePath: string): Promise<void> {
    await writeJsonDocument(filePath, this.manualBlacklist.toDocument());
  }

  /**
   * Replace manual entries from a document; a missing file leaves an empty list.
   */
  async loadBlacklist(filePath: string): Promise<number> {
    const document = await readJsonDocument(filePath, BlacklistEntriesDocumentSchema);
    this.manualBlacklist.loadDocument(document ?? {});
    return this.manualBlacklist.size();
  }

  async saveBlacklistIndex(filePath: string): Promise<void> {
    await writeJsonDocument(filePath, this.blacklistIndex.toDocument());
  }

  async loadBlacklistIndex(filePath: string): Promise<BlacklistIndexStatus> {
    const document = await readJsonDocument(filePath, BlacklistIndexDocumentSchema);
    this.blacklistIndex.loadDocument(document ?? { single_ips: [], networks: [], last_upload_time: null });
    return this.blacklistIndex.status();
  }

  private async persistEntries(): Promise<void> {
    if (this.options.blacklistEntriesPath) {
      await this.saveBlacklist(this.options.blacklistEntriesPath);
    }
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  listRules(): { rules: PointRule[]; groups: RuleGroup[] } {
    const system = this.ruleSystem;
    return { rules: system.listRules(), groups: system.listGroups() };
  }

  addRule(input: unknown): PointRule {
    return this.ruleSystem.addRule(input);
  }

  createGroup(name: string, description?: string | null): RuleGroup {
    return this.ruleSystem.createGroup(name, description);
  }

  addRuleToGroup(groupName: string, input: unknown): PointRule {
    return this.ruleSystem.addRuleToGroup(groupName, input);
  }

  evaluateRules(facts: Facts): Evaluation {
    return this.ruleSystem.evaluate(facts);
  }

  async saveRules(filePath: string): Promise<void> {
    await this.ruleSystem.save(filePath);
  }

  /**
   * Load a rule system from disk and swap it in. The current system stays active
   * if loading fails.
   */
  async loadRules(filePath: string): Promise<RuleSystem> {
    const system = await RuleSystem.load(filePath, this.ruleSystem.policy);
    this.reload(system);
    return system;
  }

  reload(system: RuleSystem): void {
    this.ruleSystem = system;
    this.log.info({ rules: system.ruleCount(), groups: system.listGroups().length }, 'Rule system reloaded');
  }

  // ==========================================================================
  // Stored scores
  // ==========================================================================

  async getScore(ip: string): Promise<ReputationScore | null> {
    if (!isValidAddress(ip)) {
      throw new ReputationError('InvalidAddress', `Invalid IP address: ${ip}`);
    }
    return this.scoreStore.get(ip);
  }

  async highRiskIps(threshold: number): Promise<string[]> {
    return this.scoreStore.highRisk(threshold);
  }

  async scoreStats(): Promise<ScoreStats> {
    return this.scoreStore.stats();
  }
}

export { applyStructuralAdjustments, BASELINE_SCORE, PROXY_PENALTY, PROXY_PENALTY_FACTOR, PROXY_PENALTY_KEY } from './adjustments.js';
export { buildFacts } from './facts.js';
export type { AnalysisResult, AnalyzeOptions, ReputationScore } from './types.js';
