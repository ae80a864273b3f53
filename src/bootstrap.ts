import type { Logger } from 'pino';
import { CidrBlacklistIndex, ManualBlacklist } from './blacklist/index.js';
import type { Config } from './config/index.js';
import { createGeoProvider } from './geo/index.js';
import type { GeoProvider } from './geo/index.js';
import { ReputationOrchestrator } from './reputation/index.js';
import { RuleSystem } from './rules/index.js';
import { createScoreStore } from './storage/index.js';
import type { ScoreStore } from './storage/index.js';

export interface ReputationEngine {
  orchestrator: ReputationOrchestrator;
  geoProvider: GeoProvider;
  scoreStore: ScoreStore;
}

/**
 * Wire the engine from configuration and load the persisted rule and blacklist
 * documents. The database must already be initialized.
 */
export async function createReputationEngine(
  config: Config,
  logger: Logger,
  overrides: { geoProvider?: GeoProvider } = {}
): Promise<ReputationEngine> {
  const ruleSystem = await RuleSystem.load(config.rules.path, config.rules.points_policy);
  logger.info(
    { path: config.rules.path, policy: ruleSystem.policy, rules: ruleSystem.ruleCount() },
    'Rule system loaded'
  );

  const geoProvider = overrides.geoProvider ?? (await createGeoProvider(config.geo, logger));
  const scoreStore = createScoreStore();

  const orchestrator = new ReputationOrchestrator(
    {
      ruleSystem,
      blacklistIndex: new CidrBlacklistIndex(logger),
      manualBlacklist: new ManualBlacklist({ logger }),
      geoProvider,
      scoreStore,
      logger,
    },
    {
      cacheTtlSeconds: config.reputation.cache_ttl_seconds,
      blacklistIndexPath: config.blacklist.index_path,
      blacklistEntriesPath: config.blacklist.entries_path,
    }
  );

  const status = await orchestrator.loadBlacklistIndex(config.blacklist.index_path);
  const manualEntries = await orchestrator.loadBlacklist(config.blacklist.entries_path);
  logger.info(
    { singles: status.singleCount, networks: status.networkCount, manualEntries },
    'Blacklists loaded'
  );

  return { orchestrator, geoProvider, scoreStore };
}
