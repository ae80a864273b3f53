import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ReputationError, formatZodError, isErrnoException } from '../errors/index.js';
import { PointsPolicySchema } from '../rules/model.js';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
export function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_match, varName: string, defaultValue?: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    // Empty string if no value and no default
    return defaultValue ?? '';
  });
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

// YAML values arrive as strings after interpolation
const Port = z.coerce.number().int().min(0).max(65535);
const PositiveInt = z.coerce.number().int().positive();
const NonNegativeInt = z.coerce.number().int().min(0);

const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: Port.default(8080),
      host: z.string().default('0.0.0.0'),
      rate_limit_max: PositiveInt.default(100),
    })
    .default({}),
  storage: z
    .object({
      path: z.string().default('./data/reputation.db'),
      retention_days: PositiveInt.default(30),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
  geo: z
    .object({
      provider: z.enum(['ipwhois', 'maxmind']).default('ipwhois'),
      base_url: z.string().url().default('https://ipwho.is'),
      timeout_ms: PositiveInt.default(10000),
      maxmind_db_path: z.string().default('./data/GeoLite2-City.mmdb'),
      // 0 disables the lookup cache
      cache_ttl_seconds: NonNegativeInt.default(3600),
      cache_max_entries: PositiveInt.default(10000),
    })
    .default({}),
  rules: z
    .object({
      path: z.string().default('./data/rules.json'),
      points_policy: PointsPolicySchema.default('non_negative'),
    })
    .default({}),
  blacklist: z
    .object({
      index_path: z.string().default('./data/blacklist-index.json'),
      entries_path: z.string().default('./data/blacklist-entries.json'),
    })
    .default({}),
  reputation: z
    .object({
      // 0 always recomputes
      cache_ttl_seconds: NonNegativeInt.default(0),
      high_risk_threshold: z.coerce.number().int().default(50),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Raw values keyed like the config; validated when merged
export type ConfigOverrides = {
  [Section in keyof Config]?: Partial<Record<keyof Config[Section], unknown>>;
};

export function parseConfig(input: unknown): Config {
  const result = ConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ReputationError('ValidationError', `Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function loadConfig(configPath: string): Config {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return parseConfig({});
    }
    throw error;
  }

  const parsed: unknown = parseYaml(content);
  // Interpolate environment variables in config values
  return parseConfig(processEnvVars(parsed));
}

/**
 * Environment overrides, applied on top of the file configuration. Only
 * variables that are set produce a value.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (env.PORT || env.HOST) {
    overrides.server = {
      ...(env.PORT ? { listen_port: env.PORT } : {}),
      ...(env.HOST ? { host: env.HOST } : {}),
    };
  }
  if (env.DATABASE_PATH || env.RETENTION_DAYS) {
    overrides.storage = {
      ...(env.DATABASE_PATH ? { path: env.DATABASE_PATH } : {}),
      ...(env.RETENTION_DAYS ? { retention_days: env.RETENTION_DAYS } : {}),
    };
  }
  if (env.LOG_LEVEL || env.LOG_FORMAT) {
    overrides.logging = {
      ...(env.LOG_LEVEL ? { level: env.LOG_LEVEL } : {}),
      ...(env.LOG_FORMAT ? { format: env.LOG_FORMAT } : {}),
    };
  }
  if (env.GEO_PROVIDER || env.GEO_BASE_URL || env.GEO_TIMEOUT_MS || env.MAXMIND_DB_PATH) {
    overrides.geo = {
      ...(env.GEO_PROVIDER ? { provider: env.GEO_PROVIDER } : {}),
      ...(env.GEO_BASE_URL ? { base_url: env.GEO_BASE_URL } : {}),
      ...(env.GEO_TIMEOUT_MS ? { timeout_ms: env.GEO_TIMEOUT_MS } : {}),
      ...(env.MAXMIND_DB_PATH ? { maxmind_db_path: env.MAXMIND_DB_PATH } : {}),
    };
  }
  if (env.RULES_PATH || env.POINTS_POLICY) {
    overrides.rules = {
      ...(env.RULES_PATH ? { path: env.RULES_PATH } : {}),
      ...(env.POINTS_POLICY ? { points_policy: env.POINTS_POLICY } : {}),
    };
  }
  if (env.REPUTATION_CACHE_TTL_SECONDS) {
    overrides.reputation = { cache_ttl_seconds: env.REPUTATION_CACHE_TTL_SECONDS };
  }

  return overrides;
}

/**
 * Merge environment overrides section by section over a file configuration.
 */
export function mergeConfig(base: Config, overrides: ConfigOverrides): Config {
  return parseConfig({
    server: { ...base.server, ...overrides.server },
    storage: { ...base.storage, ...overrides.storage },
    logging: { ...base.logging, ...overrides.logging },
    geo: { ...base.geo, ...overrides.geo },
    rules: { ...base.rules, ...overrides.rules },
    blacklist: { ...base.blacklist, ...overrides.blacklist },
    reputation: { ...base.reputation, ...overrides.reputation },
  });
}
