import { asc, count, desc, eq, lte, or, lt, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDatabaseContext } from '../db/index.js';
import type { SelectReputationScore } from '../db/schema.js';
import { ReputationError, errorMessage, isReputationError } from '../errors/index.js';
import type { ErrorKind } from '../errors/index.js';
import { canonicalAddress } from '../net/index.js';
import type { ReputationScore } from '../reputation/types.js';

export interface ScoreStats {
  count: number;
  average?: number;
  blacklistedCount: number;
  min: number | null;
  max: number | null;
}

export type BulkOutcome = { score: ReputationScore } | { error: { kind: ErrorKind; message: string } };

export interface ScoreQuery {
  limit?: number;
  offset?: number;
}

export interface ScoreStore {
  put(score: ReputationScore): Promise<void>;
  get(ip: string): Promise<ReputationScore | null>;
  list(query?: ScoreQuery): Promise<ReputationScore[]>;
  delete(ip: string): Promise<boolean>;
  /**
   * Compute and store a score for each IP. A failing IP is recorded under its
   * key and the remaining IPs are still processed.
   */
  bulkCompute(ips: readonly string[], compute: (ip: string) => Promise<ReputationScore>): Promise<Record<string, BulkOutcome>>;
  /**
   * IPs scoring below `threshold` or flagged blacklisted, lowest score first.
   */
  highRisk(threshold: number): Promise<string[]>;
  stats(): Promise<ScoreStats>;
  cleanup(retentionDays: number): Promise<number>;
}

const AttributeScoresSchema = z.record(z.number());
const FactorsSchema = z.array(z.string());

function parseJsonColumn<T>(ip: string, column: string, raw: string, schema: z.ZodType<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ReputationError('PersistenceError', `Corrupt ${column} for ${ip}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ReputationError('PersistenceError', `Corrupt ${column} for ${ip}`);
  }
  return result.data;
}

function rowToScore(row: SelectReputationScore): ReputationScore {
  return {
    subjectIp: row.ip,
    totalScore: row.totalScore,
    attributeScores: parseJsonColumn(row.ip, 'attribute_scores', row.attributeScores, AttributeScoresSchema),
    factors: parseJsonColumn(row.ip, 'factors', row.factors, FactorsSchema),
    computedAt: row.computedAt,
    blacklisted: row.blacklisted,
  };
}

// Differently written literals of one host share a row
function scoreKey(ip: string): string {
  return canonicalAddress(ip) ?? ip;
}

function persistenceError(action: string, error: unknown): ReputationError {
  if (isReputationError(error)) return error;
  return new ReputationError('PersistenceError', `Failed to ${action}: ${errorMessage(error)}`, { cause: error });
}

export function createScoreStore(): ScoreStore {
  const store: ScoreStore = {
    async put(score) {
      const { db, schema } = getDatabaseContext();
      const ip = scoreKey(score.subjectIp);
      const values = {
        totalScore: score.totalScore,
        attributeScores: JSON.stringify(score.attributeScores),
        factors: JSON.stringify(score.factors),
        computedAt: score.computedAt,
        blacklisted: score.blacklisted,
      };

      try {
        db.insert(schema.reputationScores)
          .values({ ip, ...values })
          .onConflictDoUpdate({ target: schema.reputationScores.ip, set: values })
          .run();
      } catch (error) {
        throw persistenceError(`store score for ${ip}`, error);
      }
    },

    async get(ip) {
      const { db, schema } = getDatabaseContext();
      const row = db.select().from(schema.reputationScores).where(eq(schema.reputationScores.ip, scoreKey(ip))).get();
      return row ? rowToScore(row) : null;
    },

    async list(query = {}) {
      const { db, schema } = getDatabaseContext();
      const rows = db
        .select()
        .from(schema.reputationScores)
        .orderBy(desc(schema.reputationScores.computedAt))
        .limit(query.limit ?? 100)
        .offset(query.offset ?? 0)
        .all();
      return rows.map(rowToScore);
    },

    async delete(ip) {
      const { db, schema } = getDatabaseContext();
      const result = db.delete(schema.reputationScores).where(eq(schema.reputationScores.ip, scoreKey(ip))).run();
      return result.changes > 0;
    },

    async bulkCompute(ips, compute) {
      const results: Record<string, BulkOutcome> = {};

      for (const ip of ips) {
        try {
          const score = await compute(ip);
          await store.put(score);
          results[ip] = { score };
        } catch (error) {
          results[ip] = {
            error: {
              kind: isReputationError(error) ? error.kind : 'LookupFailed',
              message: errorMessage(error),
            },
          };
        }
      }

      return results;
    },

    async highRisk(threshold) {
      const { db, schema } = getDatabaseContext();
      const rows = db
        .select({ ip: schema.reputationScores.ip })
        .from(schema.reputationScores)
        .where(or(lt(schema.reputationScores.totalScore, threshold), eq(schema.reputationScores.blacklisted, true)))
        .orderBy(asc(schema.reputationScores.totalScore), asc(schema.reputationScores.ip))
        .all();
      return rows.map((row) => row.ip);
    },

    async stats() {
      const { db, schema } = getDatabaseContext();
      const row = db
        .select({
          count: count(),
          average: sql<number | null>`avg(${schema.reputationScores.totalScore})`,
          blacklisted: sql<number | null>`sum(case when ${schema.reputationScores.blacklisted} then 1 else 0 end)`,
          min: sql<number | null>`min(${schema.reputationScores.totalScore})`,
          max: sql<number | null>`max(${schema.reputationScores.totalScore})`,
        })
        .from(schema.reputationScores)
        .get();

      const total = row?.count ?? 0;
      const stats: ScoreStats = {
        count: total,
        blacklistedCount: Number(row?.blacklisted ?? 0),
        min: row?.min ?? null,
        max: row?.max ?? null,
      };
      // avg() over zero rows is NULL; leave average out
      if (total > 0 && row?.average !== null && row?.average !== undefined) {
        stats.average = Number(row.average);
      }
      return stats;
    },

    async cleanup(retentionDays) {
      const { db, schema } = getDatabaseContext();
      const cutoff = new Date();
      cutoff.setDate(cutoff.getDate() - retentionDays);

      const result = db
        .delete(schema.reputationScores)
        .where(lte(schema.reputationScores.computedAt, cutoff.toISOString()))
        .run();
      return result.changes;
    },
  };

  return store;
}
