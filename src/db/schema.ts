import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const reputationScores = sqliteTable(
  'reputation_scores',
  {
    ip: text('ip').primaryKey(),
    totalScore: integer('total_score').notNull(),
    attributeScores: text('attribute_scores').notNull(), // JSON object
    factors: text('factors').notNull(), // JSON array
    computedAt: text('computed_at').notNull(),
    blacklisted: integer('blacklisted', { mode: 'boolean' }).notNull().default(false),
  },
  (table) => ({
    totalScoreIdx: index('idx_total_score').on(table.totalScore),
    computedAtIdx: index('idx_computed_at').on(table.computedAt),
  })
);

export type SelectReputationScore = typeof reputationScores.$inferSelect;
