import { z } from 'zod';
import { ReputationError, formatZodError } from '../errors/index.js';

/**
 * Attributes a rule may target. Location attributes come from the geolocation
 * record, the last four from the connection record.
 */
export const GEO_ATTRIBUTES = [
  'country',
  'country_code',
  'city',
  'continent',
  'continent_code',
  'region',
  'region_code',
  'latitude',
  'longitude',
  'is_eu',
  'isp',
  'org',
  'asn',
  'connection_type',
] as const;

export const GeoAttributeSchema = z.enum(GEO_ATTRIBUTES);
export type GeoAttribute = z.infer<typeof GeoAttributeSchema>;

export const FactValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type FactValue = z.infer<typeof FactValueSchema>;

/**
 * `non_negative`: points are bonuses (>= 0).
 * `signed`: points may be penalties, bounded to [-100, 100].
 */
export const PointsPolicySchema = z.enum(['non_negative', 'signed']);
export type PointsPolicy = z.infer<typeof PointsPolicySchema>;

const COORDINATE_RANGES: Partial<Record<GeoAttribute, { label: string; min: number; max: number }>> = {
  latitude: { label: 'Latitude', min: -90, max: 90 },
  longitude: { label: 'Longitude', min: -180, max: 180 },
};

function pointsSchema(policy: PointsPolicy) {
  const base = z.number().int();
  return policy === 'signed' ? base.min(-100).max(100) : base.min(0);
}

function buildPointRuleSchema(policy: PointsPolicy) {
  return z
    .object({
      attribute: GeoAttributeSchema,
      value: z.union([FactValueSchema, z.array(FactValueSchema)]).nullish(),
      points: pointsSchema(policy),
      description: z.string().max(500).nullish(),
      conditions: z.record(z.string().min(1), FactValueSchema).optional(),
    })
    .superRefine((rule, ctx) => {
      const range = COORDINATE_RANGES[rule.attribute];
      if (!range || rule.value === null || rule.value === undefined) {
        return;
      }
      const values = Array.isArray(rule.value) ? rule.value : [rule.value];
      for (const value of values) {
        if (typeof value !== 'number' || Number.isNaN(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${rule.attribute} must be a number`,
          });
          return;
        }
        if (value < range.min || value > range.max) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${range.label} must be between ${range.min} and ${range.max}`,
          });
          return;
        }
      }
    });
}

const POINT_RULE_SCHEMAS = {
  non_negative: buildPointRuleSchema('non_negative'),
  signed: buildPointRuleSchema('signed'),
} as const;

export type PointRule = z.infer<(typeof POINT_RULE_SCHEMAS)['non_negative']>;
export type PointRuleInput = z.input<(typeof POINT_RULE_SCHEMAS)['non_negative']>;

export const GroupNameSchema = z
  .string()
  .trim()
  .min(1, 'Group name is required')
  .max(100)
  .refine((name) => name !== '__proto__', 'Group name __proto__ is reserved');

export interface RuleGroup {
  name: string;
  description: string | null;
  rules: readonly PointRule[];
}

export const RulesDocumentSchema = z.object({
  rules: z.array(z.unknown()).default([]),
  groups: z
    .record(
      z.string(),
      z.object({
        description: z.string().nullish(),
        // Creation order; object key order does not survive integer-like names
        position: z.number().int().min(0).optional(),
        rules: z.array(z.unknown()).default([]),
      })
    )
    .default({}),
});

export interface RulesDocument {
  rules: PointRule[];
  groups: Record<string, { description: string | null; position: number; rules: PointRule[] }>;
}

/**
 * Validate a rule against the attribute set, coordinate ranges and the points policy.
 */
export function parsePointRule(input: unknown, policy: PointsPolicy): PointRule {
  const result = POINT_RULE_SCHEMAS[policy].safeParse(input);
  if (!result.success) {
    throw new ReputationError('ValidationError', `Invalid rule: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function parseGroupName(input: unknown): string {
  const result = GroupNameSchema.safeParse(input);
  if (!result.success) {
    throw new ReputationError('ValidationError', formatZodError(result.error));
  }
  return result.data;
}
