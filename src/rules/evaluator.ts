import type { FactValue, PointRule } from './model.js';

/**
 * Attribute name -> observed value. A key that is present with a null value still
 * satisfies a presence-only rule.
 */
export type Facts = Readonly<Record<string, FactValue | null>>;

export interface Evaluation {
  total: number;
  /** Points per attribute; when several rules hit one attribute the last one wins */
  breakdown: Record<string, number>;
  factors: string[];
}

function hasFact(facts: Facts, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(facts, key);
}

function valueMatches(expected: PointRule['value'], actual: FactValue | null): boolean {
  if (expected === null || expected === undefined) {
    return true;
  }
  if (Array.isArray(expected)) {
    return actual !== null && expected.includes(actual);
  }
  return actual === expected;
}

export function ruleMatches(rule: PointRule, facts: Facts): boolean {
  if (!hasFact(facts, rule.attribute)) {
    return false;
  }
  if (!valueMatches(rule.value, facts[rule.attribute])) {
    return false;
  }
  if (rule.conditions) {
    for (const [key, expected] of Object.entries(rule.conditions)) {
      if (!hasFact(facts, key) || facts[key] !== expected) {
        return false;
      }
    }
  }
  return true;
}

export function describeRule(rule: PointRule): string {
  return rule.description || `${rule.attribute} match`;
}

/**
 * Apply rules in the given order and accumulate the points of every match.
 */
export function evaluate(rules: readonly PointRule[], facts: Facts): Evaluation {
  const evaluation: Evaluation = { total: 0, breakdown: {}, factors: [] };

  for (const rule of rules) {
    if (!ruleMatches(rule, facts)) continue;

    evaluation.total += rule.points;
    evaluation.breakdown[rule.attribute] = rule.points;
    evaluation.factors.push(describeRule(rule));
  }

  return evaluation;
}
