import { ReputationError, formatZodError } from '../errors/index.js';
import { readJsonDocument, writeJsonDocument } from '../storage/documents.js';
import { evaluate } from './evaluator.js';
import type { Evaluation, Facts } from './evaluator.js';
import { RulesDocumentSchema, parseGroupName, parsePointRule } from './model.js';
import type { PointRule, PointsPolicy, RuleGroup, RulesDocument } from './model.js';

/**
 * Ungrouped rules plus named groups of rules, evaluated as one set.
 *
 * Structural changes replace the rule array or the group map instead of mutating
 * them, so an evaluation in progress keeps iterating the version it started with.
 */
export class RuleSystem {
  readonly policy: PointsPolicy;
  private rules: readonly PointRule[] = [];
  private groups: ReadonlyMap<string, RuleGroup> = new Map();

  constructor(policy: PointsPolicy = 'non_negative') {
    this.policy = policy;
  }

  addRule(input: unknown): PointRule {
    const rule = parsePointRule(input, this.policy);
    this.rules = [...this.rules, rule];
    return rule;
  }

  createGroup(name: string, description?: string | null): RuleGroup {
    const groupName = parseGroupName(name);
    if (this.groups.has(groupName)) {
      throw new ReputationError('ValidationError', `Group '${groupName}' already exists`);
    }

    const group: RuleGroup = { name: groupName, description: description ?? null, rules: [] };
    const groups = new Map(this.groups);
    groups.set(groupName, group);
    this.groups = groups;
    return group;
  }

  addRuleToGroup(name: string, input: unknown): PointRule {
    const groupName = parseGroupName(name);
    const group = this.groups.get(groupName);
    if (!group) {
      throw new ReputationError('NotFound', `Group '${groupName}' does not exist`);
    }

    const rule = parsePointRule(input, this.policy);
    const groups = new Map(this.groups);
    groups.set(groupName, { ...group, rules: [...group.rules, rule] });
    this.groups = groups;
    return rule;
  }

  getGroup(name: string): RuleGroup | undefined {
    return this.groups.get(name.trim());
  }

  listRules(): PointRule[] {
    return [...this.rules];
  }

  listGroups(): RuleGroup[] {
    return [...this.groups.values()];
  }

  /**
   * Evaluation order: ungrouped rules, then each group in creation order.
   */
  orderedRules(): PointRule[] {
    const ordered = [...this.rules];
    for (const group of this.groups.values()) {
      ordered.push(...group.rules);
    }
    return ordered;
  }

  ruleCount(): number {
    return this.orderedRules().length;
  }

  evaluate(facts: Facts): Evaluation {
    return evaluate(this.orderedRules(), facts);
  }

  toDocument(): RulesDocument {
    const groups: RulesDocument['groups'] = Object.fromEntries(
      this.listGroups().map((group, position) => [
        group.name,
        { description: group.description, position, rules: [...group.rules] },
      ])
    );
    return { rules: [...this.rules], groups };
  }

  static fromDocument(input: unknown, policy: PointsPolicy = 'non_negative'): RuleSystem {
    const result = RulesDocumentSchema.safeParse(input);
    if (!result.success) {
      throw new ReputationError('ValidationError', `Invalid rules document: ${formatZodError(result.error)}`);
    }

    const system = new RuleSystem(policy);
    for (const rule of result.data.rules) {
      system.addRule(rule);
    }
    // Groups without a position keep document order, after the positioned ones
    const groups = Object.entries(result.data.groups)
      .map(([name, group], index) => ({ name, group, position: group.position ?? Number.MAX_SAFE_INTEGER, index }))
      .sort((a, b) => a.position - b.position || a.index - b.index);
    for (const { name, group } of groups) {
      const created = system.createGroup(name, group.description);
      for (const rule of group.rules) {
        system.addRuleToGroup(created.name, rule);
      }
    }
    return system;
  }

  async save(filePath: string): Promise<void> {
    await writeJsonDocument(filePath, this.toDocument());
  }

  /**
   * Load a rule system from disk. A missing file yields an empty system.
   */
  static async load(filePath: string, policy: PointsPolicy = 'non_negative'): Promise<RuleSystem> {
    const document = await readJsonDocument(filePath, RulesDocumentSchema);
    if (!document) {
      return new RuleSystem(policy);
    }
    return RuleSystem.fromDocument(document, policy);
  }
}

export * from './model.js';
export { evaluate, ruleMatches, describeRule } from './evaluator.js';
export type { Evaluation, Facts } from './evaluator.js';
