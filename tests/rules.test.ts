import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RuleSystem, evaluate, parsePointRule } from '../src/rules/index.js';
import type { PointRule } from '../src/rules/index.js';

describe('parsePointRule', () => {
  it('should accept a minimal rule', () => {
    expect(parsePointRule({ attribute: 'is_eu', value: true, points: 20 }, 'non_negative')).toEqual({
      attribute: 'is_eu',
      value: true,
      points: 20,
    });
  });

  it('should reject negative points under the non_negative policy', () => {
    expect(() => parsePointRule({ attribute: 'asn', value: 64500, points: -5 }, 'non_negative')).toThrow(
      'Invalid rule: points: Number must be greater than or equal to 0'
    );
  });

  it('should allow penalties within [-100, 100] under the signed policy', () => {
    expect(parsePointRule({ attribute: 'asn', value: 64500, points: -100 }, 'signed').points).toBe(-100);
    expect(() => parsePointRule({ attribute: 'asn', value: 64500, points: 150 }, 'signed')).toThrow(
      'Invalid rule: points: Number must be less than or equal to 100'
    );
  });

  it('should reject fractional points', () => {
    expect(() => parsePointRule({ attribute: 'asn', points: 1.5 }, 'non_negative')).toThrow(
      expect.objectContaining({ kind: 'ValidationError' })
    );
  });

  it('should reject attributes outside the closed set', () => {
    expect(() => parsePointRule({ attribute: 'planet', value: 'earth', points: 1 }, 'non_negative')).toThrow(
      expect.objectContaining({ kind: 'ValidationError' })
    );
  });

  it('should validate coordinates', () => {
    expect(() => parsePointRule({ attribute: 'latitude', value: 'north', points: 1 }, 'non_negative')).toThrow(
      'Invalid rule: value: latitude must be a number'
    );
    expect(() => parsePointRule({ attribute: 'latitude', value: 95, points: 1 }, 'non_negative')).toThrow(
      'Invalid rule: value: Latitude must be between -90 and 90'
    );
    expect(() => parsePointRule({ attribute: 'longitude', value: [10, -181], points: 1 }, 'non_negative')).toThrow(
      'Invalid rule: value: Longitude must be between -180 and 180'
    );
    expect(parsePointRule({ attribute: 'longitude', value: -180, points: 1 }, 'non_negative').value).toBe(-180);
  });
});

describe('evaluate', () => {
  const rule = (input: unknown): PointRule => parsePointRule(input, 'signed');

  it('should score a matching rule', () => {
    const result = evaluate([rule({ attribute: 'is_eu', value: true, points: 20 })], { is_eu: true });

    expect(result).toEqual({ total: 20, breakdown: { is_eu: 20 }, factors: ['is_eu match'] });
  });

  it('should return zero when nothing matches', () => {
    const result = evaluate([rule({ attribute: 'is_eu', value: true, points: 20 })], { is_eu: false });

    expect(result).toEqual({ total: 0, breakdown: {}, factors: [] });
  });

  it('should compare with strict equality', () => {
    const rules = [rule({ attribute: 'asn', value: 64500, points: 5 })];

    expect(evaluate(rules, { asn: '64500' }).total).toBe(0);
    expect(evaluate(rules, { asn: 64500 }).total).toBe(5);
  });

  it('should treat a list value as membership', () => {
    const rules = [rule({ attribute: 'country_code', value: ['CN', 'RU'], points: -30, description: 'High risk country' })];

    expect(evaluate(rules, { country_code: 'RU' })).toEqual({
      total: -30,
      breakdown: { country_code: -30 },
      factors: ['High risk country'],
    });
    expect(evaluate(rules, { country_code: 'FR' }).total).toBe(0);
  });

  it('should match on presence when the rule has no value', () => {
    const rules = [rule({ attribute: 'isp', points: 3 })];

    expect(evaluate(rules, { isp: 'Example Networks' }).total).toBe(3);
    expect(evaluate(rules, { isp: null }).total).toBe(3);
    expect(evaluate(rules, { org: 'Example Networks' }).total).toBe(0);
  });

  it('should require every condition to hold', () => {
    const rules = [
      rule({ attribute: 'country_code', value: 'US', points: 7, conditions: { domain: 'example.net', is_eu: false } }),
    ];

    expect(evaluate(rules, { country_code: 'US', domain: 'example.net', is_eu: false }).total).toBe(7);
    expect(evaluate(rules, { country_code: 'US', domain: 'other.net', is_eu: false }).total).toBe(0);
    expect(evaluate(rules, { country_code: 'US', is_eu: false }).total).toBe(0);
  });

  it('should sum points and keep the last breakdown value per attribute', () => {
    const rules = [
      rule({ attribute: 'country_code', value: 'US', points: 10, description: 'US' }),
      rule({ attribute: 'country_code', points: 5, description: 'Any country' }),
    ];

    expect(evaluate(rules, { country_code: 'US' })).toEqual({
      total: 15,
      breakdown: { country_code: 5 },
      factors: ['US', 'Any country'],
    });
  });

  it('should not mutate rules', () => {
    const rules = [rule({ attribute: 'city', value: ['Lyon', 'Paris'], points: 2 })];
    const copy = JSON.parse(JSON.stringify(rules));

    evaluate(rules, { city: 'Paris' });

    expect(rules).toEqual(copy);
  });
});

describe('RuleSystem', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rules-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should evaluate ungrouped rules before groups', () => {
    const system = new RuleSystem();
    system.addRule({ attribute: 'country_code', value: 'US', points: 10, description: 'US' });
    system.createGroup('network');
    system.addRuleToGroup('network', { attribute: 'country_code', value: 'US', points: 5, description: 'US again' });

    expect(system.evaluate({ country_code: 'US' })).toEqual({
      total: 15,
      breakdown: { country_code: 5 },
      factors: ['US', 'US again'],
    });
    expect(system.ruleCount()).toBe(2);
  });

  it('should apply its points policy to added rules', () => {
    expect(() => new RuleSystem().addRule({ attribute: 'asn', points: -1 })).toThrow(
      expect.objectContaining({ kind: 'ValidationError' })
    );
    expect(new RuleSystem('signed').addRule({ attribute: 'asn', points: -1 }).points).toBe(-1);
  });

  it('should reject duplicate group names', () => {
    const system = new RuleSystem();
    const group = system.createGroup('  geo  ', 'Geography');

    expect(group).toEqual({ name: 'geo', description: 'Geography', rules: [] });
    expect(() => system.createGroup('geo')).toThrow("Group 'geo' already exists");
  });

  it('should reject the __proto__ group name', () => {
    expect(() => new RuleSystem().createGroup('__proto__')).toThrow(
      expect.objectContaining({ kind: 'ValidationError', message: 'Group name __proto__ is reserved' })
    );
  });

  it('should trim the group name when adding a rule to it', () => {
    const system = new RuleSystem();
    system.createGroup('geo');

    system.addRuleToGroup(' geo ', { attribute: 'is_eu', value: true, points: 1 });

    expect(system.getGroup('geo')?.rules).toHaveLength(1);
  });

  it('should fail with NotFound when adding to a missing group', () => {
    const system = new RuleSystem();
    expect(() => system.addRuleToGroup('missing', { attribute: 'asn', points: 1 })).toThrow(
      expect.objectContaining({ kind: 'NotFound', message: "Group 'missing' does not exist" })
    );
  });

  it('should keep an earlier group snapshot unchanged after later additions', () => {
    const system = new RuleSystem();
    system.createGroup('geo');
    const before = system.getGroup('geo');

    system.addRuleToGroup('geo', { attribute: 'is_eu', value: true, points: 1 });

    expect(before?.rules).toEqual([]);
    expect(system.getGroup('geo')?.rules).toHaveLength(1);
  });

  it('should round trip through save and load', async () => {
    const system = new RuleSystem('signed');
    system.addRule({ attribute: 'is_eu', value: true, points: 20 });
    system.createGroup('risk', 'Risky networks');
    system.addRuleToGroup('risk', { attribute: 'asn', value: [64500, 64501], points: -40, description: 'Hosting ASN' });
    const path = join(dir, 'nested', 'rules.json');

    await system.save(path);
    const loaded = await RuleSystem.load(path, 'signed');

    expect(loaded.toDocument()).toEqual(system.toDocument());
    expect(loaded.listGroups().map((group) => group.name)).toEqual(['risk']);
    expect(loaded.evaluate({ is_eu: true, asn: 64501 }).total).toBe(-20);
  });

  it('should keep group creation order through save and load', async () => {
    const system = new RuleSystem();
    system.createGroup('late');
    system.addRuleToGroup('late', { attribute: 'country_code', value: 'X', points: 1 });
    system.createGroup('2');
    system.addRuleToGroup('2', { attribute: 'country_code', value: 'X', points: 2 });
    const path = join(dir, 'rules.json');

    await system.save(path);
    const loaded = await RuleSystem.load(path);

    expect(loaded.listGroups().map((group) => group.name)).toEqual(['late', '2']);
    expect(loaded.evaluate({ country_code: 'X' }).breakdown).toEqual({ country_code: 2 });
  });

  it('should load groups without a position in document order', () => {
    const loaded = RuleSystem.fromDocument({
      rules: [],
      groups: {
        b: { position: 1, rules: [] },
        a: { rules: [] },
        c: { position: 0, rules: [] },
      },
    });

    expect(loaded.listGroups().map((group) => group.name)).toEqual(['c', 'b', 'a']);
  });

  it('should load an empty system when the file is missing', async () => {
    const loaded = await RuleSystem.load(join(dir, 'absent.json'));
    expect(loaded.toDocument()).toEqual({ rules: [], groups: {} });
  });

  it('should fail with PersistenceError on a corrupt file', async () => {
    const path = join(dir, 'rules.json');
    writeFileSync(path, '{ not json');

    await expect(RuleSystem.load(path)).rejects.toMatchObject({ kind: 'PersistenceError' });
  });

  it('should reject a document whose rules break the policy', async () => {
    const path = join(dir, 'rules.json');
    writeFileSync(path, JSON.stringify({ rules: [{ attribute: 'asn', points: -10 }] }));

    await expect(RuleSystem.load(path, 'non_negative')).rejects.toMatchObject({ kind: 'ValidationError' });
  });
});
