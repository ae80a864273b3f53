import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { CidrBlacklistIndex, ManualBlacklist } from '../src/blacklist/index.js';
import { closeDatabase, initializeDatabase } from '../src/db/index.js';
import {
  ReputationOrchestrator,
  applyStructuralAdjustments,
  buildFacts,
} from '../src/reputation/index.js';
import type { OrchestratorOptions } from '../src/reputation/index.js';
import { RuleSystem } from '../src/rules/index.js';
import { createScoreStore } from '../src/storage/index.js';
import { StubGeoProvider, lookupFailed, makeLookup } from './helpers/geo.js';

const logger = pino({ level: 'silent' });
const NOW = new Date('2026-03-01T00:00:00.000Z');

describe('buildFacts', () => {
  it('should expose typed and pass-through facts', () => {
    expect(buildFacts(makeLookup('192.0.2.1'))).toEqual({
      is_eu: true,
      country: 'France',
      country_code: 'FR',
      city: 'Paris',
      continent: 'Europe',
      continent_code: 'EU',
      region: 'Ile-de-France',
      region_code: 'IDF',
      latitude: 48.85,
      longitude: 2.35,
      connection_type: 'IPv4',
      isp: 'Example ISP',
      org: 'Example Org',
      asn: 64500,
      domain: 'example.net',
      postal: '75001',
      calling_code: '33',
      capital: 'Paris',
      timezone: 'Europe/Paris',
    });
  });
});

describe('applyStructuralAdjustments', () => {
  it('should add the baseline', () => {
    const adjusted = applyStructuralAdjustments(
      { total: 20, breakdown: { is_eu: 20 }, factors: ['is_eu match'] },
      makeLookup('192.0.2.1')
    );
    expect(adjusted).toEqual({ totalScore: 120, attributeScores: { is_eu: 20 }, factors: ['is_eu match'] });
  });

  it('should penalize proxy, VPN and Tor domains', () => {
    const adjusted = applyStructuralAdjustments(
      { total: 0, breakdown: {}, factors: [] },
      makeLookup('192.0.2.1', { connection: { domain: 'exit-node.TOR' } })
    );
    expect(adjusted).toEqual({
      totalScore: 80,
      attributeScores: { proxy_penalty: -20 },
      factors: ['Proxy/VPN detection penalty'],
    });
  });

  it('should never go below zero', () => {
    const adjusted = applyStructuralAdjustments(
      { total: -150, breakdown: { asn: -150 }, factors: ['Hosting'] },
      makeLookup('192.0.2.1', { connection: { domain: 'relay.vpn' } })
    );
    expect(adjusted.totalScore).toBe(0);
  });
});

describe('ReputationOrchestrator', () => {
  let geo: StubGeoProvider;
  let rules: RuleSystem;

  function build(options: OrchestratorOptions = {}) {
    return new ReputationOrchestrator(
      {
        ruleSystem: rules,
        blacklistIndex: new CidrBlacklistIndex(logger),
        manualBlacklist: new ManualBlacklist({ logger, now: () => NOW }),
        geoProvider: geo,
        scoreStore: createScoreStore(),
        logger,
      },
      { now: () => NOW, ...options }
    );
  }

  beforeEach(() => {
    initializeDatabase(':memory:');
    geo = new StubGeoProvider();
    rules = new RuleSystem();
    rules.addRule({ attribute: 'is_eu', value: true, points: 20 });
  });

  afterEach(() => {
    closeDatabase();
  });

  it('should compute, persist and return a score', async () => {
    const orchestrator = build();

    const result = await orchestrator.analyzeIp('192.0.2.1');

    expect(result).toMatchObject({
      status: 'active',
      source: 'computed',
      reputationScore: {
        subjectIp: '192.0.2.1',
        totalScore: 120,
        attributeScores: { is_eu: 20 },
        factors: ['is_eu match'],
        computedAt: '2026-03-01T00:00:00.000Z',
        blacklisted: false,
      },
    });
    expect(await orchestrator.getScore('192.0.2.1')).toEqual({
      subjectIp: '192.0.2.1',
      totalScore: 120,
      attributeScores: { is_eu: 20 },
      factors: ['is_eu match'],
      computedAt: '2026-03-01T00:00:00.000Z',
      blacklisted: false,
    });
    expect(geo.calls).toEqual(['192.0.2.1']);
  });

  it('should short circuit a blacklisted IP without a geo lookup', async () => {
    const orchestrator = build();
    await orchestrator.addBlacklistEntry({ ip_or_cidr: '203.0.113.5', reason: 'Abuse' });

    const result = await orchestrator.analyzeIp('203.0.113.5');

    expect(result.status).toBe('blacklisted');
    if (result.status !== 'blacklisted') return;
    expect(result.reputationScore.totalScore).toBe(0);
    expect(result.reputationScore.factors).toEqual(['IP is blacklisted']);
    expect(result.reputationScore.blacklisted).toBe(true);
    expect(result.source).toBe('entry');
    expect(result.blacklistEntry?.reason).toBe('Abuse');
    expect(geo.calls).toEqual([]);
    expect(await orchestrator.scoreStats()).toMatchObject({ count: 1, blacklistedCount: 1 });
  });

  it('should check the uploaded index before manual entries', async () => {
    const orchestrator = build();
    await orchestrator.uploadBlacklist(['10.0.0.0/24', 'not-an-ip', '8.8.8.8']);

    const result = await orchestrator.analyzeIp('10.0.0.5');

    expect(result).toMatchObject({ status: 'blacklisted', source: 'index', blacklistEntry: null });
    expect(orchestrator.checkBlacklist('8.8.8.8')).toEqual({ blacklisted: true, source: 'index', entry: null });
    expect(orchestrator.checkBlacklist('8.8.4.4')).toEqual({ blacklisted: false, source: null, entry: null });
  });

  it('should report a lookup failure with the provider message', async () => {
    geo.set('192.0.2.9', lookupFailed('API Error: Reserved range'));
    const orchestrator = build();

    const result = await orchestrator.analyzeIp('192.0.2.9');

    expect(result).toEqual({
      status: 'error',
      ip: '192.0.2.9',
      error: { kind: 'LookupFailed', message: 'API Error: Reserved range' },
    });
    expect(await orchestrator.getScore('192.0.2.9')).toBeNull();
  });

  it('should reject an invalid address without any lookup', async () => {
    const orchestrator = build();

    const result = await orchestrator.analyzeIp('999.1.1.1');

    expect(result).toEqual({
      status: 'error',
      ip: '999.1.1.1',
      error: { kind: 'InvalidAddress', message: 'Invalid IP address: 999.1.1.1' },
    });
    expect(geo.calls).toEqual([]);
  });

  it('should apply the proxy penalty', async () => {
    geo.set('192.0.2.2', makeLookup('192.0.2.2', { connection: { domain: 'node.proxy' } }));
    const orchestrator = build();

    const result = await orchestrator.analyzeIp('192.0.2.2');

    expect(result).toMatchObject({
      status: 'active',
      reputationScore: {
        totalScore: 100,
        attributeScores: { is_eu: 20, proxy_penalty: -20 },
        factors: ['is_eu match', 'Proxy/VPN detection penalty'],
      },
    });
  });

  it('should serve fresh stored scores from the cache unless refreshed', async () => {
    const orchestrator = build({ cacheTtlSeconds: 60 });

    await orchestrator.analyzeIp('192.0.2.1');
    const cached = await orchestrator.analyzeIp('192.0.2.1');
    const refreshed = await orchestrator.analyzeIp('192.0.2.1', { refresh: true });

    expect(cached).toMatchObject({ status: 'active', source: 'cache', geo: null });
    expect(refreshed).toMatchObject({ status: 'active', source: 'computed' });
    expect(geo.calls).toEqual(['192.0.2.1', '192.0.2.1']);
  });

  it('should always recompute when the cache is disabled', async () => {
    const orchestrator = build();

    await orchestrator.analyzeIp('192.0.2.1');
    await orchestrator.analyzeIp('192.0.2.1');

    expect(geo.calls).toHaveLength(2);
  });

  it('should store differently written IPv6 literals under one compressed key', async () => {
    const orchestrator = build();

    const first = await orchestrator.analyzeIp('2001:db8::1');
    await orchestrator.analyzeIp('2001:DB8:0::1');

    expect(first).toMatchObject({ reputationScore: { subjectIp: '2001:db8::1' } });
    expect(await orchestrator.scoreStats()).toMatchObject({ count: 1 });
    expect((await orchestrator.getScore('2001:0db8:0000::0001'))?.subjectIp).toBe('2001:db8::1');
  });

  it('should serve a cached score for another spelling of the same IPv6 host', async () => {
    const orchestrator = build({ cacheTtlSeconds: 60 });

    await orchestrator.analyzeIp('2001:db8::1');
    const second = await orchestrator.analyzeIp('2001:DB8:0::1');

    expect(second).toMatchObject({ status: 'active', source: 'cache' });
    expect(geo.calls).toEqual(['2001:db8::1']);
  });

  it('should collect per-IP outcomes in bulk', async () => {
    geo.set('192.0.2.9', lookupFailed('Failed to fetch IP data: HTTP 503'));
    const orchestrator = build();

    const results = await orchestrator.bulkAnalyze(['192.0.2.1', 'bad', '192.0.2.9']);

    expect(Object.keys(results)).toEqual(['192.0.2.1', 'bad', '192.0.2.9']);
    expect(results['192.0.2.1']).toMatchObject({ score: { totalScore: 120 } });
    expect(results['bad']).toEqual({ error: { kind: 'InvalidAddress', message: 'Invalid IP address: bad' } });
    expect(results['192.0.2.9']).toEqual({
      error: { kind: 'LookupFailed', message: 'Failed to fetch IP data: HTTP 503' },
    });
    expect(await orchestrator.scoreStats()).toMatchObject({ count: 1 });
  });

  it('should use the new rule system after reload', async () => {
    const orchestrator = build();
    const next = new RuleSystem();
    next.addRule({ attribute: 'country_code', value: 'FR', points: 50, description: 'France' });

    orchestrator.reload(next);

    expect(orchestrator.calculate(makeLookup('192.0.2.1'))).toMatchObject({
      totalScore: 150,
      attributeScores: { country_code: 50 },
      factors: ['France'],
    });
    expect(orchestrator.listRules().rules).toHaveLength(1);
  });

  it('should list high risk IPs lowest first', async () => {
    const orchestrator = build();
    geo.set('192.0.2.3', makeLookup('192.0.2.3', { location: { is_eu: false } }));
    await orchestrator.addBlacklistEntry({ ip_or_cidr: '203.0.113.5', reason: 'Botnet' });

    await orchestrator.analyzeIp('192.0.2.1');
    await orchestrator.analyzeIp('192.0.2.3');
    await orchestrator.analyzeIp('203.0.113.5');

    expect(await orchestrator.highRiskIps(110)).toEqual(['203.0.113.5', '192.0.2.3']);
  });
});
