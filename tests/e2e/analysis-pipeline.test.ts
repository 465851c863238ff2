import { describe, it, expect } from 'vitest';
import { TokenAnalyzer, cacheKey } from '../../src/analysis/token-analyzer.js';
import { EngineEmitter } from '../../src/events/event-emitter.js';
import { AnalysisCache, Cache, type RedisClient } from '../../src/data/redis-cache.js';
import { InfrastructureUnavailableError, InvalidTokenAddressError } from '../../src/errors.js';
import type { Analysis, AnalysisStore, SecurityVerdict } from '../../src/types.js';
import {
  FakeOracle,
  HangingSource,
  MemoryStore,
  TOKEN,
  aiResult,
  birdeyePayload,
  cleanSources,
  dexscreenerPayload,
  failingSource,
  goplusPayload,
  heliusPayload,
  rugcheckPayload,
  staticSource,
} from '../helpers/fixtures.js';

function metricPoints(analysis: Analysis): Record<string, number> {
  return Object.fromEntries(analysis.metrics.map((m) => [m.name, m.points]));
}

describe('analysis pipeline', () => {
  describe('clean, liquid token', () => {
    it('should score the capped maximum and decide GO', async () => {
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore() });

      const { analysis, cached } = await analyzer.analyze({ tokenAddress: TOKEN });

      expect(cached).toBe(false);
      expect(analysis.security).toEqual({ passed: true, criticalIssues: [], warnings: [] });
      expect(metricPoints(analysis)).toEqual({
        volatility: 15,
        whaleConcentration: 20,
        sniperPattern: 10,
        volume: 25,
        liquidity: 15,
        priceStability: 10,
        dataCompleteness: 10,
        metadata: 5,
      });
      expect(analysis.composite).toMatchObject({ traditionalScore: 95, capped: true });
      expect(analysis.composite.breakdown.base).toBe(60);
      expect(analysis.finalScore).toBe(95);
      expect(analysis.verdictDecision).toBe('GO');
      expect(analysis.riskLevel).toBe('low');
      expect(analysis.recommendation).toBe('consider');
      expect(analysis.aiEnhanced).toBe(false);
      expect(analysis.ai).toBeNull();
      expect(analysis.dataSourcesUsed).toEqual(['goplus', 'rugcheck', 'birdeye', 'dexscreener', 'helius']);
      expect(analysis.warnings).toEqual([]);
      expect(analysis.metadata).toMatchObject({
        sourcesAttempted: 5,
        sourcesSucceeded: 5,
        securityShortCircuited: false,
      });
    });

    it('should blend an AI opinion on deep analyses', async () => {
      const oracle = new FakeOracle(async () => aiResult({ aiScore: 90 }));
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore(), oracle });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(oracle.prompts).toHaveLength(1);
      expect(oracle.prompts[0]).toContain(`Token: ${TOKEN}`);
      expect(analysis.blend).toEqual({
        finalScore: 100,
        aiEnhanced: true,
        agreementBonusApplied: true,
        weightedScore: 93,
      });
      expect(analysis.finalScore).toBe(100);
      expect(analysis.aiEnhanced).toBe(true);
      expect(analysis.ai?.aiScore).toBe(90);
      expect(analysis.verdictDecision).toBe('GO');
    });

    it('should not call the AI for quick analyses', async () => {
      const oracle = new FakeOracle(async () => aiResult());
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore(), oracle });

      await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'quick' });

      expect(oracle.prompts).toHaveLength(0);
    });
  });

  describe('security failure', () => {
    it('should short-circuit on an active mint authority', async () => {
      const emitter = new EngineEmitter();
      const shortCircuits: Array<[string, SecurityVerdict]> = [];
      emitter.on('securityShortCircuit', (token, verdict) => shortCircuits.push([token, verdict]));

      const oracle = new FakeOracle(async () => aiResult());
      const analyzer = new TokenAnalyzer({
        sources: [
          staticSource('goplus', goplusPayload({ mintable: { status: '1' } })),
          staticSource('rugcheck', rugcheckPayload()),
          staticSource('birdeye', birdeyePayload()),
          staticSource('dexscreener', dexscreenerPayload()),
          staticSource('helius', heliusPayload()),
        ],
        cache: new MemoryStore(),
        oracle,
        emitter,
      });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(analysis.security).toEqual({
        passed: false,
        criticalIssues: ['Mint authority active (goplus)'],
        warnings: [],
      });
      expect(analysis.metrics).toEqual([]);
      expect(analysis.composite).toEqual({ traditionalScore: 10, breakdown: { securityFailure: 10 }, capped: false });
      expect(analysis.finalScore).toBe(10);
      expect(analysis.verdictDecision).toBe('NO');
      expect(analysis.riskLevel).toBe('critical');
      expect(analysis.recommendation).toBe('avoid');
      expect(analysis.metadata.securityShortCircuited).toBe(true);
      expect(analysis.aiEnhanced).toBe(false);
      expect(analysis.warnings).toEqual([]);
      expect(oracle.prompts).toHaveLength(0);
      expect(shortCircuits).toEqual([[TOKEN, analysis.security]]);
    });
  });

  describe('degraded sources', () => {
    it('should finish on time without a hanging source', async () => {
      const hanging = new HangingSource('helius');
      const analyzer = new TokenAnalyzer({
        sources: [...cleanSources().filter((s) => s.name !== 'helius'), hanging],
        cache: new MemoryStore(),
        options: { sourceTimeoutMs: 100 },
      });

      const started = Date.now();
      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN });
      const elapsed = Date.now() - started;

      expect(elapsed).toBeLessThan(1000);
      expect(hanging.aborted).toBe(true);
      expect(analysis.dataSourcesUsed).toEqual(['goplus', 'rugcheck', 'birdeye', 'dexscreener']);
      expect(analysis.metrics.find((m) => m.name === 'dataCompleteness')).toMatchObject({ value: 4, points: 8 });
      expect(analysis.metadata.sourceStatuses.helius).toBe('timeout');
      expect(analysis.warnings).toEqual(['Source helius timed out: No response within 100ms']);
      expect(analysis.verdictDecision).toBe('GO');
    });

    it('should still produce a verdict when every source fails', async () => {
      const analyzer = new TokenAnalyzer({
        sources: [failingSource('goplus'), failingSource('dexscreener')],
        cache: new MemoryStore(),
      });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN });

      expect(analysis.dataSourcesUsed).toEqual([]);
      expect(analysis.warnings).toEqual([
        'Source goplus failed: test failure',
        'Source dexscreener failed: test failure',
        'No data sources responded',
      ]);
      expect(analysis.security.warnings).toEqual(['No source reported security data']);
      expect(analysis.composite.traditionalScore).toBe(52);
      expect(analysis.verdictDecision).toBe('NO');
      expect(analysis.riskLevel).toBe('high');
    });

    it('should record a source that throws as failed', async () => {
      const analyzer = new TokenAnalyzer({
        sources: [
          ...cleanSources(),
          {
            name: 'solsniffer',
            fetch: async () => {
              throw new Error('socket hang up');
            },
          },
        ],
        cache: new MemoryStore(),
      });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN });

      expect(analysis.metadata.sourceStatuses.solsniffer).toBe('error');
      expect(analysis.warnings).toEqual(['Source solsniffer failed: socket hang up']);
      expect(analysis.dataSourcesUsed).toHaveLength(5);
    });

    it('should fail when the cache and every source are down', async () => {
      const brokenCache: AnalysisStore = {
        get: async () => {
          throw new Error('connection refused');
        },
        put: async () => undefined,
      };
      const analyzer = new TokenAnalyzer({ sources: [failingSource('goplus')], cache: brokenCache });

      await expect(analyzer.analyze({ tokenAddress: TOKEN })).rejects.toBeInstanceOf(InfrastructureUnavailableError);
    });

    it('should fail when Redis reads fail and every source is down', async () => {
      const redis: RedisClient = {
        get: async () => {
          throw new Error('ECONNRESET');
        },
        setex: async () => 'OK',
        del: async () => 0,
        quit: async () => 'OK',
      };
      const analyzer = new TokenAnalyzer({
        sources: [failingSource('goplus'), failingSource('rugcheck')],
        cache: new AnalysisCache(new Cache(undefined, redis)),
      });

      await expect(analyzer.analyze({ tokenAddress: TOKEN })).rejects.toBeInstanceOf(InfrastructureUnavailableError);
    });

    it('should continue when only the cache read fails', async () => {
      const brokenCache: AnalysisStore = {
        get: async () => {
          throw new Error('connection refused');
        },
        put: async () => {
          throw new Error('connection refused');
        },
      };
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: brokenCache });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN });

      expect(analysis.verdictDecision).toBe('GO');
      expect(analysis.warnings).toEqual([
        'Cache read failed: connection refused',
        'Cache write failed: connection refused',
      ]);
    });
  });

  describe('AI fallback', () => {
    it('should fall back to the traditional score when the AI fails', async () => {
      const emitter = new EngineEmitter();
      const fallbacks: string[] = [];
      emitter.on('aiFallback', (_token, reason) => fallbacks.push(reason));

      const oracle = new FakeOracle(async () => {
        throw new Error('rate limited');
      });
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore(), oracle, emitter });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(analysis.finalScore).toBe(analysis.composite.traditionalScore);
      expect(analysis.aiEnhanced).toBe(false);
      expect(analysis.ai).toBeNull();
      expect(analysis.metadata.aiFailureReason).toBe('rate limited');
      expect(analysis.warnings).toEqual(['AI enrichment unavailable: rate limited']);
      expect(fallbacks).toEqual(['rate limited']);
    });

    it('should time out a slow AI call', async () => {
      let aborted = false;
      const oracle = new FakeOracle((signal) => new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      }));
      const analyzer = new TokenAnalyzer({
        sources: cleanSources(),
        cache: new MemoryStore(),
        oracle,
        options: { aiTimeoutMs: 50 },
      });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(aborted).toBe(true);
      expect(analysis.metadata.aiFailureReason).toBe('AI inference timed out after 50ms');
      expect(analysis.finalScore).toBe(95);
    });

    it('should note a missing AI configuration on deep analyses', async () => {
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore() });

      const { analysis } = await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(analysis.warnings).toEqual(['AI enrichment unavailable: AI enrichment not configured']);
    });
  });

  describe('caching', () => {
    it('should serve repeats from cache and bypass it on refresh', async () => {
      const sources = cleanSources();
      const store = new MemoryStore();
      const emitter = new EngineEmitter();
      const completed: string[] = [];
      emitter.on('analysisCompleted', (analysis) => completed.push(analysis.id));
      const analyzer = new TokenAnalyzer({ sources, cache: store, emitter });

      const first = await analyzer.analyze({ tokenAddress: TOKEN });
      const second = await analyzer.analyze({ tokenAddress: TOKEN });
      const refreshed = await analyzer.analyze({ tokenAddress: TOKEN, refresh: true });

      expect(second.cached).toBe(true);
      expect(second.analysis).toEqual(first.analysis);
      expect(refreshed.cached).toBe(false);
      expect(sources[0].calls).toBe(2);
      expect(completed).toEqual([first.analysis.id, refreshed.analysis.id]);
    });

    it('should cache quick and deep analyses separately with their TTLs', async () => {
      const store = new MemoryStore();
      const analyzer = new TokenAnalyzer({
        sources: cleanSources(),
        cache: store,
        options: { quickTtlSeconds: 60, deepTtlSeconds: 600 },
      });

      await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'quick' });
      await analyzer.analyze({ tokenAddress: TOKEN, analysisType: 'deep' });

      expect(store.entries.get(cacheKey(TOKEN, 'quick'))?.ttlSeconds).toBe(60);
      expect(store.entries.get(cacheKey(TOKEN, 'deep'))?.ttlSeconds).toBe(600);
    });
  });

  describe('security-only and whale reports', () => {
    it('should check security without touching market sources or the cache', async () => {
      const sources = [
        staticSource('goplus', goplusPayload({ mintable: { status: '1' } })),
        staticSource('rugcheck', rugcheckPayload()),
        staticSource('birdeye', birdeyePayload()),
        staticSource('dexscreener', dexscreenerPayload()),
        staticSource('helius', heliusPayload()),
      ];
      const store = new MemoryStore();
      const analyzer = new TokenAnalyzer({ sources, cache: store });

      const report = await analyzer.checkSecurity(` ${TOKEN} `);

      expect(report.tokenAddress).toBe(TOKEN);
      expect(report.security).toEqual({ passed: false, criticalIssues: ['Mint authority active (goplus)'], warnings: [] });
      expect(report.dataSourcesUsed).toEqual(['goplus', 'rugcheck', 'helius']);
      expect(sources.map((s) => s.calls)).toEqual([1, 1, 0, 0, 1]);
      expect(store.entries.size).toBe(0);
    });

    it('should warn when no security source responds', async () => {
      const analyzer = new TokenAnalyzer({
        sources: [failingSource('goplus'), failingSource('rugcheck')],
        cache: new MemoryStore(),
      });

      const report = await analyzer.checkSecurity(TOKEN);

      expect(report.security).toEqual({ passed: true, criticalIssues: [], warnings: ['No source reported security data'] });
      expect(report.warnings).toEqual([
        'Source goplus failed: test failure',
        'Source rugcheck failed: test failure',
        'No data sources responded',
      ]);
    });

    it('should report whales from the sources that still answer', async () => {
      const goplus = goplusPayload({
        holders: [
          { account: 'whale1', percent: '45' },
          { account: 'whale2', percent: '20' },
          { account: 'small', percent: '1' },
        ],
      });
      const analyzer = new TokenAnalyzer({
        sources: [staticSource('goplus', goplus), failingSource('rugcheck'), staticSource('birdeye', birdeyePayload())],
        cache: new MemoryStore(),
      });

      const report = await analyzer.whaleActivity(TOKEN);

      expect(report).toMatchObject({
        holderCount: 15230,
        holdersReported: 3,
        whaleCount: 2,
        whaleControlPct: 65,
        topWhalePct: 45,
        whaleRiskLevel: 'high',
        dataSourcesUsed: ['goplus'],
        warnings: ['Source rugcheck failed: test failure'],
      });
    });

    it('should reject an invalid address for both reports', async () => {
      const analyzer = new TokenAnalyzer({ sources: cleanSources(), cache: new MemoryStore() });

      await expect(analyzer.checkSecurity('nope')).rejects.toBeInstanceOf(InvalidTokenAddressError);
      await expect(analyzer.whaleActivity('nope')).rejects.toBeInstanceOf(InvalidTokenAddressError);
    });
  });

  it('should reject an invalid token address before any work', async () => {
    const sources = cleanSources();
    const analyzer = new TokenAnalyzer({ sources, cache: new MemoryStore() });

    await expect(analyzer.analyze({ tokenAddress: 'not-a-valid-address' })).rejects.toBeInstanceOf(InvalidTokenAddressError);
    expect(sources.every((s) => s.calls === 0)).toBe(true);
  });
});
