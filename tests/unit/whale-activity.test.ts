import { describe, it, expect } from 'vitest';
import { buildWhaleReport, whaleRiskLevel } from '../../src/analysis/whale-activity.js';
import { TOKEN } from '../helpers/fixtures.js';
import type { HolderShare, NormalizedSignal } from '../../src/types.js';

function holders(...pcts: number[]): HolderShare[] {
  return pcts.map((pct, i) => ({ address: `holder${i}`, pct }));
}

describe('whaleRiskLevel', () => {
  it.each([
    [70, 'high'],
    [60, 'medium'],
    [35, 'medium'],
    [30, 'low'],
    [0, 'low'],
  ] as const)('should rate %d%% whale control as %s', (control, level) => {
    expect(whaleRiskLevel(control, true)).toBe(level);
  });

  it('should be unknown without holder data', () => {
    expect(whaleRiskLevel(0, false)).toBe('unknown');
  });
});

describe('buildWhaleReport', () => {
  it('should merge holders across sources and count those above 2%', () => {
    const signals: NormalizedSignal[] = [
      { source: 'goplus', completeness: true, holderCount: 900, holders: holders(40, 25, 1) },
      { source: 'rugcheck', completeness: true, holders: [{ address: 'holder0', pct: 45 }] },
    ];

    const report = buildWhaleReport(TOKEN, signals, []);

    expect(report).toMatchObject({
      tokenAddress: TOKEN,
      holderCount: 900,
      holdersReported: 3,
      whaleCount: 2,
      whaleControlPct: 70,
      topWhalePct: 45,
      whaleRiskLevel: 'high',
      whales: [
        { address: 'holder0', pct: 45 },
        { address: 'holder1', pct: 25 },
      ],
      dataSourcesUsed: ['goplus', 'rugcheck'],
      warnings: [],
    });
    expect(report.metric).toMatchObject({ name: 'whaleConcentration', value: 70, riskBucket: 'critical', points: 0 });
  });

  it('should report no whales when every holder is at or below 2%', () => {
    const report = buildWhaleReport(TOKEN, [{ source: 'goplus', completeness: true, holders: holders(2, 1.5) }], []);

    expect(report).toMatchObject({ whaleCount: 0, whaleControlPct: 0, topWhalePct: 0, whaleRiskLevel: 'low', whales: [] });
  });

  it('should be unknown when no source reports holders', () => {
    const report = buildWhaleReport(TOKEN, [{ source: 'rugcheck', completeness: false }], ['Source rugcheck failed: down']);

    expect(report).toMatchObject({
      holderCount: null,
      holdersReported: 0,
      whaleCount: 0,
      whaleRiskLevel: 'unknown',
      dataSourcesUsed: [],
      warnings: ['Source rugcheck failed: down'],
    });
    expect(report.metric.detail).toBe('No holder distribution reported');
  });
});
