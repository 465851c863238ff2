import { WHALE_HIGH_RISK_PCT, WHALE_MEDIUM_RISK_PCT, WHALE_THRESHOLD_PCT } from '../constants.js';
import { mergeHolders, whaleConcentrationMetric } from './metrics.js';
import { roundTo } from '../utils/helpers.js';
import type { NormalizedSignal, WhaleReport, WhaleRiskLevel } from '../types.js';

export function whaleRiskLevel(controlPct: number, holdersKnown: boolean): WhaleRiskLevel {
  if (!holdersKnown) return 'unknown';
  if (controlPct > WHALE_HIGH_RISK_PCT) return 'high';
  if (controlPct > WHALE_MEDIUM_RISK_PCT) return 'medium';
  return 'low';
}

/** Whales are holders above 2% of supply, merged across sources by address */
export function buildWhaleReport(
  tokenAddress: string,
  signals: readonly NormalizedSignal[],
  warnings: readonly string[],
): WhaleReport {
  const holders = mergeHolders(signals);
  const whales = (holders ?? []).filter((h) => h.pct > WHALE_THRESHOLD_PCT);
  const control = whales.reduce((sum, h) => sum + h.pct, 0);
  const holderCount = signals.find((s) => s.holderCount !== undefined)?.holderCount;

  return {
    tokenAddress,
    holderCount: holderCount ?? null,
    holdersReported: holders?.length ?? 0,
    whaleCount: whales.length,
    whaleControlPct: roundTo(control, 2),
    topWhalePct: roundTo(whales[0]?.pct ?? 0, 2),
    whaleRiskLevel: whaleRiskLevel(control, holders !== undefined),
    whales,
    metric: whaleConcentrationMetric(signals),
    dataSourcesUsed: signals.filter((s) => s.completeness).map((s) => s.source),
    warnings,
    createdAt: Date.now(),
  };
}
