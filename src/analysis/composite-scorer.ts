import {
  BASE_SCORE_PASSED,
  MAX_TRADITIONAL_SCORE,
  MIN_BASE_SCORE,
  SECURITY_FAILURE_SCORE,
  WARNING_PENALTY,
} from '../constants.js';
import type { CompositeScore, MetricResult, SecurityVerdict } from '../types.js';

/**
 * Traditional (non-AI) score. A failed verdict pins the score at
 * SECURITY_FAILURE_SCORE; otherwise the warning-adjusted base plus every
 * metric's points, capped at MAX_TRADITIONAL_SCORE.
 */
export function scoreComposite(verdict: SecurityVerdict, metrics: readonly MetricResult[]): CompositeScore {
  if (!verdict.passed) {
    return {
      traditionalScore: SECURITY_FAILURE_SCORE,
      breakdown: { securityFailure: SECURITY_FAILURE_SCORE },
      capped: false,
    };
  }

  const base = Math.max(MIN_BASE_SCORE, BASE_SCORE_PASSED - WARNING_PENALTY * verdict.warnings.length);
  const breakdown: Record<string, number> = { base };

  let total = base;
  for (const metric of metrics) {
    const points = Math.max(0, Math.min(metric.points, metric.maxPoints));
    breakdown[metric.name] = points;
    total += points;
  }

  return {
    traditionalScore: Math.min(MAX_TRADITIONAL_SCORE, total),
    breakdown,
    capped: total > MAX_TRADITIONAL_SCORE,
  };
}
