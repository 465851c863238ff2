import { GO_THRESHOLD, WATCH_THRESHOLD } from '../constants.js';
import type { Classification, SecurityVerdict } from '../types.js';

export function classify(finalScore: number, verdict: SecurityVerdict): Classification {
  if (!verdict.passed) {
    return { riskLevel: 'critical', recommendation: 'avoid', verdictDecision: 'NO' };
  }
  if (finalScore >= GO_THRESHOLD) {
    return { riskLevel: 'low', recommendation: 'consider', verdictDecision: 'GO' };
  }
  if (finalScore >= WATCH_THRESHOLD) {
    return { riskLevel: 'medium', recommendation: 'caution', verdictDecision: 'WATCH' };
  }
  return { riskLevel: 'high', recommendation: 'avoid', verdictDecision: 'NO' };
}
