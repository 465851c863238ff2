import { clamp, roundTo } from '../utils/helpers.js';
import type { AIResult, BlendPolicy, BlendResult } from '../types.js';

export const DEFAULT_BLEND_POLICY: BlendPolicy = {
  traditionalWeight: 0.6,
  aiWeight: 0.4,
  agreementWindow: 10,
  agreementBonus: 15,
};

export function blend(
  traditionalScore: number,
  ai: AIResult | null,
  policy: BlendPolicy = DEFAULT_BLEND_POLICY,
): BlendResult {
  if (!ai) {
    return {
      finalScore: traditionalScore,
      aiEnhanced: false,
      agreementBonusApplied: false,
      weightedScore: null,
    };
  }

  const weighted = policy.traditionalWeight * traditionalScore + policy.aiWeight * ai.aiScore;
  const agrees = Math.abs(traditionalScore - ai.aiScore) <= policy.agreementWindow;
  const final = clamp(weighted + (agrees ? policy.agreementBonus : 0), 0, 100);

  return {
    finalScore: roundTo(final, 1),
    aiEnhanced: true,
    agreementBonusApplied: agrees,
    weightedScore: roundTo(weighted, 1),
  };
}
