import { pickMarketValue, mergeHolders } from '../analysis/metrics.js';
import { formatUsd } from '../utils/helpers.js';
import type { CompositeScore, MetricResult, NormalizedSignal, SecurityVerdict } from '../types.js';

export const SYSTEM_PROMPT = `You are a Solana token risk analyst. You receive security findings, market data and
pre-computed metric scores for one token and return a single JSON object:

{
  "ai_score": number 0-100 (higher is safer and more attractive),
  "risk_assessment": "low" | "medium" | "high" | "critical",
  "recommendation": "BUY" | "CONSIDER" | "HOLD" | "CAUTION" | "AVOID",
  "confidence": number 0-100,
  "reasoning": short paragraph,
  "key_insights": [strings],
  "risk_factors": [strings],
  "stop_flags": [critical security issues only]
}

Missing data is a gap, not a risk factor by itself. Respond with JSON only.`;

function flag(value: boolean | undefined): string {
  if (value === undefined) return 'unknown';
  return value ? 'yes' : 'no';
}

function firstDefined<K extends keyof NormalizedSignal>(
  signals: readonly NormalizedSignal[],
  key: K,
): NormalizedSignal[K] | undefined {
  return signals.find((s) => s[key] !== undefined)?.[key];
}

/** Plain-text summary of one analysis for the LLM */
export function buildAnalysisPrompt(
  tokenAddress: string,
  signals: readonly NormalizedSignal[],
  verdict: SecurityVerdict,
  metrics: readonly MetricResult[],
  composite: CompositeScore,
): string {
  const liquidity = pickMarketValue(signals, 'liquidityUsd');
  const volume = pickMarketValue(signals, 'volume24hUsd');
  const price = pickMarketValue(signals, 'priceUsd');
  const change = pickMarketValue(signals, 'priceChange24hPct');
  const holders = mergeHolders(signals);
  const metadata = signals.find((s) => s.metadata?.name)?.metadata;

  const lines = [
    `Token: ${tokenAddress}`,
    metadata?.name ? `Name: ${metadata.name} (${metadata.symbol ?? '?'})` : 'Name: unknown',
    '',
    'SECURITY',
    `Mint authority active: ${flag(signals.some((s) => s.mintAuthorityActive) || firstDefined(signals, 'mintAuthorityActive'))}`,
    `Freeze authority active: ${flag(signals.some((s) => s.freezeAuthorityActive) || firstDefined(signals, 'freezeAuthorityActive'))}`,
    `LP locked or burned: ${flag(firstDefined(signals, 'lpLocked'))}`,
    `LP providers: ${firstDefined(signals, 'lpProviderCount') ?? 'unknown'}`,
    `Warnings: ${verdict.warnings.length > 0 ? verdict.warnings.join('; ') : 'none'}`,
    '',
    'MARKET',
    `Price: ${price !== undefined ? `$${price}` : 'unknown'}`,
    `24h change: ${change !== undefined ? `${change.toFixed(2)}%` : 'unknown'}`,
    `Liquidity: ${liquidity !== undefined ? formatUsd(liquidity) : 'unknown'}`,
    `24h volume: ${volume !== undefined ? formatUsd(volume) : 'unknown'}`,
    `Holders: ${firstDefined(signals, 'holderCount') ?? 'unknown'}`,
    `Top holders: ${holders ? holders.slice(0, 5).map((h) => `${h.pct.toFixed(2)}%`).join(', ') || 'none' : 'unknown'}`,
    '',
    'METRICS',
    ...metrics.map((m) => `${m.name}: ${m.points}/${m.maxPoints} (${m.riskBucket}) ${m.detail}`),
    '',
    `Traditional score: ${composite.traditionalScore}/95`,
    `Sources with data: ${signals.filter((s) => s.completeness).map((s) => s.source).join(', ') || 'none'}`,
  ];

  return lines.join('\n');
}
