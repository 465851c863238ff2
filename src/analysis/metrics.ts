import {
  MARKET_SOURCE_PRIORITY,
  SNIPER_HIGH_RISK_GROUP,
  SNIPER_MAX_PCT,
  SNIPER_MEDIUM_RISK_GROUP,
  SNIPER_MIN_PCT,
  SNIPER_TOLERANCE_PCT,
  SNIPER_TOP_HOLDERS,
  VOLATILITY_MIN_SAMPLES,
  VOLATILITY_SAMPLE_SIZE,
  WHALE_THRESHOLD_PCT,
} from '../constants.js';
import { formatUsd, roundTo } from '../utils/helpers.js';
import type { HolderShare, MetricName, MetricResult, NormalizedSignal, RiskBucket } from '../types.js';

type MarketField = 'liquidityUsd' | 'volume24hUsd' | 'priceUsd' | 'priceChange24hPct';

interface Tier {
  min: number;
  points: number;
  bucket: RiskBucket;
}

// Sorted high to low; the first tier whose `min` the value reaches wins
const VOLUME_TIERS: readonly Tier[] = [
  { min: 1_000_000, points: 25, bucket: 'low' },
  { min: 100_000, points: 20, bucket: 'low' },
  { min: 10_000, points: 15, bucket: 'medium' },
  { min: 1_000, points: 10, bucket: 'high' },
  { min: -Infinity, points: 3, bucket: 'critical' },
];

const LIQUIDITY_TIERS: readonly Tier[] = [
  { min: 500_000, points: 15, bucket: 'low' },
  { min: 100_000, points: 12, bucket: 'low' },
  { min: 50_000, points: 10, bucket: 'medium' },
  { min: 10_000, points: 6, bucket: 'high' },
  { min: -Infinity, points: 2, bucket: 'critical' },
];

const COMPLETENESS_TIERS: readonly Tier[] = [
  { min: 5, points: 10, bucket: 'low' },
  { min: 4, points: 8, bucket: 'low' },
  { min: 3, points: 6, bucket: 'medium' },
  { min: 2, points: 3, bucket: 'high' },
  { min: -Infinity, points: 0, bucket: 'critical' },
];

function tierFor(value: number, tiers: readonly Tier[]): Tier {
  return tiers.find((t) => value >= t.min) ?? tiers[tiers.length - 1];
}

function absent(name: MetricName, maxPoints: number, detail: string): MetricResult {
  return { name, value: null, riskBucket: 'none', points: 0, maxPoints, detail };
}

/** First source, in market priority order, that reports the field */
export function pickMarketValue(signals: readonly NormalizedSignal[], field: MarketField): number | undefined {
  for (const source of MARKET_SOURCE_PRIORITY) {
    const value = signals.find((s) => s.source === source)?.[field];
    if (value !== undefined) return value;
  }
  return undefined;
}

/** Holders from every source, one entry per address, largest reported share wins */
export function mergeHolders(signals: readonly NormalizedSignal[]): HolderShare[] | undefined {
  const reporting = signals.filter((s) => s.holders !== undefined);
  if (reporting.length === 0) return undefined;

  const byAddress = new Map<string, number>();
  for (const signal of reporting) {
    for (const holder of signal.holders ?? []) {
      const prev = byAddress.get(holder.address);
      if (prev === undefined || holder.pct > prev) byAddress.set(holder.address, holder.pct);
    }
  }
  return [...byAddress.entries()]
    .map(([address, pct]) => ({ address, pct }))
    .sort((a, b) => b.pct - a.pct);
}

function pickPriceSamples(signals: readonly NormalizedSignal[]): readonly number[] | undefined {
  for (const source of MARKET_SOURCE_PRIORITY) {
    const samples = signals.find((s) => s.source === source)?.priceSamples;
    if (samples !== undefined && samples.length > 0) return samples;
  }
  return undefined;
}

// ─── Extractors ──────────────────────────────────────────────────────

export function volatilityMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const maxPoints = 15;
  const samples = pickPriceSamples(signals)?.slice(0, VOLATILITY_SAMPLE_SIZE);
  if (!samples || samples.length < VOLATILITY_MIN_SAMPLES) {
    return absent('volatility', maxPoints, `Fewer than ${VOLATILITY_MIN_SAMPLES} recent trade prices`);
  }

  const mean = samples.reduce((sum, p) => sum + p, 0) / samples.length;
  if (mean <= 0) return absent('volatility', maxPoints, 'Trade prices average to zero');

  const volatility = ((Math.max(...samples) - Math.min(...samples)) / mean) * 100;

  let points: number;
  let riskBucket: RiskBucket;
  if (volatility <= 5) { points = 15; riskBucket = 'low'; }
  else if (volatility <= 15) { points = 10; riskBucket = 'medium'; }
  else if (volatility <= 30) { points = 5; riskBucket = 'high'; }
  else { points = 0; riskBucket = 'critical'; }

  return {
    name: 'volatility',
    value: roundTo(volatility, 2),
    riskBucket,
    points,
    maxPoints,
    detail: `${volatility.toFixed(2)}% range over ${samples.length} trades`,
  };
}

export function whaleConcentrationMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const maxPoints = 20;
  const holders = mergeHolders(signals);
  if (!holders) return absent('whaleConcentration', maxPoints, 'No holder distribution reported');

  const whales = holders.filter((h) => h.pct > WHALE_THRESHOLD_PCT);
  const control = whales.reduce((sum, h) => sum + h.pct, 0);

  let points: number;
  let riskBucket: RiskBucket;
  if (whales.length === 0) { points = 20; riskBucket = 'low'; }
  else if (control < 30) { points = 15; riskBucket = 'medium'; }
  else if (control <= 60) { points = 10; riskBucket = 'high'; }
  else { points = 0; riskBucket = 'critical'; }

  return {
    name: 'whaleConcentration',
    value: roundTo(control, 2),
    riskBucket,
    points,
    maxPoints,
    detail: `${whales.length} whale(s) controlling ${control.toFixed(1)}% of supply`,
  };
}

export function sniperPatternMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const maxPoints = 10;
  const holders = mergeHolders(signals);
  if (!holders) return absent('sniperPattern', maxPoints, 'No holder distribution reported');

  const candidates = holders
    .slice(0, SNIPER_TOP_HOLDERS)
    .filter((h) => h.pct >= SNIPER_MIN_PCT && h.pct <= SNIPER_MAX_PCT);

  // Float noise on share values must not split an otherwise exact group
  const tolerance = SNIPER_TOLERANCE_PCT + 1e-9;
  let largestGroup = 0;
  for (const anchor of candidates) {
    const group = candidates.filter((h) => Math.abs(h.pct - anchor.pct) <= tolerance).length;
    if (group > largestGroup) largestGroup = group;
  }

  let points: number;
  let riskBucket: RiskBucket;
  if (largestGroup >= SNIPER_HIGH_RISK_GROUP) { points = 0; riskBucket = 'high'; }
  else if (largestGroup >= SNIPER_MEDIUM_RISK_GROUP) { points = 5; riskBucket = 'medium'; }
  else { points = 10; riskBucket = 'low'; }

  return {
    name: 'sniperPattern',
    value: largestGroup,
    riskBucket,
    points,
    maxPoints,
    detail: `${largestGroup} top holder(s) with near-identical shares`,
  };
}

export function volumeMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const volume = pickMarketValue(signals, 'volume24hUsd');
  if (volume === undefined) return absent('volume', 25, 'No 24h volume reported');
  const tier = tierFor(volume, VOLUME_TIERS);
  return {
    name: 'volume',
    value: volume,
    riskBucket: tier.bucket,
    points: tier.points,
    maxPoints: 25,
    detail: `24h volume ${formatUsd(volume)}`,
  };
}

export function liquidityMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const liquidity = pickMarketValue(signals, 'liquidityUsd');
  if (liquidity === undefined) return absent('liquidity', 15, 'No liquidity reported');
  const tier = tierFor(liquidity, LIQUIDITY_TIERS);
  return {
    name: 'liquidity',
    value: liquidity,
    riskBucket: tier.bucket,
    points: tier.points,
    maxPoints: 15,
    detail: `Liquidity ${formatUsd(liquidity)}`,
  };
}

export function priceStabilityMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const maxPoints = 10;
  const change = pickMarketValue(signals, 'priceChange24hPct');
  if (change === undefined) return absent('priceStability', maxPoints, 'No 24h price change reported');

  const magnitude = Math.abs(change);
  let points: number;
  let riskBucket: RiskBucket;
  if (magnitude <= 5) { points = 10; riskBucket = 'low'; }
  else if (magnitude <= 15) { points = 6; riskBucket = 'medium'; }
  else if (magnitude <= 30) { points = 3; riskBucket = 'high'; }
  else { points = 0; riskBucket = 'critical'; }

  return {
    name: 'priceStability',
    value: change,
    riskBucket,
    points,
    maxPoints,
    detail: `24h price change ${change.toFixed(2)}%`,
  };
}

export function dataCompletenessMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const complete = signals.filter((s) => s.completeness).length;
  const tier = tierFor(complete, COMPLETENESS_TIERS);
  return {
    name: 'dataCompleteness',
    value: complete,
    riskBucket: tier.bucket,
    points: tier.points,
    maxPoints: 10,
    detail: `${complete} of ${signals.length} sources returned usable data`,
  };
}

export function metadataMetric(signals: readonly NormalizedSignal[]): MetricResult {
  const reported = signals.filter((s) => s.metadata !== undefined);
  if (reported.length === 0) return absent('metadata', 5, 'No token metadata reported');

  const name = reported.find((s) => s.metadata?.name)?.metadata?.name;
  const symbol = reported.find((s) => s.metadata?.symbol)?.metadata?.symbol;
  const full = name !== undefined && symbol !== undefined;

  return {
    name: 'metadata',
    value: full ? 1 : 0,
    riskBucket: full ? 'low' : 'medium',
    points: full ? 5 : 0,
    maxPoints: 5,
    detail: full ? `${name} (${symbol})` : 'Token name or symbol missing',
  };
}

const EXTRACTORS: ReadonlyArray<(signals: readonly NormalizedSignal[]) => MetricResult> = [
  volatilityMetric,
  whaleConcentrationMetric,
  sniperPatternMetric,
  volumeMetric,
  liquidityMetric,
  priceStabilityMetric,
  dataCompletenessMetric,
  metadataMetric,
];

export function computeMetrics(signals: readonly NormalizedSignal[]): MetricResult[] {
  return EXTRACTORS.map((extract) => extract(signals));
}
