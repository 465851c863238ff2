import type { SourceName } from './types.js';

export const SERVICE_VERSION = '1.0.0';

export const SOLSCAN_BASE = 'https://solscan.io';

// Provider endpoints (overridable through env, see config.ts)
export const GOPLUS_API_BASE = 'https://api.gopluslabs.io/api/v1';
export const RUGCHECK_API_BASE = 'https://api.rugcheck.xyz/v1';
export const SOLSNIFFER_API_BASE = 'https://solsniffer.com/api/v2';
export const BIRDEYE_API_BASE = 'https://public-api.birdeye.so';
export const DEXSCREENER_API_BASE = 'https://api.dexscreener.com';
export const HELIUS_RPC_BASE = 'https://mainnet.helius-rpc.com';

/** First source that reports a market numeric wins */
export const MARKET_SOURCE_PRIORITY: readonly SourceName[] = [
  'birdeye',
  'dexscreener',
  'rugcheck',
  'solsniffer',
  'goplus',
  'helius',
];

/** Sources whose facts feed the security gate */
export const SECURITY_SOURCES: ReadonlySet<SourceName> = new Set<SourceName>(['goplus', 'rugcheck', 'solsniffer', 'helius']);

/** Sources that report top-holder lists */
export const HOLDER_SOURCES: ReadonlySet<SourceName> = new Set<SourceName>(['goplus', 'rugcheck']);

// Wrapped SOL and the system program are never analysis targets from webhooks
export const IGNORED_MINTS: ReadonlySet<string> = new Set([
  'So11111111111111111111111111111111111111112',
  '11111111111111111111111111111111',
]);

// ─── Composite scoring ───────────────────────────────────────────────

export const BASE_SCORE_PASSED = 60;
export const WARNING_PENALTY = 8;
export const MIN_BASE_SCORE = 20;
export const MAX_TRADITIONAL_SCORE = 95;
/** Fixed score when the security gate fails (must stay <= 25) */
export const SECURITY_FAILURE_SCORE = 10;

// ─── Metric thresholds ───────────────────────────────────────────────

export const WHALE_THRESHOLD_PCT = 2;
/** Whale control above these shares is high / medium whale risk */
export const WHALE_HIGH_RISK_PCT = 60;
export const WHALE_MEDIUM_RISK_PCT = 30;
export const VOLATILITY_SAMPLE_SIZE = 20;
export const VOLATILITY_MIN_SAMPLES = 3;

export const SNIPER_TOP_HOLDERS = 50;
export const SNIPER_TOLERANCE_PCT = 0.05;
export const SNIPER_MIN_PCT = 0.1;
export const SNIPER_MAX_PCT = 5;
export const SNIPER_HIGH_RISK_GROUP = 10;
export const SNIPER_MEDIUM_RISK_GROUP = 5;

// ─── Verdict thresholds ──────────────────────────────────────────────

export const GO_THRESHOLD = 80;
export const WATCH_THRESHOLD = 60;
