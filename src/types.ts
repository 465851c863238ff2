// ─── Service Configuration ───────────────────────────────────────────

export interface AppConfig {
  server: {
    port: number;
    host: string;
    bodyLimit: string;
    webhookSecret: string;
  };
  redis: {
    url: string;
  };
  database: {
    enabled: boolean;
    path: string;
  };
  sources: {
    timeoutMs: number;
    enabled: Record<SourceName, boolean>;
    rateLimits: Record<SourceName, number>;
    goplus: { baseUrl: string };
    rugcheck: { baseUrl: string };
    solsniffer: { baseUrl: string; apiKey: string };
    birdeye: { baseUrl: string; apiKey: string };
    dexscreener: { baseUrl: string };
    helius: { rpcUrl: string; apiKey: string };
  };
  security: SecurityPolicy;
  ai: {
    enabled: boolean;
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    temperature: number;
    maxTokens: number;
    blend: BlendPolicy;
  };
  cache: {
    quickTtlSeconds: number;
    deepTtlSeconds: number;
    keyPrefix: string;
  };
  webhooks: {
    concurrency: number;
    maxRetries: number;
  };
  telegram: {
    enabled: boolean;
    botToken: string;
    chatId: string;
    notifyDecisions: VerdictDecision[];
  };
  snapshots: {
    enabled: boolean;
    intervalSeconds: number;
    maxTokensPerRun: number;
    delayMs: number;
    analysisType: AnalysisType;
  };
}

export interface SecurityPolicy {
  /** Top-10 holder share (percent) above which a warning is raised */
  top10WarningPct: number;
  /** LP provider counts below this raise a warning */
  minLpProviders: number;
}

export interface BlendPolicy {
  traditionalWeight: number;
  aiWeight: number;
  /** Max |traditional - ai| that still counts as agreement */
  agreementWindow: number;
  agreementBonus: number;
}

// ─── Data Sources ────────────────────────────────────────────────────

export type SourceName = 'goplus' | 'rugcheck' | 'solsniffer' | 'birdeye' | 'dexscreener' | 'helius';

export type ServiceStatus = 'ok' | 'error' | 'timeout';

/** Raw provider response for one analysis request. Never persisted on its own. */
export interface ServiceResult {
  readonly source: SourceName;
  readonly tokenAddress: string;
  readonly fetchedAt: number;
  readonly status: ServiceStatus;
  readonly payload: unknown;
  readonly errorDetail?: string;
}

export interface DataSource {
  readonly name: SourceName;
  fetch(tokenAddress: string, signal?: AbortSignal): Promise<ServiceResult>;
}

// ─── Normalized Signals ──────────────────────────────────────────────

export interface HolderShare {
  readonly address: string;
  /** Percent of supply, 0-100 */
  readonly pct: number;
}

export interface TokenMetadata {
  readonly name?: string;
  readonly symbol?: string;
  readonly uri?: string;
}

/**
 * Scoring-relevant facts reported by one source.
 * Every field is optional: undefined means the source did not report it,
 * which is not the same as false or 0.
 */
export interface NormalizedSignal {
  readonly source: SourceName;
  readonly completeness: boolean;
  readonly mintAuthorityActive?: boolean;
  readonly freezeAuthorityActive?: boolean;
  readonly rugged?: boolean;
  readonly lpLocked?: boolean;
  readonly metadataMutable?: boolean;
  readonly fileMetadataPresent?: boolean;
  readonly lpProviderCount?: number;
  readonly top10HolderPct?: number;
  readonly holderCount?: number;
  readonly holders?: readonly HolderShare[];
  readonly liquidityUsd?: number;
  readonly volume24hUsd?: number;
  readonly priceUsd?: number;
  readonly priceChange24hPct?: number;
  /** Most recent first */
  readonly priceSamples?: readonly number[];
  readonly metadata?: TokenMetadata;
}

// ─── Scoring ─────────────────────────────────────────────────────────

export interface SecurityVerdict {
  readonly passed: boolean;
  readonly criticalIssues: readonly string[];
  readonly warnings: readonly string[];
}

export type RiskBucket = 'none' | 'low' | 'medium' | 'high' | 'critical';

export type MetricName =
  | 'volatility'
  | 'whaleConcentration'
  | 'sniperPattern'
  | 'volume'
  | 'liquidity'
  | 'priceStability'
  | 'dataCompleteness'
  | 'metadata';

export interface MetricResult {
  readonly name: MetricName;
  /** Measured value, null when the inputs were absent */
  readonly value: number | null;
  readonly riskBucket: RiskBucket;
  readonly points: number;
  readonly maxPoints: number;
  readonly detail: string;
}

export interface CompositeScore {
  /** 0..95 */
  readonly traditionalScore: number;
  readonly breakdown: Readonly<Record<string, number>>;
  readonly capped: boolean;
}

export type AiRecommendation = 'BUY' | 'CONSIDER' | 'HOLD' | 'CAUTION' | 'AVOID';

export interface AIResult {
  readonly aiScore: number;
  readonly riskAssessment: RiskLevel;
  readonly recommendation: AiRecommendation;
  readonly confidence: number;
  readonly reasoning: string;
  readonly keyInsights: readonly string[];
  readonly riskFactors: readonly string[];
  readonly stopFlags: readonly string[];
  readonly model: string;
  readonly latencyMs: number;
}

export interface AiOracle {
  infer(prompt: string, signal: AbortSignal): Promise<AIResult>;
}

export interface BlendResult {
  readonly finalScore: number;
  readonly aiEnhanced: boolean;
  readonly agreementBonusApplied: boolean;
  /** Weighted score before the agreement bonus, null when AI was not used */
  readonly weightedScore: number | null;
}

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';
export type Recommendation = 'consider' | 'caution' | 'avoid';
export type VerdictDecision = 'GO' | 'WATCH' | 'NO';

export interface Classification {
  readonly riskLevel: RiskLevel;
  readonly recommendation: Recommendation;
  readonly verdictDecision: VerdictDecision;
}

// ─── Analysis ────────────────────────────────────────────────────────

export type AnalysisType = 'quick' | 'deep';
export type AnalysisSource = 'api' | 'webhook' | 'snapshot';

export interface AnalysisMetadata {
  readonly processingTimeMs: number;
  readonly sourcesAttempted: number;
  readonly sourcesSucceeded: number;
  readonly sourceStatuses: Readonly<Partial<Record<SourceName, ServiceStatus>>>;
  readonly securityShortCircuited: boolean;
  readonly aiEnhanced: boolean;
  readonly aiFailureReason?: string;
}

export interface Analysis {
  readonly id: string;
  readonly tokenAddress: string;
  readonly analysisType: AnalysisType;
  readonly source: AnalysisSource;
  readonly security: SecurityVerdict;
  /** Empty when security short-circuited the pipeline */
  readonly metrics: readonly MetricResult[];
  readonly composite: CompositeScore;
  readonly ai: AIResult | null;
  readonly blend: BlendResult;
  readonly finalScore: number;
  readonly riskLevel: RiskLevel;
  readonly recommendation: Recommendation;
  readonly verdictDecision: VerdictDecision;
  readonly aiEnhanced: boolean;
  readonly dataSourcesUsed: readonly SourceName[];
  readonly warnings: readonly string[];
  readonly createdAt: number;
  readonly metadata: AnalysisMetadata;
}

/** Gate-only result from the security sources, no scoring */
export interface SecurityReport {
  readonly tokenAddress: string;
  readonly security: SecurityVerdict;
  readonly dataSourcesUsed: readonly SourceName[];
  readonly sourceStatuses: Readonly<Partial<Record<SourceName, ServiceStatus>>>;
  readonly warnings: readonly string[];
  readonly processingTimeMs: number;
  readonly createdAt: number;
}

export type WhaleRiskLevel = 'low' | 'medium' | 'high' | 'unknown';

/** Holder concentration view merged across the holder-reporting sources */
export interface WhaleReport {
  readonly tokenAddress: string;
  readonly holderCount: number | null;
  readonly holdersReported: number;
  readonly whaleCount: number;
  readonly whaleControlPct: number;
  readonly topWhalePct: number;
  readonly whaleRiskLevel: WhaleRiskLevel;
  readonly whales: readonly HolderShare[];
  readonly metric: MetricResult;
  readonly dataSourcesUsed: readonly SourceName[];
  readonly warnings: readonly string[];
  readonly createdAt: number;
}

/** Cache collaborator: whole Analysis objects in, whole objects out */
export interface AnalysisStore {
  get(key: string): Promise<Analysis | null>;
  put(key: string, analysis: Analysis, ttlSeconds: number): Promise<void>;
}

export interface AnalysisOutcome {
  readonly analysis: Analysis;
  readonly cached: boolean;
}

// ─── Events ──────────────────────────────────────────────────────────

export interface EngineEvents {
  analysisCompleted: (analysis: Analysis) => void;
  securityShortCircuit: (tokenAddress: string, verdict: SecurityVerdict) => void;
  aiFallback: (tokenAddress: string, reason: string) => void;
  webhookQueued: (tokenAddress: string, kind: WebhookKind) => void;
  snapshotRunCompleted: (stats: SnapshotRunResult) => void;
  error: (error: Error, context: string) => void;
}

// ─── Background work ─────────────────────────────────────────────────

/** Helius webhook family a token arrived through */
export type WebhookKind = 'mint' | 'pool' | 'tx';

export interface SnapshotRunResult {
  readonly startedAt: number;
  readonly durationMs: number;
  readonly tokensProcessed: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly errors: readonly string[];
}
