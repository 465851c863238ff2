import type {
  AIResult,
  AiOracle,
  Analysis,
  AnalysisStore,
  DataSource,
  ServiceResult,
  SourceName,
} from '../../src/types.js';

export const TOKEN = 'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263';
export const OTHER_TOKEN = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const WSOL = 'So11111111111111111111111111111111111111112';

export function okResult(source: SourceName, payload: unknown, tokenAddress = TOKEN): ServiceResult {
  return { source, tokenAddress, fetchedAt: 1_700_000_000_000, status: 'ok', payload };
}

export function failedResult(source: SourceName, status: 'error' | 'timeout' = 'error', tokenAddress = TOKEN): ServiceResult {
  return { source, tokenAddress, fetchedAt: 1_700_000_000_000, status, payload: null, errorDetail: 'test failure' };
}

// ─── Clean provider payloads (safe token, deep market) ───────────────

export function goplusPayload(overrides: Record<string, unknown> = {}, tokenAddress = TOKEN) {
  return {
    code: 1,
    message: 'OK',
    result: {
      [tokenAddress]: {
        mintable: { status: '0' },
        freezable: { status: '0' },
        metadata_mutable: { status: '0' },
        holder_count: '15230',
        holders: [
          { account: 'holderA', percent: '1.5' },
          { account: 'holderB', percent: '1.2' },
          { account: 'holderC', percent: '0.9' },
          { account: 'holderD', percent: '0.6' },
          { account: 'holderE', percent: '0.3' },
        ],
        metadata: { name: 'Test Token', symbol: 'TEST', uri: 'https://example.com/meta.json' },
        ...overrides,
      },
    },
  };
}

export function rugcheckPayload(overrides: Record<string, unknown> = {}) {
  return {
    mintAuthority: null,
    freezeAuthority: null,
    rugged: false,
    totalLPProviders: 12,
    fileMeta: { name: 'Test Token', symbol: 'TEST', image: 'https://example.com/t.png' },
    tokenMeta: { name: 'Test Token', symbol: 'TEST', uri: 'https://example.com/meta.json', mutable: false },
    topHolders: [
      { address: 'holderA', pct: 1.5 },
      { address: 'holderB', pct: 1.2 },
      { address: 'holderC', pct: 0.9 },
    ],
    totalHolders: 15230,
    totalMarketLiquidity: 640000,
    markets: [{ lp: { lpLockedPct: 100 } }],
    ...overrides,
  };
}

export function birdeyePayload(
  overview: Record<string, unknown> = {},
  tradePrices: number[] = [0.0042, 0.00421, 0.00419, 0.0042, 0.00422],
  tokenAddress = TOKEN,
) {
  return {
    overview: {
      success: true,
      data: {
        price: 0.0042,
        liquidity: 600000,
        v24hUSD: 2000000,
        priceChange24hPercent: 2.5,
        holder: 15230,
        name: 'Test Token',
        symbol: 'TEST',
        logoURI: 'https://example.com/t.png',
        ...overview,
      },
    },
    trades: {
      success: true,
      data: {
        items: tradePrices.map((price, i) =>
          i % 2 === 0
            ? { from: { address: tokenAddress, price }, to: { address: WSOL, price: 150 } }
            : { from: { address: WSOL, price: 150 }, to: { address: tokenAddress, price } },
        ),
      },
    },
  };
}

export function dexscreenerPayload(tokenAddress = TOKEN) {
  return [
    {
      chainId: 'solana',
      priceUsd: '0.0042',
      liquidity: { usd: 580000 },
      volume: { h24: 1900000 },
      priceChange: { h24: 2.4 },
      baseToken: { address: tokenAddress, name: 'Test Token', symbol: 'TEST' },
      quoteToken: { address: WSOL, name: 'Wrapped SOL', symbol: 'SOL' },
    },
  ];
}

export function heliusPayload(result: Record<string, unknown> = {}) {
  return {
    jsonrpc: '2.0',
    id: 'token-risk',
    result: {
      mutable: false,
      content: {
        json_uri: 'https://example.com/meta.json',
        files: [{ uri: 'https://example.com/t.png' }],
        metadata: { name: 'Test Token', symbol: 'TEST' },
      },
      token_info: {},
      ...result,
    },
  };
}

// ─── Fakes ───────────────────────────────────────────────────────────

export class FakeSource implements DataSource {
  calls = 0;

  constructor(
    readonly name: SourceName,
    private readonly respond: (tokenAddress: string) => ServiceResult,
  ) {}

  async fetch(tokenAddress: string): Promise<ServiceResult> {
    this.calls++;
    return this.respond(tokenAddress);
  }
}

export function staticSource(name: SourceName, payload: unknown): FakeSource {
  return new FakeSource(name, (tokenAddress) => okResult(name, payload, tokenAddress));
}

export function failingSource(name: SourceName): FakeSource {
  return new FakeSource(name, (tokenAddress) => failedResult(name, 'error', tokenAddress));
}

/** Never answers on its own; settles only when the caller aborts */
export class HangingSource implements DataSource {
  aborted = false;

  constructor(readonly name: SourceName) {}

  fetch(tokenAddress: string, signal?: AbortSignal): Promise<ServiceResult> {
    return new Promise((resolve) => {
      signal?.addEventListener('abort', () => {
        this.aborted = true;
        resolve(failedResult(this.name, 'timeout', tokenAddress));
      });
    });
  }
}

export function cleanSources(): FakeSource[] {
  return [
    staticSource('goplus', goplusPayload()),
    staticSource('rugcheck', rugcheckPayload()),
    staticSource('birdeye', birdeyePayload()),
    staticSource('dexscreener', dexscreenerPayload()),
    staticSource('helius', heliusPayload()),
  ];
}

export class MemoryStore implements AnalysisStore {
  readonly entries = new Map<string, { analysis: Analysis; ttlSeconds: number }>();

  async get(key: string): Promise<Analysis | null> {
    return this.entries.get(key)?.analysis ?? null;
  }

  async put(key: string, analysis: Analysis, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { analysis, ttlSeconds });
  }
}

export function aiResult(overrides: Partial<AIResult> = {}): AIResult {
  return {
    aiScore: 90,
    riskAssessment: 'low',
    recommendation: 'CONSIDER',
    confidence: 80,
    reasoning: 'Deep liquidity and revoked authorities.',
    keyInsights: ['Liquidity above $500K'],
    riskFactors: [],
    stopFlags: [],
    model: 'test-model',
    latencyMs: 5,
    ...overrides,
  };
}

export class FakeOracle implements AiOracle {
  prompts: string[] = [];

  constructor(private readonly respond: (signal: AbortSignal) => Promise<AIResult>) {}

  infer(prompt: string, signal: AbortSignal): Promise<AIResult> {
    this.prompts.push(prompt);
    return this.respond(signal);
  }
}

export function analysisFixture(overrides: Partial<Analysis> = {}): Analysis {
  return {
    id: 'analysis-1',
    tokenAddress: TOKEN,
    analysisType: 'quick',
    source: 'api',
    security: { passed: true, criticalIssues: [], warnings: [] },
    metrics: [
      { name: 'volume', value: 250000, riskBucket: 'low', points: 20, maxPoints: 25, detail: '24h volume $250.0K' },
      { name: 'liquidity', value: 120000, riskBucket: 'low', points: 8, maxPoints: 15, detail: 'Liquidity $120.0K' },
    ],
    composite: { traditionalScore: 88, breakdown: { base: 60, volume: 20, liquidity: 8 }, capped: false },
    ai: null,
    blend: { finalScore: 88, aiEnhanced: false, agreementBonusApplied: false, weightedScore: null },
    finalScore: 88,
    riskLevel: 'low',
    recommendation: 'consider',
    verdictDecision: 'GO',
    aiEnhanced: false,
    dataSourcesUsed: ['goplus', 'rugcheck', 'dexscreener'],
    warnings: [],
    createdAt: 1_700_000_000_000,
    metadata: {
      processingTimeMs: 420,
      sourcesAttempted: 3,
      sourcesSucceeded: 3,
      sourceStatuses: { goplus: 'ok', rugcheck: 'ok', dexscreener: 'ok' },
      securityShortCircuited: false,
      aiEnhanced: false,
    },
    ...overrides,
  };
}
