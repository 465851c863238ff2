import { normalizeAll } from './normalizer.js';
import { evaluateSecurity } from './security-gate.js';
import { computeMetrics } from './metrics.js';
import { scoreComposite } from './composite-scorer.js';
import { blend, DEFAULT_BLEND_POLICY } from './ai-blender.js';
import { classify } from './verdict-classifier.js';
import { buildWhaleReport } from './whale-activity.js';
import { HOLDER_SOURCES, SECURITY_SOURCES } from '../constants.js';
import { buildAnalysisPrompt } from '../ai/prompt.js';
import { AiTimeoutError, InfrastructureUnavailableError, InvalidTokenAddressError } from '../errors.js';
import { errorMessage, generateId, isValidPublicKey, shortenAddress } from '../utils/helpers.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../utils/logger.js';
import type { AnalysisHistory } from '../data/analysis-repository.js';
import type { EngineEmitter } from '../events/event-emitter.js';
import type {
  AIResult,
  AiOracle,
  Analysis,
  AnalysisOutcome,
  AnalysisSource,
  AnalysisStore,
  AnalysisType,
  BlendPolicy,
  DataSource,
  NormalizedSignal,
  SecurityPolicy,
  SecurityReport,
  ServiceResult,
  ServiceStatus,
  SourceName,
  WhaleReport,
} from '../types.js';

export interface AnalyzerOptions {
  sourceTimeoutMs: number;
  aiTimeoutMs: number;
  quickTtlSeconds: number;
  deepTtlSeconds: number;
  blend: BlendPolicy;
  security: SecurityPolicy;
}

export const DEFAULT_ANALYZER_OPTIONS: AnalyzerOptions = {
  sourceTimeoutMs: 8_000,
  aiTimeoutMs: 20_000,
  quickTtlSeconds: 1_800,
  deepTtlSeconds: 7_200,
  blend: DEFAULT_BLEND_POLICY,
  security: { top10WarningPct: 50, minLpProviders: 5 },
};

export interface AnalyzerDeps {
  sources: readonly DataSource[];
  cache: AnalysisStore;
  oracle?: AiOracle | null;
  history?: AnalysisHistory | null;
  emitter?: EngineEmitter | null;
  options?: Partial<AnalyzerOptions>;
}

export interface AnalyzeRequest {
  tokenAddress: string;
  analysisType?: AnalysisType;
  refresh?: boolean;
  source?: AnalysisSource;
}

interface SourceCollection {
  results: ServiceResult[];
  signals: NormalizedSignal[];
  sourceStatuses: Partial<Record<SourceName, ServiceStatus>>;
  dataSourcesUsed: SourceName[];
}

interface AiOutcome {
  ai: AIResult | null;
  failureReason?: string;
}

export function cacheKey(tokenAddress: string, analysisType: AnalysisType): string {
  return `${tokenAddress}:${analysisType}`;
}

/**
 * Runs one token through fan-out, normalization, the security gate,
 * metric extraction, composite scoring, optional AI blending and
 * classification. Collaborators are injected; no state is shared
 * between calls beyond the cache and history store.
 */
export class TokenAnalyzer {
  private readonly sources: readonly DataSource[];
  private readonly cache: AnalysisStore;
  private readonly oracle: AiOracle | null;
  private readonly history: AnalysisHistory | null;
  private readonly emitter: EngineEmitter | null;
  private readonly options: AnalyzerOptions;

  constructor(deps: AnalyzerDeps) {
    this.sources = deps.sources;
    this.cache = deps.cache;
    this.oracle = deps.oracle ?? null;
    this.history = deps.history ?? null;
    this.emitter = deps.emitter ?? null;
    this.options = { ...DEFAULT_ANALYZER_OPTIONS, ...deps.options };
  }

  get sourceNames(): SourceName[] {
    return this.sources.map((s) => s.name);
  }

  async analyze(request: AnalyzeRequest): Promise<AnalysisOutcome> {
    const tokenAddress = this.validated(request.tokenAddress);
    const analysisType = request.analysisType ?? 'quick';
    const origin = request.source ?? 'api';

    const key = cacheKey(tokenAddress, analysisType);
    const warnings: string[] = [];
    let cacheFailed = false;

    if (!request.refresh) {
      try {
        const cached = await this.cache.get(key);
        if (cached) {
          logger.info(`[analyzer] ${shortenAddress(tokenAddress)} ${analysisType} served from cache`);
          return { analysis: cached, cached: true };
        }
      } catch (err) {
        cacheFailed = true;
        warnings.push(`Cache read failed: ${errorMessage(err)}`);
        logger.warn(`[analyzer] Cache read failed for ${key}: ${errorMessage(err)}`);
      }
    }

    const startTime = Date.now();
    logger.info(`[analyzer] Analyzing ${shortenAddress(tokenAddress)} (${analysisType}, ${origin})`);

    const { results, signals, sourceStatuses, dataSourcesUsed } = await this.collect(this.sources, tokenAddress, warnings);
    if (dataSourcesUsed.length === 0) {
      if (cacheFailed) {
        logger.error(`[analyzer] ${shortenAddress(tokenAddress)}: cache and all sources unavailable`);
        throw new InfrastructureUnavailableError();
      }
      warnings.push('No data sources responded');
    }

    const security = evaluateSecurity(signals, this.options.security);
    const metrics = security.passed ? computeMetrics(signals) : [];
    const composite = scoreComposite(security, metrics);

    if (!security.passed) {
      logger.warn(`[analyzer] ${shortenAddress(tokenAddress)} failed security: ${security.criticalIssues.join('; ')}`);
      this.emitter?.emit('securityShortCircuit', tokenAddress, security);
    }

    let aiOutcome: AiOutcome = { ai: null };
    if (security.passed && analysisType === 'deep') {
      aiOutcome = await this.runAi(buildAnalysisPrompt(tokenAddress, signals, security, metrics, composite));
      if (aiOutcome.failureReason) {
        warnings.push(`AI enrichment unavailable: ${aiOutcome.failureReason}`);
        this.emitter?.emit('aiFallback', tokenAddress, aiOutcome.failureReason);
      }
    }

    const blended = blend(composite.traditionalScore, aiOutcome.ai, this.options.blend);
    const classification = classify(blended.finalScore, security);

    let analysis: Analysis = {
      id: generateId(),
      tokenAddress,
      analysisType,
      source: origin,
      security,
      metrics,
      composite,
      ai: aiOutcome.ai,
      blend: blended,
      finalScore: blended.finalScore,
      riskLevel: classification.riskLevel,
      recommendation: classification.recommendation,
      verdictDecision: classification.verdictDecision,
      aiEnhanced: blended.aiEnhanced,
      dataSourcesUsed,
      warnings,
      createdAt: Date.now(),
      metadata: {
        processingTimeMs: Date.now() - startTime,
        sourcesAttempted: results.length,
        sourcesSucceeded: dataSourcesUsed.length,
        sourceStatuses,
        securityShortCircuited: !security.passed,
        aiEnhanced: blended.aiEnhanced,
        aiFailureReason: aiOutcome.failureReason,
      },
    };

    const ttl = analysisType === 'deep' ? this.options.deepTtlSeconds : this.options.quickTtlSeconds;
    try {
      await this.cache.put(key, analysis, ttl);
    } catch (err) {
      logger.warn(`[analyzer] Cache write failed for ${key}: ${errorMessage(err)}`);
      analysis = { ...analysis, warnings: [...analysis.warnings, `Cache write failed: ${errorMessage(err)}`] };
    }

    if (this.history) {
      try {
        this.history.save(analysis);
      } catch (err) {
        logger.warn(`[analyzer] History write failed for ${shortenAddress(tokenAddress)}: ${errorMessage(err)}`);
        analysis = { ...analysis, warnings: [...analysis.warnings, `History write failed: ${errorMessage(err)}`] };
      }
    }

    logger.info(
      `[analyzer] ${shortenAddress(tokenAddress)} => ${analysis.finalScore} ${analysis.verdictDecision} ` +
      `(${dataSourcesUsed.length}/${results.length} sources, ${analysis.metadata.processingTimeMs}ms)`,
    );
    this.emitter?.emit('analysisCompleted', analysis);

    return { analysis, cached: false };
  }

  /** Security gate over the security sources only; nothing is scored, cached or stored */
  async checkSecurity(rawAddress: string): Promise<SecurityReport> {
    const tokenAddress = this.validated(rawAddress);
    const startTime = Date.now();
    const warnings: string[] = [];
    const sources = this.sources.filter((s) => SECURITY_SOURCES.has(s.name));

    const { signals, sourceStatuses, dataSourcesUsed } = await this.collect(sources, tokenAddress, warnings);
    if (dataSourcesUsed.length === 0) warnings.push('No data sources responded');

    const security = evaluateSecurity(signals, this.options.security);
    logger.info(
      `[analyzer] ${shortenAddress(tokenAddress)} security ${security.passed ? 'passed' : 'failed'} ` +
      `(${dataSourcesUsed.length}/${sources.length} sources)`,
    );

    return {
      tokenAddress,
      security,
      dataSourcesUsed,
      sourceStatuses,
      warnings,
      processingTimeMs: Date.now() - startTime,
      createdAt: Date.now(),
    };
  }

  /** Holder concentration from the holder-reporting sources */
  async whaleActivity(rawAddress: string): Promise<WhaleReport> {
    const tokenAddress = this.validated(rawAddress);
    const warnings: string[] = [];
    const sources = this.sources.filter((s) => HOLDER_SOURCES.has(s.name));

    const { signals, dataSourcesUsed } = await this.collect(sources, tokenAddress, warnings);
    if (dataSourcesUsed.length === 0) warnings.push('No data sources responded');

    const report = buildWhaleReport(tokenAddress, signals, warnings);
    logger.info(
      `[analyzer] ${shortenAddress(tokenAddress)} whales: ${report.whaleCount} controlling ${report.whaleControlPct}%`,
    );
    return report;
  }

  private validated(rawAddress: string): string {
    const tokenAddress = rawAddress.trim();
    if (!isValidPublicKey(tokenAddress)) throw new InvalidTokenAddressError(tokenAddress);
    return tokenAddress;
  }

  /** Parallel fan-out; failed and timed-out sources add a warning */
  private async collect(
    sources: readonly DataSource[],
    tokenAddress: string,
    warnings: string[],
  ): Promise<SourceCollection> {
    const results = await Promise.all(sources.map((source) => this.fetchSource(source, tokenAddress)));
    const signals = normalizeAll(results);

    const sourceStatuses: Partial<Record<SourceName, ServiceStatus>> = {};
    for (const result of results) {
      sourceStatuses[result.source] = result.status;
      if (result.status !== 'ok') {
        warnings.push(`Source ${result.source} ${result.status === 'timeout' ? 'timed out' : 'failed'}${result.errorDetail ? `: ${result.errorDetail}` : ''}`);
      }
    }

    return {
      results,
      signals,
      sourceStatuses,
      dataSourcesUsed: signals.filter((s) => s.completeness).map((s) => s.source),
    };
  }

  private async fetchSource(source: DataSource, tokenAddress: string): Promise<ServiceResult> {
    const controller = new AbortController();
    const timeoutMs = this.options.sourceTimeoutMs;
    let timedOut = false;
    try {
      return await withTimeout(
        source.fetch(tokenAddress, controller.signal),
        timeoutMs,
        () => {
          timedOut = true;
          logger.warn(`[analyzer] ${source.name} timed out after ${timeoutMs}ms`);
          return {
            source: source.name,
            tokenAddress,
            fetchedAt: Date.now(),
            status: 'timeout',
            payload: null,
            errorDetail: `No response within ${timeoutMs}ms`,
          } satisfies ServiceResult;
        },
      );
    } catch (err) {
      // Sources encode failures in their result; a throw here is a client bug
      logger.error(`[analyzer] ${source.name} threw instead of returning a result: ${errorMessage(err)}`);
      return {
        source: source.name,
        tokenAddress,
        fetchedAt: Date.now(),
        status: 'error',
        payload: null,
        errorDetail: errorMessage(err),
      };
    } finally {
      // abort after the race has settled
      if (timedOut) controller.abort();
    }
  }

  private async runAi(prompt: string): Promise<AiOutcome> {
    if (!this.oracle) {
      return { ai: null, failureReason: 'AI enrichment not configured' };
    }

    const oracle = this.oracle;
    const controller = new AbortController();
    const timeoutMs = this.options.aiTimeoutMs;
    try {
      const ai = await withTimeout(oracle.infer(prompt, controller.signal), timeoutMs, () => {
        throw new AiTimeoutError(timeoutMs);
      });
      return { ai };
    } catch (err) {
      controller.abort();
      const reason = errorMessage(err);
      logger.warn(`[analyzer] AI fallback: ${reason}`);
      return { ai: null, failureReason: reason };
    }
  }
}
