import { errorMessage, shortenAddress, sleep } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { AnalysisHistory } from '../data/analysis-repository.js';
import type { EngineEmitter } from '../events/event-emitter.js';
import type { Analyzer } from '../webhooks/webhook-queue.js';
import type { AnalysisType, SnapshotRunResult } from '../types.js';

export interface SnapshotOptions {
  intervalSeconds: number;
  maxTokensPerRun: number;
  /** Pause between two tokens of one run */
  delayMs: number;
  analysisType: AnalysisType;
}

export interface SnapshotStats {
  enabled: boolean;
  running: boolean;
  intervalSeconds: number;
  runsCompleted: number;
  runsSkipped: number;
  totalTokensProcessed: number;
  totalSucceeded: number;
  totalFailed: number;
  lastRun: SnapshotRunResult | null;
  nextRunAt: number | null;
}

/**
 * Re-analyses tracked tokens on an interval so their history keeps growing
 * after the first request. Tokens analysed longest ago go first. The analyzer
 * persists each refreshed analysis.
 */
export class SnapshotScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private nextRunAt: number | null = null;
  private runsCompleted = 0;
  private runsSkipped = 0;
  private totalTokensProcessed = 0;
  private totalSucceeded = 0;
  private totalFailed = 0;
  private lastRun: SnapshotRunResult | null = null;

  constructor(
    private readonly analyzer: Analyzer,
    private readonly history: Pick<AnalysisHistory, 'trackedTokens'>,
    private readonly options: SnapshotOptions,
    private readonly emitter: EngineEmitter | null = null,
  ) {}

  start(): void {
    if (this.timer) return;
    const intervalMs = this.options.intervalSeconds * 1000;
    this.nextRunAt = Date.now() + intervalMs;
    this.timer = setInterval(() => {
      this.nextRunAt = Date.now() + intervalMs;
      this.runOnce().catch((err: unknown) => {
        logger.error(`[snapshots] Scheduled run failed: ${errorMessage(err)}`);
      });
    }, intervalMs);
    logger.info(
      `[snapshots] Every ${this.options.intervalSeconds}s, up to ${this.options.maxTokensPerRun} token(s) per run`,
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
  }

  /** Returns null when a run is already in progress */
  async runOnce(): Promise<SnapshotRunResult | null> {
    if (this.running) {
      this.runsSkipped++;
      logger.debug('[snapshots] Previous run still in progress, skipping');
      return null;
    }

    this.running = true;
    const startedAt = Date.now();
    const errors: string[] = [];
    let succeeded = 0;
    let tokens: string[] = [];

    try {
      tokens = this.history.trackedTokens(this.options.maxTokensPerRun);
      for (const [i, tokenAddress] of tokens.entries()) {
        if (i > 0 && this.options.delayMs > 0) await sleep(this.options.delayMs);
        try {
          await this.analyzer.analyze({
            tokenAddress,
            analysisType: this.options.analysisType,
            refresh: true,
            source: 'snapshot',
          });
          succeeded++;
        } catch (err) {
          errors.push(`${tokenAddress}: ${errorMessage(err)}`);
          logger.warn(`[snapshots] ${shortenAddress(tokenAddress)} failed: ${errorMessage(err)}`);
        }
      }
    } finally {
      this.running = false;
    }

    const result: SnapshotRunResult = {
      startedAt,
      durationMs: Date.now() - startedAt,
      tokensProcessed: tokens.length,
      succeeded,
      failed: errors.length,
      errors,
    };
    this.runsCompleted++;
    this.totalTokensProcessed += result.tokensProcessed;
    this.totalSucceeded += succeeded;
    this.totalFailed += result.failed;
    this.lastRun = result;

    logger.info(`[snapshots] Run done: ${succeeded}/${tokens.length} ok in ${result.durationMs}ms`);
    this.emitter?.emit('snapshotRunCompleted', result);
    return result;
  }

  stats(): SnapshotStats {
    return {
      enabled: this.timer !== null,
      running: this.running,
      intervalSeconds: this.options.intervalSeconds,
      runsCompleted: this.runsCompleted,
      runsSkipped: this.runsSkipped,
      totalTokensProcessed: this.totalTokensProcessed,
      totalSucceeded: this.totalSucceeded,
      totalFailed: this.totalFailed,
      lastRun: this.lastRun,
      nextRunAt: this.nextRunAt,
    };
  }
}
