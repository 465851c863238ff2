import PQueue from 'p-queue';
import { isTransientError, withRetry } from '../utils/retry.js';
import { errorMessage, shortenAddress } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { EngineEmitter } from '../events/event-emitter.js';
import type { AnalysisOutcome, WebhookKind } from '../types.js';
import type { AnalyzeRequest } from '../analysis/token-analyzer.js';

export interface Analyzer {
  analyze(request: AnalyzeRequest): Promise<AnalysisOutcome>;
}

export interface WebhookQueueOptions {
  concurrency: number;
  maxRetries: number;
  retryBaseDelayMs?: number;
}

export interface WebhookQueueStats {
  waiting: number;
  running: number;
  received: number;
  queued: number;
  duplicatesSkipped: number;
  completed: number;
  failed: number;
  concurrency: number;
  receivedByKind: Record<WebhookKind, number>;
}

/**
 * Background deep analyses for webhook mints. Bounded concurrency; a token
 * already waiting or running is not queued twice.
 */
export class WebhookQueue {
  private readonly queue: PQueue;
  private readonly inFlight = new Set<string>();
  private received = 0;
  private queued = 0;
  private duplicatesSkipped = 0;
  private completed = 0;
  private failed = 0;
  private readonly receivedByKind: Record<WebhookKind, number> = { mint: 0, pool: 0, tx: 0 };

  constructor(
    private readonly analyzer: Analyzer,
    private readonly options: WebhookQueueOptions,
    private readonly emitter: EngineEmitter | null = null,
  ) {
    this.queue = new PQueue({ concurrency: options.concurrency });
  }

  /** Returns false when the token is already in flight */
  enqueue(tokenAddress: string, kind: WebhookKind = 'mint'): boolean {
    this.received++;
    this.receivedByKind[kind]++;
    if (this.inFlight.has(tokenAddress)) {
      this.duplicatesSkipped++;
      logger.debug(`[webhook] ${shortenAddress(tokenAddress)} already queued, skipping`);
      return false;
    }

    this.inFlight.add(tokenAddress);
    this.queued++;
    this.emitter?.emit('webhookQueued', tokenAddress, kind);

    this.queue.add(() => this.process(tokenAddress)).catch((err: unknown) => {
      logger.error(`[webhook] Queue rejected ${shortenAddress(tokenAddress)}: ${errorMessage(err)}`);
    });
    return true;
  }

  stats(): WebhookQueueStats {
    return {
      waiting: this.queue.size,
      running: this.queue.pending,
      received: this.received,
      queued: this.queued,
      duplicatesSkipped: this.duplicatesSkipped,
      completed: this.completed,
      failed: this.failed,
      concurrency: this.options.concurrency,
      receivedByKind: { ...this.receivedByKind },
    };
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  /** Drops waiting jobs and waits for running ones */
  async close(): Promise<void> {
    this.queue.clear();
    await this.queue.onIdle();
  }

  private async process(tokenAddress: string): Promise<void> {
    try {
      const outcome = await withRetry(
        () => this.analyzer.analyze({ tokenAddress, analysisType: 'deep', source: 'webhook' }),
        `webhook analysis ${shortenAddress(tokenAddress)}`,
        {
          maxRetries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs ?? 2_000,
          shouldRetry: isTransientError,
        },
      );
      this.completed++;
      logger.info(
        `[webhook] ${shortenAddress(tokenAddress)} => ${outcome.analysis.verdictDecision} (${outcome.analysis.finalScore})`,
      );
    } catch (err) {
      this.failed++;
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error(`[webhook] Analysis failed for ${shortenAddress(tokenAddress)}: ${error.message}`);
      this.emitter?.emit('error', error, `webhook analysis ${tokenAddress}`);
    } finally {
      this.inFlight.delete(tokenAddress);
    }
  }
}
