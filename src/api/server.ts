import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { analysisRoutes, type AnalysisService } from './routes/analysis.routes.js';
import { webhookRoutes } from './routes/webhook.routes.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { checkHealth } from '../utils/health-check.js';
import type { AnalysisHistory } from '../data/analysis-repository.js';
import type { SnapshotScheduler } from '../snapshots/snapshot-scheduler.js';
import type { WebhookQueue } from '../webhooks/webhook-queue.js';

export interface AppDeps {
  analyzer: AnalysisService;
  webhookQueue: WebhookQueue;
  history: AnalysisHistory | null;
  sourceNames: readonly string[];
  cacheBackend: () => 'redis' | 'memory';
  aiEnabled: boolean;
  webhookSecret: string;
  bodyLimit?: string;
  snapshots?: SnapshotScheduler | null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const bodyLimit = deps.bodyLimit ?? '1mb';

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors());

  // Mounted before the JSON parser so webhooks see the raw body
  app.use('/webhooks', webhookRoutes(deps.webhookQueue, { secret: deps.webhookSecret, bodyLimit }));

  app.use(express.json({ limit: bodyLimit }));

  app.get('/health', (_req, res) => {
    const health = checkHealth({
      cacheBackend: deps.cacheBackend(),
      sources: deps.sourceNames,
      aiEnabled: deps.aiEnabled,
      historyEnabled: deps.history !== null,
    });
    res.status(health.healthy ? 200 : 503).json({
      status: health.healthy ? 'ok' : 'degraded',
      version: health.version,
      uptime: health.uptime,
      uptime_ms: health.uptimeMs,
      memory_mb: health.memoryUsageMb,
      cache_backend: health.cacheBackend,
      sources: health.sources,
      ai_enabled: health.aiEnabled,
      history_enabled: health.historyEnabled,
      webhook_queue: deps.webhookQueue.stats(),
      errors: health.errors,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', analysisRoutes(deps.analyzer, deps.history, deps.snapshots ?? null));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
