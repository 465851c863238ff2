// Connection pool for every outbound fetch
import { setGlobalDispatcher, Agent } from 'undici';
setGlobalDispatcher(new Agent({
  connections: 50,
  pipelining: 1,
  connectTimeout: 10_000,
  bodyTimeout: 15_000,
  headersTimeout: 10_000,
  keepAliveTimeout: 4_000,
  keepAliveMaxTimeout: 30_000,
}));

import type { Server } from 'http';
import { Telegraf } from 'telegraf';
import { loadConfig, validateConfig } from './config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/helpers.js';
import { SERVICE_VERSION } from './constants.js';
import { Cache, AnalysisCache } from './data/redis-cache.js';
import { openDatabase, closeDatabase, type Db } from './data/database.js';
import { AnalysisRepository } from './data/analysis-repository.js';
import { EngineEmitter } from './events/event-emitter.js';
import { createSources } from './sources/index.js';
import { createLlmOracle } from './ai/llm-client.js';
import { TokenAnalyzer } from './analysis/token-analyzer.js';
import { WebhookQueue } from './webhooks/webhook-queue.js';
import { SnapshotScheduler } from './snapshots/snapshot-scheduler.js';
import { NotificationService } from './telegram/notifications.js';
import { createApp } from './api/server.js';

process.on('uncaughtException', (err) => {
  logger.error(`[process] FATAL uncaught exception: ${err.message}`);
  logger.error(`[process] Stack: ${err.stack ?? 'no stack'}`);
  setTimeout(() => process.exit(1), 1000);
});

process.on('unhandledRejection', (reason) => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  logger.error(`[process] Unhandled rejection: ${msg}`);
  if (reason instanceof Error && reason.stack) logger.error(`[process] Stack: ${reason.stack}`);
});

async function main(): Promise<void> {
  logger.info(`[engine] Token risk engine v${SERVICE_VERSION} starting`);

  const config = loadConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const err of errors) {
      logger.error(`Config error: ${err}`);
    }
    process.exit(1);
  }

  const emitter = new EngineEmitter();
  emitter.on('error', (error, context) => {
    logger.error(`[engine] ${context}: ${error.message}`);
  });

  const cache = new Cache(config.redis.url || undefined);
  await cache.init();

  let db: Db | null = null;
  if (config.database.enabled) {
    db = openDatabase(config.database.path);
  }
  const history = db ? new AnalysisRepository(db) : null;

  const oracle = createLlmOracle(config.ai);
  if (config.ai.enabled && !oracle) {
    logger.warn('[ai] No LLM API key set, deep analyses will use traditional scoring only');
  }

  const sources = createSources(config.sources);
  const analyzer = new TokenAnalyzer({
    sources,
    cache: new AnalysisCache(cache, config.cache.keyPrefix),
    oracle,
    history,
    emitter,
    options: {
      sourceTimeoutMs: config.sources.timeoutMs,
      aiTimeoutMs: config.ai.timeoutMs,
      quickTtlSeconds: config.cache.quickTtlSeconds,
      deepTtlSeconds: config.cache.deepTtlSeconds,
      blend: config.ai.blend,
      security: config.security,
    },
  });

  const webhookQueue = new WebhookQueue(analyzer, config.webhooks, emitter);

  let snapshots: SnapshotScheduler | null = null;
  if (config.snapshots.enabled) {
    if (history) {
      snapshots = new SnapshotScheduler(analyzer, history, config.snapshots, emitter);
      snapshots.start();
    } else {
      logger.warn('[snapshots] Enabled but the database is disabled, snapshots off');
    }
  }

  if (config.telegram.enabled) {
    if (config.telegram.botToken && config.telegram.chatId) {
      const bot = new Telegraf(config.telegram.botToken);
      new NotificationService(bot.telegram, config.telegram.chatId, {
        notifyDecisions: config.telegram.notifyDecisions,
      }).start(emitter);
    } else {
      logger.warn('[notifications] Telegram enabled but TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID missing, alerts off');
    }
  }

  if (!config.server.webhookSecret) {
    logger.warn('[webhook] HELIUS_WEBHOOK_SECRET not set, webhook signatures are not verified');
  }

  const app = createApp({
    analyzer,
    webhookQueue,
    history,
    sourceNames: analyzer.sourceNames,
    cacheBackend: () => cache.backend,
    aiEnabled: oracle !== null,
    webhookSecret: config.server.webhookSecret,
    bodyLimit: config.server.bodyLimit,
    snapshots,
  });

  const server: Server = await new Promise((resolve) => {
    const s = app.listen(config.server.port, config.server.host, () => resolve(s));
  });
  logger.info(`[engine] Listening on http://${config.server.host}:${config.server.port}`);

  let shutdownInProgress = false;
  const shutdown = async (signal: string) => {
    if (shutdownInProgress) {
      logger.warn('[engine] Force exit (second signal)');
      process.exit(1);
    }
    shutdownInProgress = true;
    logger.info(`[engine] ${signal} received, shutting down...`);

    const forceTimer = setTimeout(() => {
      logger.warn('[engine] Shutdown timeout, forcing exit');
      process.exit(1);
    }, 10_000);
    forceTimer.unref();

    snapshots?.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await webhookQueue.close();
    await cache.close();
    if (db) closeDatabase(db);
    emitter.removeAllListeners();

    logger.info('[engine] Goodbye!');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error(`[engine] Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('Fatal error', { error: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
  process.exit(1);
});
