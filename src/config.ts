import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { config as dotenvConfig } from 'dotenv';
import {
  BIRDEYE_API_BASE,
  DEXSCREENER_API_BASE,
  GOPLUS_API_BASE,
  HELIUS_RPC_BASE,
  RUGCHECK_API_BASE,
  SOLSNIFFER_API_BASE,
} from './constants.js';
import type { AppConfig, BlendPolicy, SecurityPolicy, SourceName, VerdictDecision } from './types.js';

dotenvConfig();

type YamlSection = Record<string, unknown>;

function loadYaml(filePath: string): YamlSection {
  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    return isSection(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function isSection(value: unknown): value is YamlSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: YamlSection, key: string): YamlSection {
  const value = parent[key];
  return isSection(value) ? value : {};
}

function num(parent: YamlSection, key: string, fallback: number): number {
  const value = parent[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function bool(parent: YamlSection, key: string, fallback: boolean): boolean {
  const value = parent[key];
  return typeof value === 'boolean' ? value : fallback;
}

function str(parent: YamlSection, key: string, fallback: string): string {
  const value = parent[key];
  return typeof value === 'string' ? value : fallback;
}

function env(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (val === undefined) return fallback;
  return val === 'true' || val === '1';
}

function envNum(key: string, fallback: number): number {
  const val = process.env[key];
  if (val === undefined || val === '') return fallback;
  const n = Number(val);
  return isNaN(n) ? fallback : n;
}

function sourceFlags(raw: YamlSection, fallback: boolean): Record<SourceName, boolean> {
  return {
    goplus: bool(raw, 'goplus', fallback),
    rugcheck: bool(raw, 'rugcheck', fallback),
    solsniffer: bool(raw, 'solsniffer', fallback),
    birdeye: bool(raw, 'birdeye', fallback),
    dexscreener: bool(raw, 'dexscreener', fallback),
    helius: bool(raw, 'helius', fallback),
  };
}

function sourceRates(raw: YamlSection): Record<SourceName, number> {
  return {
    goplus: num(raw, 'goplus', 30),
    rugcheck: num(raw, 'rugcheck', 60),
    solsniffer: num(raw, 'solsniffer', 60),
    birdeye: num(raw, 'birdeye', 100),
    dexscreener: num(raw, 'dexscreener', 300),
    helius: num(raw, 'helius', 600),
  };
}

const DECISIONS: readonly VerdictDecision[] = ['GO', 'WATCH', 'NO'];

function isDecision(value: unknown): value is VerdictDecision {
  return DECISIONS.some((d) => d === value);
}

function notifyDecisions(raw: YamlSection): VerdictDecision[] {
  const fromEnv = env('TELEGRAM_NOTIFY_DECISIONS');
  const list: unknown[] = fromEnv
    ? fromEnv.split(',').map((d) => d.trim().toUpperCase())
    : Array.isArray(raw.notify_decisions) ? raw.notify_decisions : ['GO'];
  return list.filter(isDecision);
}

export function loadConfig(): AppConfig {
  const yamlPath = env('CONFIG_PATH', resolve(process.cwd(), 'config', 'default.yaml'));
  const yaml = loadYaml(yamlPath);

  const server = section(yaml, 'server');
  const sources = section(yaml, 'sources');
  const security = section(yaml, 'security');
  const ai = section(yaml, 'ai');
  const blend = section(ai, 'blend');
  const cache = section(yaml, 'cache');
  const database = section(yaml, 'database');
  const webhooks = section(yaml, 'webhooks');
  const telegram = section(yaml, 'telegram');
  const snapshots = section(yaml, 'snapshots');

  const heliusKey = env('HELIUS_API_KEY');

  const config: AppConfig = {
    server: {
      port: envNum('PORT', num(server, 'port', 8080)),
      host: env('HOST', str(server, 'host', '0.0.0.0')),
      bodyLimit: str(server, 'body_limit', '1mb'),
      webhookSecret: env('HELIUS_WEBHOOK_SECRET'),
    },
    redis: {
      url: env('REDIS_URL'),
    },
    database: {
      enabled: envBool('DATABASE_ENABLED', bool(database, 'enabled', true)),
      path: env('DATABASE_PATH', str(database, 'path', 'data/analyses.db')),
    },
    sources: {
      timeoutMs: envNum('SOURCE_TIMEOUT_MS', num(sources, 'timeout_ms', 8000)),
      enabled: sourceFlags(section(sources, 'enabled'), true),
      rateLimits: sourceRates(section(sources, 'rate_limits')),
      goplus: { baseUrl: env('GOPLUS_API_BASE', GOPLUS_API_BASE) },
      rugcheck: { baseUrl: env('RUGCHECK_API_BASE', RUGCHECK_API_BASE) },
      solsniffer: {
        baseUrl: env('SOLSNIFFER_API_BASE', SOLSNIFFER_API_BASE),
        apiKey: env('SOLSNIFFER_API_KEY'),
      },
      birdeye: {
        baseUrl: env('BIRDEYE_API_BASE', BIRDEYE_API_BASE),
        apiKey: env('BIRDEYE_API_KEY'),
      },
      dexscreener: { baseUrl: env('DEXSCREENER_API_BASE', DEXSCREENER_API_BASE) },
      helius: {
        rpcUrl: env('HELIUS_RPC_URL', HELIUS_RPC_BASE),
        apiKey: heliusKey,
      },
    },
    security: {
      top10WarningPct: num(security, 'top10_warning_pct', 50),
      minLpProviders: num(security, 'min_lp_providers', 5),
    } satisfies SecurityPolicy,
    ai: {
      enabled: envBool('AI_ENABLED', bool(ai, 'enabled', true)),
      apiKey: env('GROQ_API_KEY', env('LLM_API_KEY')),
      baseUrl: env('LLM_BASE_URL', str(ai, 'base_url', 'https://api.groq.com/openai/v1')),
      model: env('LLM_MODEL', str(ai, 'model', 'llama-3.3-70b-versatile')),
      timeoutMs: envNum('AI_TIMEOUT_MS', num(ai, 'timeout_ms', 20000)),
      temperature: num(ai, 'temperature', 0.1),
      maxTokens: num(ai, 'max_tokens', 1500),
      blend: {
        traditionalWeight: num(blend, 'traditional_weight', 0.6),
        aiWeight: num(blend, 'ai_weight', 0.4),
        agreementWindow: num(blend, 'agreement_window', 10),
        agreementBonus: num(blend, 'agreement_bonus', 15),
      } satisfies BlendPolicy,
    },
    cache: {
      quickTtlSeconds: num(cache, 'quick_ttl_seconds', 1800),
      deepTtlSeconds: num(cache, 'deep_ttl_seconds', 7200),
      keyPrefix: str(cache, 'key_prefix', 'tokenrisk:'),
    },
    webhooks: {
      concurrency: num(webhooks, 'concurrency', 2),
      maxRetries: num(webhooks, 'max_retries', 2),
    },
    telegram: {
      enabled: envBool('TELEGRAM_ENABLED', bool(telegram, 'enabled', false)),
      botToken: env('TELEGRAM_BOT_TOKEN'),
      chatId: env('TELEGRAM_CHAT_ID'),
      notifyDecisions: notifyDecisions(telegram),
    },
    snapshots: {
      enabled: envBool('SNAPSHOTS_ENABLED', bool(snapshots, 'enabled', false)),
      intervalSeconds: envNum('SNAPSHOT_INTERVAL_SECONDS', num(snapshots, 'interval_seconds', 3600)),
      maxTokensPerRun: num(snapshots, 'max_tokens_per_run', 100),
      delayMs: num(snapshots, 'delay_ms', 1000),
      analysisType: str(snapshots, 'analysis_type', 'quick') === 'deep' ? 'deep' : 'quick',
    },
  };

  return config;
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port <= 0 || config.server.port > 65535) {
    errors.push(`PORT must be an integer between 1 and 65535 (got ${config.server.port})`);
  }
  if (config.sources.timeoutMs <= 0) errors.push('sources.timeout_ms must be positive');
  if (config.ai.timeoutMs <= 0) errors.push('ai.timeout_ms must be positive');

  const { traditionalWeight, aiWeight } = config.ai.blend;
  if (Math.abs(traditionalWeight + aiWeight - 1) > 1e-6) {
    errors.push(`ai.blend weights must sum to 1 (got ${traditionalWeight} + ${aiWeight})`);
  }
  if (config.cache.quickTtlSeconds <= 0 || config.cache.deepTtlSeconds <= 0) {
    errors.push('cache TTLs must be positive');
  }
  if (!Number.isInteger(config.webhooks.concurrency) || config.webhooks.concurrency < 1) {
    errors.push(`webhooks.concurrency must be a positive integer (got ${config.webhooks.concurrency})`);
  }
  if (config.snapshots.enabled) {
    if (config.snapshots.intervalSeconds < 60) {
      errors.push(`snapshots.interval_seconds must be at least 60 (got ${config.snapshots.intervalSeconds})`);
    }
    if (!Number.isInteger(config.snapshots.maxTokensPerRun) || config.snapshots.maxTokensPerRun < 1) {
      errors.push(`snapshots.max_tokens_per_run must be a positive integer (got ${config.snapshots.maxTokensPerRun})`);
    }
    if (config.snapshots.delayMs < 0) errors.push('snapshots.delay_ms must not be negative');
  }

  return errors;
}
