import { GoPlusSource } from './goplus-client.js';
import { RugcheckSource } from './rugcheck-client.js';
import { SolsnifferSource } from './solsniffer-client.js';
import { BirdeyeSource } from './birdeye-client.js';
import { DexscreenerSource } from './dexscreener-client.js';
import { HeliusSource } from './helius-client.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { logger } from '../utils/logger.js';
import type { HttpSourceOptions } from './http-source.js';
import type { AppConfig, DataSource, SourceName } from '../types.js';

/** Builds every enabled provider client. Providers that need a missing API key are skipped. */
export function createSources(config: AppConfig['sources']): DataSource[] {
  const opts = (name: SourceName): HttpSourceOptions => ({
    timeoutMs: config.timeoutMs,
    rateLimiter: RateLimiter.perMinute(config.rateLimits[name]),
  });

  const candidates: Array<[SourceName, () => DataSource | null]> = [
    ['goplus', () => new GoPlusSource(config.goplus.baseUrl, opts('goplus'))],
    ['rugcheck', () => new RugcheckSource(config.rugcheck.baseUrl, opts('rugcheck'))],
    ['solsniffer', () => config.solsniffer.apiKey
      ? new SolsnifferSource(config.solsniffer.baseUrl, config.solsniffer.apiKey, opts('solsniffer'))
      : null],
    ['birdeye', () => config.birdeye.apiKey
      ? new BirdeyeSource(config.birdeye.baseUrl, config.birdeye.apiKey, opts('birdeye'))
      : null],
    ['dexscreener', () => new DexscreenerSource(config.dexscreener.baseUrl, opts('dexscreener'))],
    ['helius', () => config.helius.apiKey
      ? new HeliusSource(config.helius.rpcUrl, config.helius.apiKey, opts('helius'))
      : null],
  ];

  const sources: DataSource[] = [];
  for (const [name, build] of candidates) {
    if (!config.enabled[name]) {
      logger.info(`[sources] ${name} disabled in config`);
      continue;
    }
    const source = build();
    if (source) sources.push(source);
    else logger.warn(`[sources] ${name} skipped: API key not set`);
  }

  logger.info(`[sources] Active: ${sources.map((s) => s.name).join(', ') || 'none'}`);
  return sources;
}
