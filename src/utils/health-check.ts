import { logger } from './logger.js';
import { SERVICE_VERSION } from '../constants.js';

export interface HealthInput {
  cacheBackend: 'redis' | 'memory';
  sources: readonly string[];
  aiEnabled: boolean;
  historyEnabled: boolean;
}

export interface HealthStatus {
  healthy: boolean;
  version: string;
  uptime: string;
  uptimeMs: number;
  memoryUsageMb: number;
  cacheBackend: 'redis' | 'memory';
  sources: readonly string[];
  aiEnabled: boolean;
  historyEnabled: boolean;
  errors: string[];
}

const startTime = Date.now();
const MEMORY_WARNING_MB = 450;

export function checkHealth(input: HealthInput): HealthStatus {
  const errors: string[] = [];

  const mem = process.memoryUsage();
  const memoryUsageMb = Math.round(mem.heapUsed / 1024 / 1024);
  if (memoryUsageMb > MEMORY_WARNING_MB) {
    errors.push(`High memory: ${memoryUsageMb}MB`);
  }
  if (input.sources.length === 0) {
    errors.push('No data sources configured');
  }

  const healthy = errors.length === 0;
  if (!healthy) {
    logger.warn('[health] Unhealthy', { errors, memoryUsageMb });
  }

  const uptimeMs = Date.now() - startTime;
  return {
    healthy,
    version: SERVICE_VERSION,
    uptime: formatUptime(uptimeMs),
    uptimeMs,
    memoryUsageMb,
    cacheBackend: input.cacheBackend,
    sources: input.sources,
    aiEnabled: input.aiEnabled,
    historyEnabled: input.historyEnabled,
    errors,
  };
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
