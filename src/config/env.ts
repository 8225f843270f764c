import dotenv from 'dotenv';
import path from 'path';
import { DEFAULT_PREFETCH_CATEGORIES } from './categories';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

export type CacheBackendKind = 'file' | 'redis';

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;

  upstream: {
    baseUrl: string;
    timeoutMs: number;
    failureThreshold: number;
    circuitResetMs: number;
  };

  cache: {
    ttlHours: number;
    persistent: boolean;
    /** Absolute directory for file-backed entries */
    dir: string;
    backend: CacheBackendKind;
  };

  redis: {
    url: string;
    keyPrefix: string;
  };

  prefetch: {
    enabled: boolean;
    categories: string[];
    concurrency: number;
  };

  search: {
    concurrency: number;
  };

  security: {
    adminApiKey: string;
  };

  observability: {
    enableMetrics: boolean;
  };
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string, fallback: readonly string[]): string[] {
  const val = process.env[key];
  if (!val) return [...fallback];
  return val
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function cacheBackend(key: string): CacheBackendKind {
  return optional(key, 'file') === 'redis' ? 'redis' : 'file';
}

export function loadEnv(): EnvConfig {
  return {
    nodeEnv: optional('NODE_ENV', 'development'),
    port: optionalInt('PORT', 3000),
    logLevel: optional('LOG_LEVEL', 'info'),

    upstream: {
      baseUrl: optional('SRD_API_BASE_URL', 'https://www.dnd5eapi.co/api').replace(/\/+$/, ''),
      timeoutMs: optionalInt('SRD_REQUEST_TIMEOUT_MS', 10_000),
      failureThreshold: optionalInt('UPSTREAM_FAILURE_THRESHOLD', 5),
      circuitResetMs: optionalInt('UPSTREAM_CIRCUIT_RESET_MS', 30_000),
    },

    cache: {
      ttlHours: optionalFloat('CACHE_TTL_HOURS', 24),
      persistent: optionalBool('CACHE_PERSISTENT', true),
      dir: path.resolve(projectRoot, optional('CACHE_DIR', 'cache')),
      backend: cacheBackend('CACHE_BACKEND'),
    },

    redis: {
      url: optional('REDIS_URL', 'redis://localhost:6379'),
      keyPrefix: optional('REDIS_KEY_PREFIX', 'srd:cache:'),
    },

    prefetch: {
      enabled: optionalBool('PREFETCH_ENABLED', true),
      categories: optionalList('PREFETCH_CATEGORIES', DEFAULT_PREFETCH_CATEGORIES),
      concurrency: optionalInt('PREFETCH_CONCURRENCY', 4),
    },

    search: {
      concurrency: optionalInt('SEARCH_CONCURRENCY', 4),
    },

    security: {
      adminApiKey: optional('ADMIN_API_KEY', ''),
    },

    observability: {
      enableMetrics: optionalBool('ENABLE_METRICS', true),
    },
  };
}

export const env: EnvConfig = loadEnv();

export function isDev(config: EnvConfig): boolean {
  return config.nodeEnv === 'development' || config.nodeEnv === 'test';
}
