import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env as defaultEnv, EnvConfig, isDev } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { registerAdminRoutes } from './admin/admin-routes';
import { registerHealthRoutes } from './health/health-routes';
import { createCacheStore } from './cache/cache-service';
import { RedisCommands } from './cache/redis-backend';
import { CacheStore } from './cache/types';
import { DependencyHealthManager } from './resilience/dependency-health';
import { FetchLike, UpstreamClient } from './reference/upstream-client';
import { ItemFetcher, cachePartition } from './reference/item-fetcher';
import { Prefetcher } from './reference/prefetcher';
import { RelevanceSearchEngine } from './search/search-engine';
import { ToolRegistry, registerReferenceTools } from './tools/registry';
import { ToolRuntime } from './tools/runtime';
import { registerToolRoutes } from './tools/tool-routes';

export interface BuildAppOptions {
  config?: EnvConfig;
  /** Upstream transport; the global fetch when absent */
  fetchImpl?: FetchLike;
  /** Pre-built Redis client for the redis cache backend */
  redis?: RedisCommands;
}

export interface AppContext {
  app: FastifyInstance;
  cache: CacheStore;
  fetcher: ItemFetcher;
  prefetcher: Prefetcher;
  searchEngine: RelevanceSearchEngine;
  registry: ToolRegistry;
  health: DependencyHealthManager;
  /** Connection opened here; closed on shutdown */
  redis?: Redis;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err: Error) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available');
    return undefined;
  }
}

export async function buildApp(options: BuildAppOptions = {}): Promise<AppContext> {
  const config = options.config ?? defaultEnv;

  // Initialize Fastify
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Register CORS
  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err, requestId: req.id, url: req.url }, 'Unhandled request error');
    }
    const message = statusCode < 500 || isDev(config) ? err.message : 'Internal server error';
    return reply.status(statusCode).send({ error: message });
  });

  // ───── Cache ─────
  let redis: Redis | undefined;
  let redisCommands = options.redis;
  if (config.cache.persistent && config.cache.backend === 'redis' && !redisCommands) {
    redis = await connectRedis(config.redis.url);
    redisCommands = redis;
  }

  const cache = createCacheStore({
    ttlHours: config.cache.ttlHours,
    persistent: config.cache.persistent,
    backend: config.cache.backend,
    cacheDir: config.cache.dir,
    partition: cachePartition,
    redis: redisCommands,
    redisKeyPrefix: config.redis.keyPrefix,
  });

  // ───── Upstream + domain services ─────
  const health = new DependencyHealthManager(
    config.upstream.failureThreshold,
    config.upstream.circuitResetMs,
  );
  const upstream = new UpstreamClient({
    baseUrl: config.upstream.baseUrl,
    timeoutMs: config.upstream.timeoutMs,
    fetchImpl: options.fetchImpl,
    health,
  });
  const fetcher = new ItemFetcher({ cache, upstream });
  const prefetcher = new Prefetcher(fetcher, {
    categories: config.prefetch.categories,
    concurrency: config.prefetch.concurrency,
  });
  const searchEngine = new RelevanceSearchEngine(fetcher, { concurrency: config.search.concurrency });

  // ───── Tools ─────
  const registry = new ToolRegistry();
  registerReferenceTools(registry, { fetcher, searchEngine, upstream, cache });
  const runtime = new ToolRuntime(registry, { defaultTimeoutMs: config.upstream.timeoutMs * 2 });

  // ───── Routes ─────
  registerHealthRoutes(app, { cache, health, enableMetrics: config.observability.enableMetrics });
  registerToolRoutes(app, registry, runtime);
  registerAdminRoutes(app, { adminApiKey: config.security.adminApiKey, cache, fetcher, prefetcher });

  if (config.prefetch.enabled) {
    prefetcher.start();
  }

  logger.info(
    {
      upstream: config.upstream.baseUrl,
      cacheBackend: cache.stats().backend,
      tools: registry.getAll().length,
      prefetch: config.prefetch.enabled,
    },
    'Application built',
  );

  return { app, cache, fetcher, prefetcher, searchEngine, registry, health, redis };
}
