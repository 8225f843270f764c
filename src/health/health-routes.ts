import { FastifyInstance } from 'fastify';
import { CacheStore } from '../cache/types';
import { getMetrics, getContentType } from '../observability/metrics';
import { DependencyHealthManager } from '../resilience/dependency-health';

export interface HealthRouteDeps {
  cache: CacheStore;
  health: DependencyHealthManager;
  enableMetrics: boolean;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  const { cache, health } = deps;

  /** Liveness probe: 200 while the process is up */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: cache backend ping plus upstream circuit state */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; backend?: string }> = {};

    const start = Date.now();
    const backend = cache.stats().backend;
    if (await cache.ping()) {
      health.recordSuccess('cache');
      checks.cache = { status: 'ok', latencyMs: Date.now() - start, backend };
    } else {
      health.recordFailure('cache', `${backend} backend ping failed`);
      checks.cache = { status: 'error', latencyMs: Date.now() - start, backend };
    }

    for (const [name, dep] of Object.entries(health.getHealthSummary())) {
      checks[`dep_${name}`] = { status: dep.circuitOpen ? 'error' : 'ok' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      degradationLevel: health.getDegradationLevel(),
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (deps.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
