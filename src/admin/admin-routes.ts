import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { CacheStore } from '../cache/types';
import { logger } from '../observability/logger';
import { Prefetcher } from '../reference/prefetcher';
import { ItemFetcher } from '../reference/item-fetcher';
import { isJsonObject } from '../reference/types';

export interface AdminRouteDeps {
  /** Admin routes answer 403 while this is empty */
  adminApiKey: string;
  cache: CacheStore;
  fetcher: ItemFetcher;
  prefetcher: Prefetcher;
}

/** `categories` from a prefetch body; undefined when absent, null when malformed */
function requestedCategories(body: unknown): string[] | undefined | null {
  if (body === undefined || body === null) return undefined;
  if (!isJsonObject(body)) return null;
  const { categories } = body;
  if (categories === undefined) return undefined;
  if (!Array.isArray(categories) || categories.length === 0) return null;
  const entries: unknown[] = categories;
  const names: string[] = [];
  for (const c of entries) {
    if (typeof c !== 'string' || !c.trim()) return null;
    names.push(c.trim());
  }
  return names;
}

function verifyAdminKey(req: FastifyRequest, reply: FastifyReply, expected: string): boolean {
  const key = req.headers['x-admin-api-key'];
  if (!expected || typeof key !== 'string' || key !== expected) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

export function registerAdminRoutes(app: FastifyInstance, deps: AdminRouteDeps): void {
  const log = logger.child({ component: 'admin' });

  /** Cache counters and backend */
  app.get('/admin/cache/stats', async (req, reply) => {
    if (!verifyAdminKey(req, reply, deps.adminApiKey)) return reply;
    return reply.send({
      cache: deps.cache.stats(),
      prefetch: {
        running: deps.prefetcher.isRunning(),
        lastReport: deps.prefetcher.lastReport() ?? null,
      },
    });
  });

  /** Kick off a background warm-up; never waits for it */
  app.post<{ Body: unknown }>('/admin/prefetch', async (req, reply) => {
    if (!verifyAdminKey(req, reply, deps.adminApiKey)) return reply;

    const categories = requestedCategories(req.body);
    if (categories === null) {
      return reply.status(400).send({ error: 'categories must be a non-empty array of category names' });
    }

    const known = new Set(deps.fetcher.knownCategories());
    const unknown = categories?.filter((c) => !known.has(c)) ?? [];
    if (unknown.length > 0) {
      return reply.status(400).send({ error: `Unknown categories: ${unknown.join(', ')}` });
    }

    const started = categories ? deps.prefetcher.start(categories) : deps.prefetcher.start();
    log.info({ admin: true, categories, started }, 'Prefetch requested');
    return reply.status(202).send({ started, running: deps.prefetcher.isRunning() });
  });
}
