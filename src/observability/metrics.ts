import { Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();

export const httpRequestDuration = new Histogram({
  name: 'srd_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const cacheLookupsTotal = new Counter({
  name: 'srd_cache_lookups_total',
  help: 'Cache lookups by result',
  labelNames: ['result'] as const,
  registers: [registry],
});

export const cacheWriteErrorsTotal = new Counter({
  name: 'srd_cache_write_errors_total',
  help: 'Durable cache writes that failed',
  registers: [registry],
});

export const upstreamRequestDuration = new Histogram({
  name: 'srd_upstream_request_duration_seconds',
  help: 'Upstream SRD API request duration in seconds',
  labelNames: ['outcome'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const prefetchItemsTotal = new Counter({
  name: 'srd_prefetch_items_total',
  help: 'Items handled by background prefetch',
  labelNames: ['category', 'outcome'] as const,
  registers: [registry],
});

export const searchDuration = new Histogram({
  name: 'srd_search_duration_seconds',
  help: 'Relevance search duration in seconds',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 30],
  registers: [registry],
});

export const toolCallDuration = new Histogram({
  name: 'srd_tool_call_duration_seconds',
  help: 'Tool call duration in seconds',
  labelNames: ['tool', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15],
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
