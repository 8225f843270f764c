import { ToolDefinition } from '../types';
import { isJsonObject } from '../../reference/types';
import { ToolDeps } from './deps';

/**
 * API Status Tool
 *
 * Uncached probe of the upstream root. Reports reachability, latency and
 * the endpoints the API advertises, plus local cache counters.
 */
export function createApiStatusTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'api_status',
    version: '1.0.0',
    description: 'Check whether the SRD reference API is reachable and how the local cache is doing.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
    handler: async () => {
      const start = Date.now();
      const res = await deps.upstream.getJson('/');
      const latencyMs = Date.now() - start;
      const cache = deps.cache.stats();

      if (!res.ok) {
        return {
          success: true,
          data: {
            status: 'offline',
            baseUrl: deps.upstream.baseUrl,
            latencyMs,
            error: res.error.message,
            cache,
          },
        };
      }

      return {
        success: true,
        data: {
          status: 'online',
          baseUrl: deps.upstream.baseUrl,
          latencyMs,
          endpoints: isJsonObject(res.body) ? Object.keys(res.body) : [],
          cache,
        },
      };
    },
  };
}
