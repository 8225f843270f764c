import { ToolDefinition } from '../types';
import { ToolDeps, stringArg } from './deps';

/**
 * Search All Tool
 *
 * Relevance-ranked search across every non-rule category. Slow on a cold
 * cache since candidate details are fetched for scoring.
 */
export function createSearchAllTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'search_all',
    version: '1.0.0',
    description:
      'Relevance-ranked search across all SRD categories. Returns the best matches per category and the top matches overall. Use when the category is unknown.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', minLength: 1, description: 'Free text, e.g. "fire wand"' },
      },
      required: ['query'],
      additionalProperties: false,
    },
    timeoutMs: 60_000,
    handler: async (args) => {
      const outcome = await deps.searchEngine.search(stringArg(args, 'query'));
      if (!outcome.ok) {
        return { success: false, error: outcome.error.message, errorKind: outcome.error.kind };
      }
      return { success: true, data: outcome.value };
    },
  };
}
