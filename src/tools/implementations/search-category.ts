import { ToolDefinition } from '../types';
import { ToolDeps, stringArg, toToolResult } from './deps';

export function createSearchCategoryTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'search_category',
    version: '1.0.0',
    description:
      'Find entries of one category whose name contains the query (case-insensitive). Cheap: uses the category listing only.',
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', minLength: 1 },
        query: { type: 'string', minLength: 1 },
      },
      required: ['category', 'query'],
      additionalProperties: false,
    },
    handler: async (args) => {
      const category = stringArg(args, 'category');
      const query = stringArg(args, 'query');
      const result = await deps.fetcher.searchCategory(category, query);
      return toToolResult(result, (items) => ({ category, query, items, count: items.length }));
    },
  };
}
