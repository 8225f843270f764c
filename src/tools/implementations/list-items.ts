import { ToolDefinition } from '../types';
import { ToolDeps, stringArg, toToolResult } from './deps';

export function createListItemsTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'list_items',
    version: '1.0.0',
    description:
      'List all entries of one SRD category as name/index pairs. The index is what get_item expects.',
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', minLength: 1, description: 'Category name, e.g. "spells"' },
      },
      required: ['category'],
      additionalProperties: false,
    },
    handler: async (args) => {
      const category = stringArg(args, 'category');
      const result = await deps.fetcher.fetchCategoryList(category);
      return toToolResult(result, (items) => ({ category, items, count: items.length }));
    },
  };
}
