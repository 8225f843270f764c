import { ToolDefinition } from '../types';
import { ToolDeps, toToolResult } from './deps';

/**
 * List Categories Tool
 *
 * The upstream root index: every SRD category with a short description.
 */
export function createListCategoriesTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'list_categories',
    version: '1.0.0',
    description:
      'List every D&D 5e SRD category (spells, monsters, equipment, ...) with a short description. Use first when unsure which category holds an entry.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
    handler: async () => {
      const result = await deps.fetcher.fetchCategoryIndex();
      return toToolResult(result, (categories) => ({ categories, count: categories.length }));
    },
  };
}
