import { ToolDefinition } from '../types';
import { itemUri } from '../../reference/item-fetcher';
import { ToolDeps, stringArg, toToolResult } from './deps';

/**
 * Get Item Tool
 *
 * Full upstream record for one entry, addressed by category and index.
 */
export function createGetItemTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'get_item',
    version: '1.0.0',
    description:
      'Fetch the full record of a single SRD entry by category and index (e.g. spells / fireball).',
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', minLength: 1 },
        index: { type: 'string', minLength: 1, description: 'Entry index as returned by list_items' },
      },
      required: ['category', 'index'],
      additionalProperties: false,
    },
    handler: async (args) => {
      const category = stringArg(args, 'category');
      const index = stringArg(args, 'index').trim();
      const result = await deps.fetcher.fetchItem(category, index);
      return toToolResult(result, (item) => ({
        category,
        index,
        uri: itemUri(category, index),
        item,
      }));
    },
  };
}
