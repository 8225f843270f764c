import { ToolDefinition } from '../types';
import { ToolDeps, stringArg, toToolResult } from './deps';

export function createLookupEntryTool(deps: ToolDeps): ToolDefinition {
  return {
    name: 'lookup_entry',
    version: '1.0.0',
    description:
      'Look up an SRD entry by its display name (e.g. "Magic Missile", "Adult Red Dragon"). Falls back to a name match over the category listing.',
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', minLength: 1 },
        name: { type: 'string', minLength: 1 },
      },
      required: ['category', 'name'],
      additionalProperties: false,
    },
    handler: async (args) => {
      const category = stringArg(args, 'category');
      const result = await deps.fetcher.lookupByName(category, stringArg(args, 'name'));
      return toToolResult(result, (item) => ({ category, item }));
    },
  };
}
