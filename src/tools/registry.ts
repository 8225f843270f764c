import { ToolDefinition } from './types';
import { logger } from '../observability/logger';
import { ToolDeps } from './implementations/deps';
import { createListCategoriesTool } from './implementations/list-categories';
import { createListItemsTool } from './implementations/list-items';
import { createGetItemTool } from './implementations/get-item';
import { createLookupEntryTool } from './implementations/lookup-entry';
import { createSearchCategoryTool } from './implementations/search-category';
import { createSearchAllTool } from './implementations/search-all';
import { createApiStatusTool } from './implementations/api-status';

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, 'Overwriting existing tool registration');
    }
    this.tools.set(tool.name, tool);
    logger.debug({ tool: tool.name, version: tool.version }, 'Tool registered');
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Tool definitions as published to agents (no handlers) */
  describe(): Array<Pick<ToolDefinition, 'name' | 'version' | 'description' | 'inputSchema'>> {
    return this.getAll().map((t) => ({
      name: t.name,
      version: t.version,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }
}

/** Register the SRD reference tools */
export function registerReferenceTools(registry: ToolRegistry, deps: ToolDeps): void {
  // ─── Browsing ───
  registry.register(createListCategoriesTool(deps));
  registry.register(createListItemsTool(deps));
  registry.register(createGetItemTool(deps));
  registry.register(createLookupEntryTool(deps));

  // ─── Search ───
  registry.register(createSearchCategoryTool(deps));
  registry.register(createSearchAllTool(deps));

  // ─── Diagnostics ───
  registry.register(createApiStatusTool(deps));

  logger.info({ count: registry.getAll().length }, 'All reference tools registered');
}
