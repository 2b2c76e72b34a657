/**
 * Tool Catalog
 *
 * The fixed, ordered set of tools the connector advertises. Listing is static and
 * side-effect free; lookups are by exact name.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createServiceLogger } from '@outlook-connector/core';
import type { OutlookTool } from '../tools/base.js';
import { getEmailsTool } from '../tools/mail/index.js';
import { createCalendarEventTool, getCalendarEventsTool } from '../tools/calendar/index.js';
import { getUserInfoTool } from '../tools/user/index.js';
import type { ToolCategory, ToolDescriptor } from '../types.js';

const logger = createServiceLogger('tool-catalog');

export const DEFAULT_TOOLS: readonly OutlookTool[] = [
  getEmailsTool,
  getCalendarEventsTool,
  createCalendarEventTool,
  getUserInfoTool,
];

export class ToolCatalog {
  private readonly tools = new Map<string, OutlookTool>();

  constructor(tools: readonly OutlookTool[] = DEFAULT_TOOLS) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    logger.debug('Tool catalog built', { toolCount: this.tools.size });
  }

  /**
   * Get a tool by name
   */
  get(name: string): OutlookTool | undefined {
    return this.tools.get(name);
  }

  /**
   * All descriptors, in catalog order
   */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (tool) => tool.toDescriptor());
  }

  /**
   * MCP tool definitions, in catalog order
   */
  listMCPTools(): Tool[] {
    return Array.from(this.tools.values(), (tool) => tool.toMCPTool());
  }

  getToolsByCategory(category: ToolCategory): ToolDescriptor[] {
    return this.list().filter((tool) => tool.category === category);
  }

  getAllToolNames(): string[] {
    return Array.from(this.tools.keys());
  }
}

// Singleton instance
let catalogInstance: ToolCatalog | null = null;

/**
 * Get the global tool catalog instance
 */
export function getToolCatalog(): ToolCatalog {
  if (!catalogInstance) {
    catalogInstance = new ToolCatalog();
  }
  return catalogInstance;
}

/**
 * Reset the global catalog (for testing)
 */
export function resetToolCatalog(): void {
  catalogInstance = null;
}
