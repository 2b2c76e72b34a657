/**
 * Tool Dispatcher
 *
 * Routes one invocation to its tool and turns the outcome into a ToolResult. Never throws:
 * every failure becomes an error result through renderToolError.
 *
 * Order of checks:
 * 1. Unknown name
 * 2. Session without a credential
 * 3. Argument normalization (inside the tool's run)
 * 4. Remote call and rendering
 */

import {
  UnauthenticatedError,
  UnknownToolError,
  createServiceLogger,
  wrapError,
  type ServiceLogger,
} from '@outlook-connector/core';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { getToolCatalog, type ToolCatalog } from './registry/index.js';
import { renderToolError } from './render/index.js';
import type {
  DispatcherSession,
  ToolContext,
  ToolDescriptor,
  ToolInvocation,
  ToolResult,
} from './types.js';

export interface DispatcherOptions {
  catalog?: ToolCatalog;
  /** Folder read by get_emails (default: inbox) */
  mailFolder?: string;
  now?: () => Date;
  logger?: ServiceLogger;
}

export class ToolDispatcher {
  private readonly catalog: ToolCatalog;
  private readonly mailFolder: string;
  private readonly now: () => Date;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly session: DispatcherSession,
    options: DispatcherOptions = {}
  ) {
    this.catalog = options.catalog ?? getToolCatalog();
    this.mailFolder = options.mailFolder || 'inbox';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createServiceLogger('tool-dispatcher');
  }

  list(): ToolDescriptor[] {
    return this.catalog.list();
  }

  listMCPTools(): Tool[] {
    return this.catalog.listMCPTools();
  }

  async invoke(invocation: ToolInvocation, correlationId?: string): Promise<ToolResult> {
    const tool = this.catalog.get(invocation.name);
    if (!tool) {
      return this.fail(invocation.name, new UnknownToolError(invocation.name));
    }

    if (this.session.state !== 'ready') {
      return this.fail(invocation.name, new UnauthenticatedError());
    }

    const context: ToolContext = {
      client: this.session.client,
      mailFolder: this.mailFolder,
      now: this.now,
      correlationId,
    };

    try {
      const text = await tool.run(invocation.arguments, context);
      return { ok: true, text };
    } catch (error) {
      return this.fail(invocation.name, error);
    }
  }

  private fail(tool: string, error: unknown): ToolResult {
    const connectorError = wrapError(error, 'INTERNAL_ERROR', `Tool ${tool} failed`);
    this.logger.warn('Tool call failed', {
      tool,
      code: connectorError.code,
      error: connectorError.message,
    });
    return { ok: false, text: renderToolError(tool, error), kind: connectorError.code };
  }
}
