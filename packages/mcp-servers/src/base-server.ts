/**
 * Base MCP Server Factory
 *
 * Puts the tool dispatcher behind an MCP server. Tool failures are answered in-band with
 * `isError: true`; nothing a tool does becomes a protocol error.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  UnauthenticatedError,
  clearCorrelationId,
  createServiceLogger,
  generateCorrelationId,
  loadConfig,
  mcpToolLogger,
  type AppConfig,
} from '@outlook-connector/core';
import { CredentialStore, GraphClient } from '@outlook-connector/integrations';
import { ToolDispatcher, type DispatcherSession, type ToolResult } from '@outlook-connector/mcp-tools';
import { serverConfigFrom, type McpServerConfig, type ToolCallResponse } from './types.js';

const serverLogger = createServiceLogger('mcp-server');

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut text content to `maxChars` UTF-16 units without splitting a surrogate pair
 */
export function truncateToolResult(result: ToolCallResponse, maxChars: number): ToolCallResponse {
  let truncated = false;

  const content = result.content.map((item) => {
    if (item.text.length <= maxChars) return item;

    truncated = true;
    const cut = isHighSurrogate(item.text.charCodeAt(maxChars - 1)) ? maxChars - 1 : maxChars;
    return {
      ...item,
      text: `${item.text.slice(0, cut)}\n\n[truncated ${item.text.length - cut} chars]`,
    };
  });

  if (!truncated) return result;
  return { ...result, content, truncated: true };
}

export function toToolCallResponse(result: ToolResult): ToolCallResponse {
  const content = [{ type: 'text' as const, text: result.text }];
  return result.ok ? { content } : { content, isError: true };
}

/**
 * Creates an MCP server answering from the given dispatcher
 */
export function createMcpServer(config: McpServerConfig, dispatcher: ToolDispatcher): Server {
  const server = new Server(
    {
      name: config.name,
      version: config.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  serverLogger.info('MCP Server created', {
    name: config.name,
    version: config.version,
    tools: dispatcher.list().map((t) => t.name),
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    serverLogger.debug('ListTools request received');
    return { tools: dispatcher.listMCPTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const correlationId = generateCorrelationId();
    const startTime = Date.now();

    mcpToolLogger.toolStart(name, args ?? {}, correlationId);

    try {
      const result = await dispatcher.invoke({ name, arguments: args }, correlationId);
      const duration = Date.now() - startTime;

      if (result.ok) {
        mcpToolLogger.toolSuccess(name, result.text, duration);
      } else {
        mcpToolLogger.toolError(name, result.text, duration);
      }

      return truncateToolResult(toToolCallResponse(result), config.maxContentChars);
    } finally {
      clearCorrelationId();
    }
  });

  return server;
}

/**
 * Load the persisted credential and bind a Graph client to it
 */
export function loadSession(
  config: AppConfig,
  store: CredentialStore = new CredentialStore(config.auth.tokenFile)
): DispatcherSession {
  const loaded = store.load();
  if (!loaded.found) {
    return { state: 'unauthenticated', reason: loaded.reason };
  }

  const client = new GraphClient({
    credential: loaded.credential,
    baseUrl: config.graph.baseUrl,
    timeoutMs: config.graph.requestTimeoutMs,
    timezone: config.graph.timezone,
  });
  return { state: 'ready', client };
}

export interface StartServerOptions {
  config?: AppConfig;
  /** Defaults to stdio */
  transport?: Transport;
}

/**
 * Load the credential, then connect the server. Without a credential nothing is connected.
 */
export async function startOutlookServer(options: StartServerOptions = {}): Promise<Server> {
  const config = options.config ?? loadConfig();
  serverLogger.info('Starting MCP server...', { tokenFile: config.auth.tokenFile });

  const session = loadSession(config);
  if (session.state !== 'ready') {
    throw new UnauthenticatedError(
      `Not authenticated with Microsoft Graph: ${session.reason ?? 'no credential'}`
    );
  }

  const dispatcher = new ToolDispatcher(session, { mailFolder: config.graph.mailFolder });
  const server = createMcpServer(serverConfigFrom(config), dispatcher);
  await server.connect(options.transport ?? new StdioServerTransport());

  serverLogger.info('MCP server running', {
    name: config.server.name,
    tools: dispatcher.list().map((t) => t.name),
  });
  return server;
}

/**
 * Process entry point: exits 1 when the server cannot start
 */
export async function main(): Promise<void> {
  try {
    await startOutlookServer();
  } catch (error) {
    serverLogger.error('Failed to start MCP server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}
