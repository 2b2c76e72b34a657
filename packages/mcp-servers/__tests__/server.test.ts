/**
 * MCP server tests, over an in-memory transport
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { UnauthenticatedError } from '@outlook-connector/core';
import { GraphClient } from '@outlook-connector/integrations';
import { ToolCatalog, ToolDispatcher, createTool } from '@outlook-connector/mcp-tools';
import {
  createFetchMock,
  createGraphUser,
  createMockConfig,
  jsonResponse,
  requestAt,
  textResponse,
} from '@outlook-connector/test-utils';
import {
  createMcpServer,
  loadSession,
  startOutlookServer,
  truncateToolResult,
} from '../src/base-server.js';

const serverConfig = { name: 'outlook-connector', version: '1.0.0', maxContentChars: 200_000 };

function readyDispatcher(): ToolDispatcher {
  const client = new GraphClient({ credential: { accessToken: 'test-token' } });
  return new ToolDispatcher({ state: 'ready', client });
}

async function connect(server: Server): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return client;
}

describe('createMcpServer', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
    vi.unstubAllGlobals();
  });

  it('should list the catalog', async () => {
    client = await connect(createMcpServer(serverConfig, readyDispatcher()));

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'get_emails',
      'get_calendar_events',
      'create_calendar_event',
      'get_user_info',
    ]);
    expect(tools[2]?.inputSchema.required).toEqual(['subject', 'start_time', 'end_time']);
  });

  it('should answer a call with text content', async () => {
    const fetchMock = createFetchMock(jsonResponse(createGraphUser()));
    vi.stubGlobal('fetch', fetchMock);
    client = await connect(createMcpServer(serverConfig, readyDispatcher()));

    const result = await client.callTool({ name: 'get_user_info', arguments: {} });

    expect(result).toMatchObject({
      content: [
        {
          type: 'text',
          text:
            '👤 **User Information**\n' +
            '   Name: Sam Example\n' +
            '   Email: sam@example.com\n' +
            '   Job Title: Engineer\n' +
            '   Office: Building 2\n' +
            '   Phone: +1 555 0100',
        },
      ],
    });
    expect(requestAt(fetchMock).headers.get('authorization')).toBe('Bearer test-token');
  });

  it('should flag tool failures in-band', async () => {
    vi.stubGlobal('fetch', createFetchMock(textResponse('{"error":"not found"}', 404)));
    client = await connect(createMcpServer(serverConfig, readyDispatcher()));

    const result = await client.callTool({ name: 'get_user_info', arguments: {} });

    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: 'text',
          text: '❌ Error executing get_user_info: Microsoft Graph request failed: 404 - {"error":"not found"}',
        },
      ],
    });
  });

  it('should flag unknown tools in-band', async () => {
    client = await connect(createMcpServer(serverConfig, readyDispatcher()));

    const result = await client.callTool({ name: 'send_mail', arguments: { to: 'a@example.com' } });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: '❌ Unknown tool: send_mail' }],
    });
  });

  it('should truncate long results', async () => {
    const long = createTool({
      name: 'long_text',
      description: 'Returns a long text',
      category: 'user',
      parameters: {},
      execute: async () => 'x'.repeat(100),
    });
    const dispatcher = new ToolDispatcher(
      { state: 'ready', client: new GraphClient({ credential: { accessToken: 'test-token' } }) },
      { catalog: new ToolCatalog([long]) }
    );
    client = await connect(createMcpServer({ ...serverConfig, maxContentChars: 40 }, dispatcher));

    const result = await client.callTool({ name: 'long_text', arguments: {} });

    expect(result).toMatchObject({
      content: [{ type: 'text', text: `${'x'.repeat(40)}\n\n[truncated 60 chars]` }],
      truncated: true,
    });
  });
});

describe('truncateToolResult', () => {
  it('should leave short results untouched', () => {
    const result = { content: [{ type: 'text' as const, text: 'short' }] };

    expect(truncateToolResult(result, 10)).toBe(result);
  });

  it('should not split an emoji at the cut', () => {
    const result = { content: [{ type: 'text' as const, text: 'ab📧cd' }] };

    expect(truncateToolResult(result, 3)).toEqual({
      content: [{ type: 'text', text: 'ab\n\n[truncated 4 chars]' }],
      truncated: true,
    });
  });

  it('should keep a whole emoji that ends exactly at the cut', () => {
    const result = { content: [{ type: 'text' as const, text: 'ab📧cd' }] };

    expect(truncateToolResult(result, 4).content[0]?.text).toBe('ab📧\n\n[truncated 2 chars]');
  });
});

describe('startOutlookServer', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'outlook-server-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should refuse to start without a credential', async () => {
    const tokenFile = join(dir, 'missing.json');
    const config = createMockConfig({ auth: { tokenFile } });
    const [, serverTransport] = InMemoryTransport.createLinkedPair();
    const start = vi.spyOn(serverTransport, 'start');

    await expect(startOutlookServer({ config, transport: serverTransport })).rejects.toThrow(
      UnauthenticatedError
    );
    expect(start).not.toHaveBeenCalled();
  });

  it('should serve once a token file is present', async () => {
    const tokenFile = join(dir, 'token.json');
    writeFileSync(tokenFile, JSON.stringify({ access_token: 'test-token' }));
    const config = createMockConfig({ auth: { tokenFile } });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const server = await startOutlookServer({ config, transport: serverTransport });
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);

    const { tools } = await client.listTools();
    expect(tools).toHaveLength(4);
    expect(client.getServerVersion()).toMatchObject({ name: 'outlook-connector', version: '1.0.0' });

    await client.close();
    await server.close();
  });
});

describe('loadSession', () => {
  it('should carry the reason when no token file exists', () => {
    const config = createMockConfig({ auth: { tokenFile: '/nonexistent/outlook-token.json' } });

    expect(loadSession(config)).toEqual({
      state: 'unauthenticated',
      reason: 'Token file not found: /nonexistent/outlook-token.json',
    });
  });
});
