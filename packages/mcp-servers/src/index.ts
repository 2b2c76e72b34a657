/**
 * MCP Servers Module
 *
 * The stdio MCP server that exposes the Outlook tool catalog.
 */

export * from './types.js';
export * from './base-server.js';
