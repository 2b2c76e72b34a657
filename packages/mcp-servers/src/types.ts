/**
 * MCP Server Types and Configuration
 */

import type { AppConfig } from '@outlook-connector/core';

/**
 * Identity and limits of the stdio server
 */
export interface McpServerConfig {
  /** Name announced during the MCP handshake */
  name: string;

  version: string;

  /** Text content above this length is cut and marked */
  maxContentChars: number;
}

export type TextContent = {
  type: 'text';
  text: string;
};

/**
 * Response body of a tools/call request
 */
export type ToolCallResponse = {
  content: TextContent[];
  isError?: boolean;
  truncated?: boolean;
};

export function serverConfigFrom(config: AppConfig): McpServerConfig {
  return {
    name: config.server.name,
    version: config.server.version,
    maxContentChars: config.server.maxContentChars,
  };
}
