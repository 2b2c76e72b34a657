/**
 * Tool System Type Definitions
 *
 * Central type definitions for the Outlook tool catalog and dispatcher.
 */

import type { ConnectorErrorCode } from '@outlook-connector/core';
import type { GraphClient } from '@outlook-connector/integrations';

/**
 * Tool categories for organizing tools by domain
 */
export type ToolCategory = 'mail' | 'calendar' | 'user';

/**
 * Parameter kinds understood by argument normalization
 */
export type ParameterType = 'integer' | 'string' | 'datetime' | 'string[]';

export interface ParameterSpec {
  type: ParameterType;
  description: string;
  default?: number | string;
  minimum?: number;
  maximum?: number;
  required?: boolean;
}

export type ParameterMap = Readonly<Record<string, ParameterSpec>>;

/**
 * Static, channel-independent description of a tool
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: ParameterMap;
}

/**
 * A normalized argument value. Absent values are simply not present.
 */
export type ArgumentValue = number | string | string[];

/**
 * Context passed to tool execution
 */
export interface ToolContext {
  /** Graph client bound to the loaded credential */
  client: GraphClient;

  /** Folder read by get_emails when no search is given */
  mailFolder: string;

  /** Clock for relative windows, injectable in tests */
  now: () => Date;

  /** Correlation ID for request tracing */
  correlationId?: string;
}

/**
 * Outcome of one invocation. Error results are values, never exceptions.
 */
export type ToolResult =
  | { ok: true; text: string }
  | { ok: false; text: string; kind: ConnectorErrorCode };

export interface ToolInvocation {
  name: string;
  /** Untyped argument bag as received from the channel */
  arguments?: Record<string, unknown>;
}

/**
 * Whether the process holds a credential. Fixed for the lifetime of a dispatcher.
 */
export type DispatcherSession =
  | { state: 'ready'; client: GraphClient }
  | { state: 'unauthenticated'; reason?: string };
