/**
 * Configuration Schema Definitions
 *
 * Zod schemas for every configuration section. They provide the runtime validation
 * and the inferred TypeScript types used across the workspace.
 */

import { z } from 'zod';

// =============================================================================
// Microsoft Graph Configuration
// =============================================================================

export const GraphConfigSchema = z.object({
  /** Graph API root, without a trailing slash */
  baseUrl: z.string().url('Graph base URL must be a valid URL'),
  /** Per-call timeout */
  requestTimeoutMs: z.number().int().positive(),
  /** IANA zone sent as `Prefer: outlook.timezone` and used for created events */
  timezone: z.string().min(1),
  /** Folder the email tool reads from */
  mailFolder: z.string().min(1),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;

// =============================================================================
// Authorization Configuration
// =============================================================================

export const AuthConfigSchema = z.object({
  /** Azure app registration client ID (only the authorize command needs it) */
  clientId: z.string().min(1).optional(),
  /** Azure app registration client secret */
  clientSecret: z.string().min(1).optional(),
  /** Directory tenant, `common` for multi-tenant apps */
  tenantId: z.string().min(1),
  redirectUri: z.string().url('Redirect URI must be a valid URL'),
  scopes: z.array(z.string().min(1)).min(1, 'At least one scope is required'),
  /** Where the bearer token record lives */
  tokenFile: z.string().min(1),
});

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

// =============================================================================
// MCP Server Configuration
// =============================================================================

export const ServerConfigSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  /** Tool output longer than this is truncated before it goes on the channel */
  maxContentChars: z.number().int().positive(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// =============================================================================
// Root Schema
// =============================================================================

export const AppConfigSchema = z.object({
  graph: GraphConfigSchema,
  auth: AuthConfigSchema,
  server: ServerConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
