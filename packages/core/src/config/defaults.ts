/**
 * Default Configuration Values
 *
 * Applied when a value comes neither from the config file nor from the environment.
 */

import type { AppConfig } from './schema.js';

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';

export const DEFAULT_SCOPES = [
  'User.Read',
  'Calendars.ReadWrite',
  'Mail.Read',
  'Mail.ReadWrite',
  'Mail.Send',
] as const;

export const DEFAULT_REDIRECT_URI = 'http://localhost:8000/callback';

/** `~` is expanded by the loader */
export const DEFAULT_TOKEN_FILE = '~/.outlook_token.json';

export const DEFAULT_CONFIG: AppConfig = {
  graph: {
    baseUrl: DEFAULT_GRAPH_BASE_URL,
    requestTimeoutMs: 30_000,
    timezone: 'UTC',
    mailFolder: 'inbox',
  },
  auth: {
    tenantId: 'common',
    redirectUri: DEFAULT_REDIRECT_URI,
    scopes: [...DEFAULT_SCOPES],
    tokenFile: DEFAULT_TOKEN_FILE,
  },
  server: {
    name: 'outlook-connector',
    version: '1.0.0',
    maxContentChars: 200_000,
  },
};
