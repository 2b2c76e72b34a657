/**
 * Microsoft Identity Platform Authorization
 *
 * One-time authorization-code flow that obtains a Graph bearer token and persists it
 * for the MCP server. Features:
 * - Local callback server with state validation
 * - Manual code entry for machines without a reachable browser
 * - Token file written owner-only
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import crypto from 'crypto';
import { z } from 'zod';
import { RemoteCallFailedError, createServiceLogger } from '@outlook-connector/core';
import { CredentialStore, type TokenRecord } from './credentials.js';
import { GraphClient } from './client.js';
import type { GraphUser } from './types.js';

const logger = createServiceLogger('graph-oauth');

export const AUTHORITY_BASE_URL = 'https://login.microsoftonline.com';
export const CALLBACK_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface OutlookOAuthConfig {
  clientId: string;
  clientSecret: string;
  tenantId: string;
  redirectUri: string;
  scopes: string[];
  /** Override for tests */
  authorityBaseUrl?: string;
}

export const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
    refresh_token: z.string().optional(),
  })
  .passthrough();

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface AuthorizeOptions {
  /** Read the code from the user instead of running a callback server */
  manual?: boolean;
  /** Launch the system browser on the authorization URL */
  openBrowser?: boolean;
  /** Prompts the user for the pasted code in manual mode */
  promptForCode: () => Promise<string>;
  /** Operator-facing progress output */
  print: (line: string) => void;
  callbackTimeoutMs?: number;
}

export interface AuthorizeResult {
  tokenFile: string;
  expiresIn?: number;
  /** Absent when the post-authorization test call failed */
  user?: GraphUser;
}

export interface CallbackServerHandle {
  port: number;
  code: Promise<string>;
  close: () => void;
}

// =============================================================================
// HTML Templates
// =============================================================================

const HTML_SUCCESS = `<!DOCTYPE html>
<html>
<head><title>Outlook Connected</title></head>
<body style="font-family: system-ui, sans-serif; text-align: center; padding-top: 4rem;">
  <h1>✅ Outlook account connected</h1>
  <p>You can close this window and return to the terminal.</p>
</body>
</html>`;

const HTML_ERROR = (error: string) => `<!DOCTYPE html>
<html>
<head><title>Authorization Failed</title></head>
<body style="font-family: system-ui, sans-serif; text-align: center; padding-top: 4rem;">
  <h1>❌ Authorization failed</h1>
  <pre>${error.replace(/[<>&]/g, '')}</pre>
</body>
</html>`;

// =============================================================================
// Flow steps
// =============================================================================

export function generateState(): string {
  return crypto.randomBytes(16).toString('hex');
}

export function buildAuthorizationUrl(config: OutlookOAuthConfig, state: string): string {
  const base = config.authorityBaseUrl || AUTHORITY_BASE_URL;
  const params = new URLSearchParams({
    client_id: config.clientId,
    response_type: 'code',
    redirect_uri: config.redirectUri,
    scope: config.scopes.join(' '),
    response_mode: 'query',
    state,
  });
  return `${base}/${encodeURIComponent(config.tenantId)}/oauth2/v2.0/authorize?${params.toString()}`;
}

/**
 * Listen on the redirect URI's port and resolve with the first code whose state matches.
 * Pass `port` to override the port taken from the redirect URI (0 picks a free one).
 */
export function startCallbackServer(
  redirectUri: string,
  expectedState: string,
  options: { timeoutMs?: number; port?: number } = {}
): Promise<CallbackServerHandle> {
  const redirect = new URL(redirectUri);
  const callbackPath = redirect.pathname;
  const listenPort = options.port ?? Number(redirect.port || 80);
  const timeoutMs = options.timeoutMs ?? CALLBACK_TIMEOUT_MS;

  let settle: { resolve: (code: string) => void; reject: (error: Error) => void } | null = null;
  const code = new Promise<string>((resolve, reject) => {
    settle = { resolve, reject };
  });

  const finish = (outcome: { code: string } | { error: Error }) => {
    const pending = settle;
    settle = null;
    clearTimeout(timer);
    server.close();
    if (!pending) return;
    if ('code' in outcome) {
      pending.resolve(outcome.code);
    } else {
      pending.reject(outcome.error);
    }
  };

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    res.setHeader('Connection', 'close');
    const url = new URL(req.url || '', `http://${req.headers.host || 'localhost'}`);

    if (url.pathname !== callbackPath) {
      res.writeHead(404);
      res.end('Not Found');
      return;
    }

    const state = url.searchParams.get('state');
    const authCode = url.searchParams.get('code');
    const error = url.searchParams.get('error');
    const errorDescription = url.searchParams.get('error_description');

    logger.info('Received authorization callback', { hasCode: !!authCode, error });

    if (state !== expectedState) {
      res.writeHead(400, { 'Content-Type': 'text/html' });
      res.end(HTML_ERROR('State mismatch'));
      return;
    }

    if (error) {
      const message = errorDescription || error;
      res.writeHead(400, { 'Content-Type': 'text/html' });
      res.end(HTML_ERROR(message));
      finish({ error: new Error(`Authorization denied: ${message}`) });
      return;
    }

    if (!authCode) {
      res.writeHead(400, { 'Content-Type': 'text/html' });
      res.end(HTML_ERROR('No authorization code provided'));
      return;
    }

    res.writeHead(200, { 'Content-Type': 'text/html' });
    res.end(HTML_SUCCESS);
    finish({ code: authCode });
  });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const host = redirect.hostname === 'localhost' ? '127.0.0.1' : redirect.hostname;

  return new Promise((resolve, reject) => {
    server.once('error', (error: Error) => {
      logger.error('Callback server error', { error: error.message });
      reject(error);
    });

    server.listen(listenPort, host, () => {
      timer = setTimeout(() => {
        finish({ error: new Error('Authorization callback timeout - authorization took too long') });
      }, timeoutMs);
      timer.unref();

      const address: AddressInfo | string | null = server.address();
      const port = address && typeof address === 'object' ? address.port : listenPort;
      logger.debug('Callback server started', { port, path: callbackPath });
      resolve({
        port,
        code,
        close: () => finish({ error: new Error('Callback server stopped') }),
      });
    });
  });
}

/**
 * Exchange an authorization code at the token endpoint (form-encoded)
 */
export async function exchangeCodeForToken(
  config: OutlookOAuthConfig,
  code: string
): Promise<TokenResponse> {
  const base = config.authorityBaseUrl || AUTHORITY_BASE_URL;
  const url = `${base}/${encodeURIComponent(config.tenantId)}/oauth2/v2.0/token`;

  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      code,
      redirect_uri: config.redirectUri,
      grant_type: 'authorization_code',
      scope: config.scopes.join(' '),
    }).toString(),
  });

  const text = await response.text();
  if (response.status !== 200) {
    throw new RemoteCallFailedError(
      response.status,
      text,
      'REMOTE_CALL_FAILED',
      `Token request failed: ${response.status} - ${text}`
    );
  }

  const parsed = TokenResponseSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new RemoteCallFailedError(
      response.status,
      text,
      'REMOTE_CALL_FAILED',
      'Token response did not contain an access_token'
    );
  }
  return parsed.data;
}

/**
 * Token response as persisted, with an absolute expiry
 */
export function toTokenRecord(token: TokenResponse, now: Date = new Date()): TokenRecord {
  const record: TokenRecord = { ...token };
  if (token.expires_in !== undefined) {
    record.expires_at = new Date(now.getTime() + token.expires_in * 1000).toISOString();
  }
  return record;
}

// =============================================================================
// Orchestration
// =============================================================================

export class OutlookOAuthService {
  constructor(
    private readonly config: OutlookOAuthConfig,
    private readonly store: CredentialStore,
    private readonly graphBaseUrl?: string
  ) {}

  async authorize(options: AuthorizeOptions): Promise<AuthorizeResult> {
    const op = logger.startOperation('authorize', { manual: !!options.manual });
    const state = generateState();
    const authUrl = buildAuthorizationUrl(this.config, state);

    let token: TokenResponse;
    try {
      const code = options.manual
        ? await this.readManualCode(authUrl, options)
        : await this.captureCallbackCode(authUrl, state, options);

      options.print('🔄 Exchanging code for access token...');
      token = await exchangeCodeForToken(this.config, code);
      this.store.save(toTokenRecord(token));
    } catch (error) {
      op.failure(error instanceof Error ? error : String(error));
      throw error;
    }

    options.print('✅ Authentication successful!');
    options.print(`✅ Token saved to: ${this.store.tokenFile}`);
    options.print(`✅ Token expires in: ${token.expires_in ?? 'unknown'} seconds`);

    const user = await this.testToken(token.access_token, options.print);
    op.success('Authorization complete', { connected: !!user });
    return { tokenFile: this.store.tokenFile, expiresIn: token.expires_in, user };
  }

  private async readManualCode(authUrl: string, options: AuthorizeOptions): Promise<string> {
    options.print('🔗 Open this URL to sign in:');
    options.print(authUrl);
    await this.launchBrowser(authUrl, options);
    options.print('');
    options.print('📝 After signing in, copy the "code" parameter from the redirected URL.');

    const code = (await options.promptForCode()).trim();
    if (!code) {
      throw new Error('No authorization code provided');
    }
    return code;
  }

  private async captureCallbackCode(
    authUrl: string,
    state: string,
    options: AuthorizeOptions
  ): Promise<string> {
    const handle = await startCallbackServer(this.config.redirectUri, state, {
      timeoutMs: options.callbackTimeoutMs,
    });
    options.print('🔗 Sign in with your Microsoft account:');
    options.print(authUrl);
    await this.launchBrowser(authUrl, options);
    options.print(`⏳ Waiting for the redirect to ${this.config.redirectUri} ...`);
    return handle.code;
  }

  private async launchBrowser(authUrl: string, options: AuthorizeOptions): Promise<void> {
    if (options.openBrowser === false) return;
    try {
      const open = (await import('open')).default;
      await open(authUrl);
      logger.info('Browser opened for Microsoft authorization');
    } catch (error) {
      logger.warn('Could not open browser', {
        error: error instanceof Error ? error.message : String(error),
      });
      options.print('Could not open browser automatically. Please copy the URL above.');
    }
  }

  private async testToken(
    accessToken: string,
    print: (line: string) => void
  ): Promise<GraphUser | undefined> {
    print('');
    print('🧪 Testing API access...');
    try {
      const client = new GraphClient({ credential: { accessToken }, baseUrl: this.graphBaseUrl });
      const user = await client.getCurrentUser();
      print(
        `✅ Connected as: ${user.displayName || 'Unknown'} (${user.mail || user.userPrincipalName || 'No email'})`
      );
      return user;
    } catch (error) {
      print(`⚠️  API test failed: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
