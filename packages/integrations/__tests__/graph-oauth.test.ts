/**
 * Tests for the Microsoft authorization flow
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { logger } from '@outlook-connector/core';
import {
  createFetchMock,
  createGraphUser,
  jsonResponse,
  requestAt,
  textResponse,
} from '@outlook-connector/test-utils';

vi.mock('open', () => ({ default: vi.fn().mockResolvedValue(undefined) }));

import {
  OutlookOAuthService,
  buildAuthorizationUrl,
  exchangeCodeForToken,
  startCallbackServer,
  toTokenRecord,
  type OutlookOAuthConfig,
} from '../src/graph/oauth.js';
import { CredentialStore } from '../src/graph/credentials.js';

const config: OutlookOAuthConfig = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  tenantId: 'common',
  redirectUri: 'http://localhost:8000/callback',
  scopes: ['User.Read', 'Calendars.ReadWrite', 'Mail.Read', 'Mail.ReadWrite', 'Mail.Send'],
};

describe('Outlook authorization', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildAuthorizationUrl', () => {
    it('should request a code with the configured scopes', () => {
      const url = new URL(buildAuthorizationUrl(config, 'state-123'));

      expect(url.origin).toBe('https://login.microsoftonline.com');
      expect(url.pathname).toBe('/common/oauth2/v2.0/authorize');
      expect(Object.fromEntries(url.searchParams)).toEqual({
        client_id: 'test-client-id',
        response_type: 'code',
        redirect_uri: 'http://localhost:8000/callback',
        scope: 'User.Read Calendars.ReadWrite Mail.Read Mail.ReadWrite Mail.Send',
        response_mode: 'query',
        state: 'state-123',
      });
    });
  });

  describe('exchangeCodeForToken', () => {
    it('should post a form-encoded authorization_code grant', async () => {
      const fetchMock = createFetchMock(
        jsonResponse({ access_token: 'test-token', token_type: 'Bearer', expires_in: 3600 })
      );
      vi.stubGlobal('fetch', fetchMock);

      const token = await exchangeCodeForToken(config, 'code-1');

      expect(token.access_token).toBe('test-token');
      const request = requestAt(fetchMock);
      expect(request.url.toString()).toBe(
        'https://login.microsoftonline.com/common/oauth2/v2.0/token'
      );
      expect(request.headers.get('content-type')).toBe('application/x-www-form-urlencoded');
      const form = new URLSearchParams(request.body);
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(form.get('code')).toBe('code-1');
      expect(form.get('client_secret')).toBe('test-secret');
      expect(form.get('redirect_uri')).toBe('http://localhost:8000/callback');
    });

    it('should fail with the status on a non-200 response', async () => {
      vi.stubGlobal('fetch', createFetchMock(textResponse('{"error":"invalid_grant"}', 400)));

      await expect(exchangeCodeForToken(config, 'stale')).rejects.toThrow(
        'Token request failed: 400 - {"error":"invalid_grant"}'
      );
    });
  });

  describe('toTokenRecord', () => {
    it('should turn expires_in into an absolute expiry', () => {
      const record = toTokenRecord(
        { access_token: 'test-token', expires_in: 3600 },
        new Date('2025-08-14T12:00:00.000Z')
      );

      expect(record).toEqual({
        access_token: 'test-token',
        expires_in: 3600,
        expires_at: '2025-08-14T13:00:00.000Z',
      });
    });
  });

  describe('startCallbackServer', () => {
    it('should ignore a mismatched state and resolve on the matching one', async () => {
      const handle = await startCallbackServer(config.redirectUri, 'state-ok', { port: 0 });

      const rejected = await fetch(
        `http://127.0.0.1:${handle.port}/callback?code=evil&state=state-bad`
      );
      expect(rejected.status).toBe(400);

      const accepted = await fetch(
        `http://127.0.0.1:${handle.port}/callback?code=code-1&state=state-ok`
      );
      expect(accepted.status).toBe(200);

      await expect(handle.code).resolves.toBe('code-1');
    });

    it('should reject when the user denies consent', async () => {
      const handle = await startCallbackServer(config.redirectUri, 'state-ok', { port: 0 });
      const outcome = expect(handle.code).rejects.toThrow('Authorization denied: User declined');

      const response = await fetch(
        `http://127.0.0.1:${handle.port}/callback?state=state-ok&error=access_denied&error_description=User+declined`
      );

      expect(response.status).toBe(400);
      await outcome;
    });

    it('should time out', async () => {
      const handle = await startCallbackServer(config.redirectUri, 'state-ok', {
        port: 0,
        timeoutMs: 10,
      });

      await expect(handle.code).rejects.toThrow(/timeout/);
    });
  });

  describe('OutlookOAuthService', () => {
    let dir: string;
    let store: CredentialStore;
    let lines: string[];

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'outlook-oauth-'));
      store = new CredentialStore(join(dir, 'token.json'));
      lines = [];
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    const print = (line: string) => {
      lines.push(line);
    };

    it('should exchange a pasted code, save the token and test it', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2025-08-14T12:00:00.000Z'));
      vi.stubGlobal(
        'fetch',
        createFetchMock(
          jsonResponse({ access_token: 'test-token', expires_in: 3600 }),
          jsonResponse(createGraphUser({ displayName: 'Sam Example', mail: 'sam@example.com' }))
        )
      );
      const service = new OutlookOAuthService(config, store);

      const result = await service.authorize({
        manual: true,
        openBrowser: false,
        promptForCode: async () => '  code-1 \n',
        print,
      });
      vi.useRealTimers();

      expect(result.user?.displayName).toBe('Sam Example');
      expect(result.expiresIn).toBe(3600);
      expect(JSON.parse(readFileSync(store.tokenFile, 'utf-8'))).toEqual({
        access_token: 'test-token',
        expires_in: 3600,
        expires_at: '2025-08-14T13:00:00.000Z',
      });
      expect(lines).toContain('✅ Token expires in: 3600 seconds');
      expect(lines).toContain('✅ Connected as: Sam Example (sam@example.com)');
    });

    it('should warn without failing when the test call fails', async () => {
      vi.stubGlobal(
        'fetch',
        createFetchMock(
          jsonResponse({ access_token: 'test-token' }),
          textResponse('{"error":"forbidden"}', 403)
        )
      );
      const service = new OutlookOAuthService(config, store);

      const result = await service.authorize({
        manual: true,
        openBrowser: false,
        promptForCode: async () => 'code-1',
        print,
      });

      expect(result.user).toBeUndefined();
      expect(lines).toContain('✅ Token expires in: unknown seconds');
      expect(lines).toContain(
        '⚠️  API test failed: Microsoft Graph request failed: 403 - {"error":"forbidden"}'
      );
      expect(store.load().found).toBe(true);
    });

    it('should log the failure and save nothing when the exchange fails', async () => {
      vi.stubGlobal('fetch', createFetchMock(textResponse('{"error":"invalid_grant"}', 400)));
      const logError = vi.spyOn(logger, 'error');
      const service = new OutlookOAuthService(config, store);

      await expect(
        service.authorize({ manual: true, openBrowser: false, promptForCode: async () => 'code-1', print })
      ).rejects.toThrow('Token request failed: 400 - {"error":"invalid_grant"}');

      expect(logError).toHaveBeenCalledWith(
        'Failed authorize: Token request failed: 400 - {"error":"invalid_grant"}',
        expect.objectContaining({ operation: 'authorize', status: 'failure' })
      );
      expect(store.load().found).toBe(false);
      logError.mockRestore();
    });

    it('should refuse an empty pasted code', async () => {
      const service = new OutlookOAuthService(config, store);

      await expect(
        service.authorize({ manual: true, openBrowser: false, promptForCode: async () => '  ', print })
      ).rejects.toThrow('No authorization code provided');
    });
  });
});
