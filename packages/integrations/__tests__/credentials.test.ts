/**
 * Tests for the credential store
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, statSync, writeFileSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir, tmpdir } from 'os';
import { CredentialStore } from '../src/graph/credentials.js';

describe('CredentialStore', () => {
  let dir: string;
  let tokenFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'outlook-token-'));
    tokenFile = join(dir, 'token.json');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the access token and expiry', () => {
    writeFileSync(
      tokenFile,
      JSON.stringify({
        access_token: 'test-token',
        token_type: 'Bearer',
        expires_at: '2025-08-14T13:00:00.000Z',
      })
    );

    const result = new CredentialStore(tokenFile).load();

    expect(result).toEqual({
      found: true,
      credential: { accessToken: 'test-token', expiry: new Date('2025-08-14T13:00:00.000Z') },
    });
  });

  it('should ignore an unparsable expiry', () => {
    writeFileSync(tokenFile, JSON.stringify({ access_token: 'test-token', expires_at: 'later' }));

    expect(new CredentialStore(tokenFile).load()).toEqual({
      found: true,
      credential: { accessToken: 'test-token' },
    });
  });

  it('should report a missing file', () => {
    const result = new CredentialStore(tokenFile).load();

    expect(result).toEqual({ found: false, reason: `Token file not found: ${tokenFile}` });
  });

  it('should report invalid JSON', () => {
    writeFileSync(tokenFile, 'not json');

    const result = new CredentialStore(tokenFile).load();

    expect(result.found).toBe(false);
    expect(result.found === false && result.reason).toMatch(/is not valid JSON/);
  });

  it('should report an empty or missing access_token', () => {
    writeFileSync(tokenFile, JSON.stringify({ access_token: '' }));
    expect(new CredentialStore(tokenFile).load()).toEqual({
      found: false,
      reason: `Token file ${tokenFile} has no usable access_token`,
    });

    writeFileSync(tokenFile, JSON.stringify({ refresh_token: 'test-refresh' }));
    expect(new CredentialStore(tokenFile).load().found).toBe(false);
  });

  it('should ignore OUTLOOK_TOKEN_FILE and default to the home directory', () => {
    vi.stubEnv('OUTLOOK_TOKEN_FILE', tokenFile);

    expect(new CredentialStore().tokenFile).toBe(join(homedir(), '.outlook_token.json'));
  });

  it('should save records readable only by the owner', () => {
    const store = new CredentialStore(tokenFile);

    store.save({ access_token: 'test-token', expires_at: '2025-08-14T13:00:00.000Z' });

    expect(JSON.parse(readFileSync(tokenFile, 'utf-8'))).toEqual({
      access_token: 'test-token',
      expires_at: '2025-08-14T13:00:00.000Z',
    });
    if (process.platform !== 'win32') {
      expect(statSync(tokenFile).mode & 0o777).toBe(0o600);
    }
    expect(store.load().found).toBe(true);
  });
});
