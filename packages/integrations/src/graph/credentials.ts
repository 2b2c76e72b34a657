/**
 * Credential Store
 *
 * Reads the bearer token record written by the authorize command. The record is never
 * refreshed or written back here.
 */

import fs from 'fs';
import { z } from 'zod';
import { DEFAULT_TOKEN_FILE, createServiceLogger, expandHome } from '@outlook-connector/core';
import type { Credential, CredentialLoadResult } from './types.js';

const logger = createServiceLogger('credential-store');

const TokenRecordSchema = z
  .object({
    access_token: z.string().min(1, 'access_token is empty'),
    expires_at: z.string().optional(),
  })
  .passthrough();

export type TokenRecord = z.infer<typeof TokenRecordSchema>;

export class CredentialStore {
  readonly tokenFile: string;

  constructor(tokenFile: string = DEFAULT_TOKEN_FILE) {
    this.tokenFile = expandHome(tokenFile);
  }

  load(): CredentialLoadResult {
    if (!fs.existsSync(this.tokenFile)) {
      return { found: false, reason: `Token file not found: ${this.tokenFile}` };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.tokenFile, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { found: false, reason: `Token file ${this.tokenFile} is not valid JSON: ${message}` };
    }

    const parsed = TokenRecordSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        found: false,
        reason: `Token file ${this.tokenFile} has no usable access_token`,
      };
    }

    const credential: Credential = { accessToken: parsed.data.access_token };
    if (parsed.data.expires_at) {
      const expiry = new Date(parsed.data.expires_at);
      if (!Number.isNaN(expiry.getTime())) {
        credential.expiry = expiry;
      }
    }

    logger.debug('Loaded credential', { tokenFile: this.tokenFile, hasExpiry: !!credential.expiry });
    return { found: true, credential };
  }

  /**
   * Persist a token response from the authorization server (owner read/write only)
   */
  save(record: TokenRecord): void {
    fs.writeFileSync(this.tokenFile, JSON.stringify(record, null, 2), { mode: 0o600 });
    // writeFileSync only applies mode on creation
    fs.chmodSync(this.tokenFile, 0o600);
    logger.info('Saved token record', { tokenFile: this.tokenFile });
  }
}
