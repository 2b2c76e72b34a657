/**
 * Shared plumbing for CLI commands
 *
 * Commands are thin wrappers around `run*` functions that take a context and return an
 * exit code, so they can be exercised without a terminal.
 */

import {
  AuthExpiredError,
  loadConfig,
  redactText,
  type AppConfig,
} from '@outlook-connector/core';
import type { GraphClient } from '@outlook-connector/integrations';
import { loadSession } from '@outlook-connector/mcp-servers';

// Colors
export const GREEN = '\x1b[32m';
export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const RESET = '\x1b[0m';

export interface CommandIO {
  print: (line: string) => void;
  error: (line: string) => void;
}

export interface CommandContext {
  config: AppConfig;
  io: CommandIO;
}

export const consoleIO: CommandIO = {
  print: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function createCommandContext(): CommandContext {
  return { config: loadConfig(), io: consoleIO };
}

/**
 * One-line, redacted description of a failure, with the re-authorize hint on 401
 */
export function describeError(error: unknown): string {
  const message = redactText(error instanceof Error ? error.message : String(error));
  if (error instanceof AuthExpiredError) {
    return `${message} Run \`outlook-connector authorize\` to sign in again.`;
  }
  return message;
}

/**
 * Graph client for the stored credential, or null after telling the user how to get one
 */
export function requireClient(context: CommandContext): GraphClient | null {
  const session = loadSession(context.config);
  if (session.state !== 'ready') {
    context.io.error(`❌ ${session.reason ?? 'Not authenticated with Microsoft Graph'}`);
    context.io.error('Run `outlook-connector authorize` first.');
    return null;
  }
  return session.client;
}
