/**
 * Doctor Command
 *
 * Run diagnostics on configuration, the stored token and Graph connectivity.
 */

import { Command } from 'commander';
import { CredentialStore, GraphClient } from '@outlook-connector/integrations';
import {
  GREEN,
  RED,
  RESET,
  YELLOW,
  createCommandContext,
  describeError,
  type CommandContext,
  type CommandIO,
} from './shared.js';

export function checkOk(label: string): string {
  return `  ${GREEN}✓${RESET} ${label}`;
}

export function checkFail(label: string): string {
  return `  ${RED}✗${RESET} ${label}`;
}

export function checkWarn(label: string): string {
  return `  ${YELLOW}!${RESET} ${label}`;
}

export function hint(text: string): string {
  return `    ${YELLOW}→ ${text}${RESET}`;
}

function reportConfiguration(context: CommandContext): void {
  const { config, io } = context;
  io.print('Configuration:');

  if (config.auth.clientId && config.auth.clientSecret) {
    io.print(checkOk(`App registration: ${config.auth.clientId} (tenant ${config.auth.tenantId})`));
  } else {
    io.print(checkWarn('CLIENT_ID / CLIENT_SECRET not set'));
    io.print(hint('Only needed to run `outlook-connector authorize`'));
  }
  io.print(checkOk(`Graph endpoint: ${config.graph.baseUrl}`));
  io.print(checkOk(`Time zone: ${config.graph.timezone}`));
  io.print(checkOk(`Mail folder: ${config.graph.mailFolder}`));
  io.print('');
}

async function reportGraph(client: GraphClient, io: CommandIO): Promise<boolean> {
  io.print('Microsoft Graph:');
  try {
    const user = await client.getCurrentUser();
    io.print(
      checkOk(
        `Connected as ${user.displayName || 'Unknown'} (${user.mail || user.userPrincipalName || 'No email'})`
      )
    );
    const unread = await client.getUnreadCount();
    io.print(checkOk(`Inbox unread: ${unread}`));
    return true;
  } catch (error) {
    io.print(checkFail(describeError(error)));
    return false;
  }
}

export async function runDoctor(context: CommandContext, now: Date = new Date()): Promise<number> {
  const { config, io } = context;

  io.print('');
  io.print('Outlook Connector Diagnostics');
  io.print('=============================');
  io.print('');

  reportConfiguration(context);

  io.print('Credential:');
  const store = new CredentialStore(config.auth.tokenFile);
  const loaded = store.load();
  if (!loaded.found) {
    io.print(checkFail(loaded.reason));
    io.print(hint('Run `outlook-connector authorize` to sign in'));
    io.print('');
    return 1;
  }

  io.print(checkOk(`Token file: ${store.tokenFile}`));
  const { expiry } = loaded.credential;
  if (expiry && expiry.getTime() <= now.getTime()) {
    io.print(checkWarn(`Token expired at ${expiry.toISOString()}`));
    io.print(hint('Run `outlook-connector authorize` to sign in again'));
  } else if (expiry) {
    io.print(checkOk(`Token valid until ${expiry.toISOString()}`));
  }
  io.print('');

  const client = new GraphClient({
    credential: loaded.credential,
    baseUrl: config.graph.baseUrl,
    timeoutMs: config.graph.requestTimeoutMs,
    timezone: config.graph.timezone,
  });
  const healthy = await reportGraph(client, io);
  io.print('');
  return healthy ? 0 : 1;
}

export const doctorCommand = new Command('doctor')
  .description('Check configuration, the stored token and Microsoft Graph access')
  .action(async () => {
    process.exitCode = await runDoctor(createCommandContext());
  });
