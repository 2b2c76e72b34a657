/**
 * Authorize Command
 *
 * One-time sign-in that stores a Microsoft Graph access token for the server.
 */

import { Command } from 'commander';
import * as readline from 'readline';
import { CredentialStore, OutlookOAuthService } from '@outlook-connector/integrations';
import { createCommandContext, describeError, type CommandContext } from './shared.js';

export interface AuthorizeCommandOptions {
  manual?: boolean;
  /** commander sets this to false for --no-browser */
  browser?: boolean;
}

function promptOnStdin(prompt: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(prompt, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

export async function runAuthorize(
  options: AuthorizeCommandOptions,
  context: CommandContext,
  promptForCode: () => Promise<string> = () => promptOnStdin('Paste the authorization code: ')
): Promise<number> {
  const { config, io } = context;
  const { clientId, clientSecret } = config.auth;

  if (!clientId || !clientSecret) {
    io.error('❌ Missing Azure app credentials.');
    io.error(
      'Set CLIENT_ID and CLIENT_SECRET (or AZURE_CLIENT_ID and AZURE_CLIENT_SECRET) ' +
        'in the environment or a .env file.'
    );
    io.error(`The app registration must allow the redirect URI ${config.auth.redirectUri}`);
    return 1;
  }

  const service = new OutlookOAuthService(
    {
      clientId,
      clientSecret,
      tenantId: config.auth.tenantId,
      redirectUri: config.auth.redirectUri,
      scopes: config.auth.scopes,
    },
    new CredentialStore(config.auth.tokenFile),
    config.graph.baseUrl
  );

  try {
    await service.authorize({
      manual: options.manual,
      openBrowser: options.browser !== false,
      promptForCode,
      print: io.print,
    });
  } catch (error) {
    io.error(`❌ Authorization failed: ${describeError(error)}`);
    return 1;
  }

  io.print('');
  io.print('🎉 Setup complete! Start the server with `outlook-connector serve`.');
  return 0;
}

export const authorizeCommand = new Command('authorize')
  .description('Sign in with a Microsoft account and store the access token')
  .option('--manual', 'Paste the authorization code instead of running a local callback server')
  .option('--no-browser', 'Print the sign-in URL without opening a browser')
  .action(async (options: AuthorizeCommandOptions) => {
    process.exitCode = await runAuthorize(options, createCommandContext());
  });
