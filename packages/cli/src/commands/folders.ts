/**
 * Folders Command
 */

import { Command } from 'commander';
import { createCommandContext, describeError, requireClient, type CommandContext } from './shared.js';

export async function runFolders(context: CommandContext): Promise<number> {
  const client = requireClient(context);
  if (!client) return 1;

  try {
    const folders = await client.listMailFolders();
    if (folders.length === 0) {
      context.io.print('📁 No mail folders found.');
      return 0;
    }
    for (const folder of folders) {
      context.io.print(
        `📁 ${folder.displayName || 'Unnamed'} (${folder.unreadItemCount ?? 0} unread / ${folder.totalItemCount ?? 0} total)`
      );
    }
    return 0;
  } catch (error) {
    context.io.error(`❌ ${describeError(error)}`);
    return 1;
  }
}

export const foldersCommand = new Command('folders')
  .description('List mail folders with unread and total counts')
  .action(async () => {
    process.exitCode = await runFolders(createCommandContext());
  });
