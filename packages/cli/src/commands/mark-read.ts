/**
 * Mark-Read Command
 *
 * Marks messages read one after another; a failed message does not stop the rest.
 */

import { Command } from 'commander';
import { redactText } from '@outlook-connector/core';
import { createCommandContext, requireClient, type CommandContext } from './shared.js';

export async function runMarkRead(messageIds: string[], context: CommandContext): Promise<number> {
  const client = requireClient(context);
  if (!client) return 1;

  const outcomes = await client.bulkMarkRead(messageIds);
  let succeeded = 0;
  for (const outcome of outcomes) {
    if (outcome.success) {
      succeeded++;
      context.io.print(`✅ ${outcome.id}`);
    } else {
      context.io.print(`❌ ${outcome.id}: ${redactText(outcome.error)}`);
    }
  }

  context.io.print(`Marked ${succeeded} of ${outcomes.length} messages as read.`);
  return succeeded === outcomes.length ? 0 : 1;
}

export const markReadCommand = new Command('mark-read')
  .description('Mark one or more messages as read')
  .argument('<ids...>', 'Message IDs')
  .action(async (ids: string[]) => {
    process.exitCode = await runMarkRead(ids, createCommandContext());
  });
