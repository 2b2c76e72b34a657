/**
 * Attachment Command
 *
 * Saves a file attachment to disk. Item and reference attachments are refused.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { basename, resolve } from 'path';
import { formatBytes } from '@outlook-connector/core';
import { createCommandContext, describeError, requireClient, type CommandContext } from './shared.js';

export interface AttachmentCommandOptions {
  output?: string;
}

export async function runAttachment(
  messageId: string,
  attachmentId: string,
  options: AttachmentCommandOptions,
  context: CommandContext
): Promise<number> {
  const client = requireClient(context);
  if (!client) return 1;

  try {
    const attachment = await client.downloadAttachment(messageId, attachmentId);
    const target = resolve(options.output || basename(attachment.name) || attachmentId);
    writeFileSync(target, attachment.content);
    context.io.print(`💾 Saved ${attachment.name} (${formatBytes(attachment.size)}) to ${target}`);
    return 0;
  } catch (error) {
    context.io.error(`❌ ${describeError(error)}`);
    return 1;
  }
}

export const attachmentCommand = new Command('attachment')
  .description('Save a file attachment of a message')
  .argument('<messageId>', 'Message ID')
  .argument('<attachmentId>', 'Attachment ID')
  .option('-o, --output <file>', 'Where to write the file (default: the attachment name)')
  .action(async (messageId: string, attachmentId: string, options: AttachmentCommandOptions) => {
    process.exitCode = await runAttachment(messageId, attachmentId, options, createCommandContext());
  });
