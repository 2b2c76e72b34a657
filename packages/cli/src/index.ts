/**
 * @outlook-connector/cli
 *
 * Command-line tools for the Outlook connector.
 *
 * Main entry point for the CLI is in ./cli.ts
 * This file exports utilities for programmatic use.
 */

import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { authorizeCommand } from './commands/authorize.js';
import { doctorCommand } from './commands/doctor.js';
import { foldersCommand } from './commands/folders.js';
import { markReadCommand } from './commands/mark-read.js';
import { attachmentCommand } from './commands/attachment.js';

export const CLI_VERSION = '1.0.0';

export function createProgram(): Command {
  return new Command()
    .name('outlook-connector')
    .description('Outlook mail and calendar tools for MCP clients, backed by Microsoft Graph')
    .version(CLI_VERSION)
    .addCommand(serveCommand)
    .addCommand(authorizeCommand)
    .addCommand(doctorCommand)
    .addCommand(foldersCommand)
    .addCommand(markReadCommand)
    .addCommand(attachmentCommand);
}

// Export command modules for programmatic use
export { serveCommand } from './commands/serve.js';
export { authorizeCommand, runAuthorize, type AuthorizeCommandOptions } from './commands/authorize.js';
export { doctorCommand, runDoctor } from './commands/doctor.js';
export { foldersCommand, runFolders } from './commands/folders.js';
export { markReadCommand, runMarkRead } from './commands/mark-read.js';
export {
  attachmentCommand,
  runAttachment,
  type AttachmentCommandOptions,
} from './commands/attachment.js';
export { consoleIO, describeError, type CommandContext, type CommandIO } from './commands/shared.js';
