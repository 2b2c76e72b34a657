/**
 * Serve Command
 *
 * Runs the MCP server on stdio until the client disconnects.
 */

import { Command } from 'commander';
import { main } from '@outlook-connector/mcp-servers';

export const serveCommand = new Command('serve')
  .description('Start the MCP server on stdio')
  .action(async () => {
    await main();
  });
