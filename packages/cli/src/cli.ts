#!/usr/bin/env node
/**
 * Outlook Connector CLI
 *
 * Usage:
 *   outlook-connector <command> [options]
 *
 * Commands:
 *   serve        Start the MCP server on stdio
 *   authorize    Sign in and store the access token
 *   doctor       Run diagnostics
 *   folders      List mail folders
 *   mark-read    Mark messages as read
 *   attachment   Save a file attachment
 */

import { createProgram } from './index.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
