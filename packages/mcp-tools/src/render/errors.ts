/**
 * Error-to-text mapping for tool results
 *
 * The one place where a failure inside a tool call becomes text for the caller. Every
 * text starts with ❌, names the tool and is passed through token redaction.
 */

import {
  AuthExpiredError,
  RemoteCallFailedError,
  UnauthenticatedError,
  UnknownToolError,
  ValidationFailedError,
  redactText,
} from '@outlook-connector/core';

export const REAUTHORIZE_HINT = 'Run `outlook-connector authorize` to sign in again.';

function describe(tool: string, error: unknown): string {
  if (error instanceof UnknownToolError) {
    return `❌ Unknown tool: ${tool}`;
  }

  if (error instanceof UnauthenticatedError) {
    return (
      `❌ Cannot run ${tool}: ${error.message}. ` +
      'Please run `outlook-connector authorize` first and ensure your access token is saved.'
    );
  }

  if (error instanceof ValidationFailedError) {
    if (error.expected) {
      return (
        `❌ Error parsing datetime for ${tool}: ${error.message}\n` +
        `Please use format like: ${error.expected}`
      );
    }
    return `❌ Invalid arguments for ${tool}: ${error.message}`;
  }

  if (error instanceof AuthExpiredError) {
    return `❌ Error executing ${tool}: ${error.message} ${REAUTHORIZE_HINT}`;
  }

  if (error instanceof RemoteCallFailedError) {
    return `❌ Error executing ${tool}: ${error.message}`;
  }

  const message = error instanceof Error ? error.message : String(error);
  return `❌ Error executing ${tool}: ${message}`;
}

export function renderToolError(tool: string, error: unknown): string {
  return redactText(describe(tool, error));
}
