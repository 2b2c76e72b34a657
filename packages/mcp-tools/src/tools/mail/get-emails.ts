/**
 * Get Emails Tool
 *
 * Lists the newest messages of the configured folder, or searches the inbox.
 */

import { OutlookTool } from '../base.js';
import type { ToolArguments } from '../../arguments.js';
import { renderMessageList } from '../../render/index.js';
import type { ToolContext } from '../../types.js';

export class GetEmailsTool extends OutlookTool {
  readonly name = 'get_emails';
  readonly description = 'Get recent emails from inbox or search emails';
  readonly category = 'mail' as const;
  readonly parameters = {
    count: {
      type: 'integer',
      description: 'Number of emails to retrieve (default: 10, max: 50)',
      default: 10,
      minimum: 1,
      maximum: 50,
    },
    search: {
      type: 'string',
      description: 'Search query to filter emails (optional)',
    },
  } as const;

  async execute(args: ToolArguments, context: ToolContext): Promise<string> {
    const count = args.integer('count');
    const search = args.optionalString('search');

    const messages = search
      ? await context.client.searchMessages(search, count)
      : await context.client.listMessages({ folderId: context.mailFolder, top: count });

    return renderMessageList(messages, search);
  }
}

export const getEmailsTool = new GetEmailsTool();
