import type { GraphMessage } from '@outlook-connector/integrations';
import { formatTimestamp } from '../datetime.js';

const PREVIEW_LENGTH = 150;

function matching(search: string | undefined): string {
  return search ? ` matching '${search}'` : '';
}

function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > PREVIEW_LENGTH ? `${chars.slice(0, PREVIEW_LENGTH).join('')}...` : text;
}

export function renderMessage(message: GraphMessage): string {
  const from = message.from?.emailAddress?.address || 'Unknown';
  const status = message.isRead ? '✅ Read' : '🔴 Unread';

  return (
    `📧 **${message.subject || 'No subject'}**\n` +
    `   From: ${from}\n` +
    `   Date: ${formatTimestamp(message.receivedDateTime || 'Unknown')}\n` +
    `   Status: ${status}\n` +
    `   Preview: ${preview(message.bodyPreview ?? '')}\n`
  );
}

export function renderMessageList(messages: GraphMessage[], search?: string): string {
  if (messages.length === 0) {
    return `📧 No emails found${matching(search)}.`;
  }

  const header = `📧 Found ${messages.length} emails${matching(search)}:\n\n`;
  return header + messages.map(renderMessage).join('\n');
}
