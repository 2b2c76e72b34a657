import type { GraphEvent } from '@outlook-connector/integrations';
import { formatWindow } from '../datetime.js';

function attendeeLine(addresses: string[]): string {
  return addresses.length > 0 ? `\n   Attendees: ${addresses.join(', ')}` : '';
}

export function renderEvent(event: GraphEvent): string {
  const when = formatWindow(event.start?.dateTime ?? '', event.end?.dateTime ?? '');
  const attendees = (event.attendees ?? [])
    .map((attendee) => attendee.emailAddress?.address ?? '')
    .filter((address) => address !== '');

  return (
    `📅 **${event.subject || 'No title'}**\n` +
    `   When: ${when}\n` +
    `   Where: ${event.location?.displayName || 'No location'}${attendeeLine(attendees)}\n`
  );
}

export function renderEventList(events: GraphEvent[], days: number): string {
  if (events.length === 0) {
    return `📅 No events found in the next ${days} days.`;
  }

  const header = `📅 Found ${events.length} events in the next ${days} days:\n\n`;
  return header + events.map(renderEvent).join('\n');
}

export interface CreatedEventSummary {
  subject: string;
  start: string;
  end: string;
  location?: string;
  attendees?: string[];
}

/**
 * Confirmation for a created event, built from what the caller asked for
 */
export function renderCreatedEvent(summary: CreatedEventSummary): string {
  let text =
    '✅ Calendar event created successfully!\n' +
    `   Title: ${summary.subject}\n` +
    `   When: ${formatWindow(summary.start, summary.end)}`;

  if (summary.location) {
    text += `\n   Location: ${summary.location}`;
  }
  return text + attendeeLine(summary.attendees ?? []);
}
