/**
 * Create Calendar Event Tool
 *
 * The only tool that changes the mailbox. Times are wall-clock times in the configured
 * zone and reach Graph in canonical form.
 */

import { OutlookTool } from '../base.js';
import type { ToolArguments } from '../../arguments.js';
import { renderCreatedEvent } from '../../render/index.js';
import type { ToolContext } from '../../types.js';

export class CreateCalendarEventTool extends OutlookTool {
  readonly name = 'create_calendar_event';
  readonly description = 'Create a new calendar event';
  readonly category = 'calendar' as const;
  readonly parameters = {
    subject: {
      type: 'string',
      description: 'Event title',
      required: true,
    },
    start_time: {
      type: 'datetime',
      description: 'Start time in ISO format (e.g., 2025-08-14T14:00:00)',
      required: true,
    },
    end_time: {
      type: 'datetime',
      description: 'End time in ISO format',
      required: true,
    },
    location: {
      type: 'string',
      description: 'Event location (optional)',
    },
    description: {
      type: 'string',
      description: 'Event description (optional)',
    },
    attendees: {
      type: 'string[]',
      description: 'Attendee email addresses (optional)',
    },
  } as const;

  async execute(args: ToolArguments, context: ToolContext): Promise<string> {
    const summary = {
      subject: args.string('subject'),
      start: args.string('start_time'),
      end: args.string('end_time'),
      location: args.optionalString('location'),
      attendees: args.stringList('attendees'),
    };

    await context.client.createEvent({
      ...summary,
      body: args.optionalString('description'),
    });

    return renderCreatedEvent(summary);
  }
}

export const createCalendarEventTool = new CreateCalendarEventTool();
