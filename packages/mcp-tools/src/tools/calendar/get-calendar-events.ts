/**
 * Get Calendar Events Tool
 *
 * Lists events starting within the next few days.
 */

import { OutlookTool } from '../base.js';
import type { ToolArguments } from '../../arguments.js';
import { lookAheadWindow } from '../../datetime.js';
import { renderEventList } from '../../render/index.js';
import type { ToolContext } from '../../types.js';

export class GetCalendarEventsTool extends OutlookTool {
  readonly name = 'get_calendar_events';
  readonly description = 'Get upcoming calendar events';
  readonly category = 'calendar' as const;
  readonly parameters = {
    days: {
      type: 'integer',
      description: 'Number of days to look ahead (default: 7)',
      default: 7,
      minimum: 1,
      maximum: 30,
    },
    count: {
      type: 'integer',
      description: 'Maximum number of events (default: 20)',
      default: 20,
      minimum: 1,
      maximum: 50,
    },
  } as const;

  async execute(args: ToolArguments, context: ToolContext): Promise<string> {
    const days = args.integer('days');
    const { start, end } = lookAheadWindow(context.now(), days);

    const events = await context.client.listEvents({ start, end, top: args.integer('count') });
    return renderEventList(events, days);
  }
}

export const getCalendarEventsTool = new GetCalendarEventsTool();
