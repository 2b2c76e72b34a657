export { GetCalendarEventsTool, getCalendarEventsTool } from './get-calendar-events.js';
export { CreateCalendarEventTool, createCalendarEventTool } from './create-calendar-event.js';
