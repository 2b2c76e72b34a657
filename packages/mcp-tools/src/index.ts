/**
 * @outlook-connector/mcp-tools
 *
 * The Outlook tool catalog and the dispatcher that validates, executes and renders calls.
 *
 * This package provides:
 * - Base tool class deriving MCP schemas and argument normalization from one descriptor
 * - Tool catalog with a stable order
 * - Dispatcher that maps every failure to an error result
 */

export type {
  ArgumentValue,
  DispatcherSession,
  ParameterMap,
  ParameterSpec,
  ParameterType,
  ToolCategory,
  ToolContext,
  ToolDescriptor,
  ToolInvocation,
  ToolResult,
} from './types.js';

export { OutlookTool, createTool, parametersToInputSchema } from './tools/base.js';
export { GetEmailsTool, getEmailsTool } from './tools/mail/index.js';
export {
  GetCalendarEventsTool,
  getCalendarEventsTool,
  CreateCalendarEventTool,
  createCalendarEventTool,
} from './tools/calendar/index.js';
export { getUserInfoTool } from './tools/user/index.js';

export { ToolCatalog, DEFAULT_TOOLS, getToolCatalog, resetToolCatalog } from './registry/index.js';
export { ToolDispatcher, type DispatcherOptions } from './dispatcher.js';
export { ToolArguments, normalizeArguments } from './arguments.js';
export {
  DATETIME_EXAMPLE,
  parseDateTimeArgument,
  formatTimestamp,
  formatWindow,
  lookAheadWindow,
} from './datetime.js';
export * from './render/index.js';
