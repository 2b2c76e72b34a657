export { renderMessage, renderMessageList } from './mail.js';
export { renderEvent, renderEventList, renderCreatedEvent, type CreatedEventSummary } from './calendar.js';
export { renderUser } from './user.js';
export { renderToolError, REAUTHORIZE_HINT } from './errors.js';
