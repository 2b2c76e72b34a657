/**
 * @outlook-connector/core
 *
 * Shared configuration, logging and error types for the Outlook connector.
 */

export * from './config/index.js';

export * from './logger/index.js';

export * from './errors.js';

export * from './utils/index.js';
