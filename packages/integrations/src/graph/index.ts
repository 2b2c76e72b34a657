/**
 * Microsoft Graph Integration
 */

export * from './types.js';
export * from './credentials.js';
export * from './client.js';
export * from './oauth.js';
