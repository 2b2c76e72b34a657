/**
 * @outlook-connector/integrations
 *
 * Microsoft Graph access for the Outlook connector: the bearer credential store, the
 * REST client and the one-time authorization flow.
 */

export * from './graph/index.js';
