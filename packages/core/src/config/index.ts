/**
 * Configuration Module
 *
 * Central export for all configuration-related functionality.
 */

export { loadConfig, getConfig, clearConfigCache, deepSubstituteEnvVars } from './loader.js';

export * from './schema.js';

export * from './defaults.js';
