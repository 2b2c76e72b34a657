export * from './logger.js';
export * from './config.js';
