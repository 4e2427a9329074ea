/**
 * @baton/core - shared foundation
 *
 * Configuration, structured errors, logging and small utilities used by the
 * protocol and orchestration packages.
 */

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logger
export * from './logger/index.js';

// Utils
export * from './utils/index.js';
