/**
 * @netlens/core - Core package for the NetLens assistant gateway
 *
 * Re-exports configuration, logging and shared utilities.
 */

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, type Logger } from './logger.js';

// Utilities
export {
  sleep,
  truncate,
  collapseWhitespace,
  hash,
  isPlainObject,
} from './utils/index.js';
