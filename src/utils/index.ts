/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Safe JSON parsing
export { safeJsonParse } from './json.js';

// Logging
export {
  type Logger,
  consoleLogger,
  silentLogger,
  logger,
  createComponentLogger,
  setLogLevel,
  toLogger,
} from './logger.js';

// Bounded caching
export { LRUCache, type LRUCacheOptions } from './lru-cache.js';

// Timeouts and cancellation
export { withTimeout, TimeoutError } from './timeout.js';
