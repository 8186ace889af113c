/**
 * @relayarr/utils
 * 
 * Shared utilities package containing:
 * - Structured logger
 * - Retry logic
 * - Keyed lock
 * - Error messages
 * - Time and size formatting
 */

// Retry logic
export { retry, backoffDelay, type RetryOptions } from './retry.js';

// Per-key mutual exclusion
export { KeyedLock } from './keyedLock.js';

// Error messages
export { errorMessage } from './guards.js';

// Time utilities
export {
  sleep,
  formatClock,
  formatRfc822,
} from './time.js';

// Sizes
export { KIB, MIB, GIB, formatSize, toMegabytes } from './size.js';

// Logger
export { logger, loggerOptions, createLogger, type Logger } from './logger.js';
