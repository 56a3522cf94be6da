/**
 * @docsync/core
 * Errors, logging, configuration and shared utilities for docsync
 */

// Errors
export * from './error/docsync-error.js';

// Logging
export * from './logging/logger.js';

// Configuration
export * from './config/schema.js';
export * from './config/load-config.js';

// Utils
export * from './utils/concurrency.js';

// Feedback
export * from './feedback/file-rotation.js';
export * from './feedback/feedback-store.js';
