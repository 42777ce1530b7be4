/**
 * Logging Module - Index
 *
 * Exports all logging functionality for platform-core
 */

// Types
export * from './types.js';

// Core logger
export * from './logger.js';

// Formatting utilities
export * from './formatting.js';

// Correlation context
export * from './correlation.js';

// Error serialization for logging
export * from './error-serializer.js';
