/**
 * Platform Core - shared utilities for the storefront deployment tooling
 *
 * - Structured logging with correlation tracking
 * - Error base classes and serialization
 * - Environment configuration helpers
 */

export * from './config/index.js';
export * from './error-handling/errors.js';
export * from './logging/index.js';
