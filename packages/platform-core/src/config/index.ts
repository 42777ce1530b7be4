/**
 * Configuration Module
 */

export * from './environment-config.js';
