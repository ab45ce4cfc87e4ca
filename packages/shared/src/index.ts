/**
 * graphdoc Shared Types and Utilities
 *
 * Canonical shapes, error taxonomy, and helpers used across graphdoc packages.
 */

export * from './types.js';
export * from './errors.js';
export * from './standardize.js';
export * from './logger.js';
export * from './mcp-utils.js';
