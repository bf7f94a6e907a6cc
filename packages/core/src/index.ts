/**
 * @clusterops/core — Shared types, validation schemas, and utilities
 */

export * from './types.js';
export * from './schemas.js';
export * from './constants.js';
export * from './transaction.js';
export * from './errors.js';
export * from './logger.js';
