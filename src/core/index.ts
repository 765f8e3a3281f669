/**
 * Notebook Grader - Core Module
 */

export * from './types.js';
export * from './config.js';
export * from './logger.js';
export * from './values.js';
