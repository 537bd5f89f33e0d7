/**
 * Type exports for bioscout.
 */

export * from './results.js';
