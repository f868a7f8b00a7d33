/**
 * Output rendering for solar results.
 */

export * from './zoned.js';
export * from './formatOutput.js';
