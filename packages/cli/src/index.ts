/**
 * Command-line entry points for the daylight tool.
 */

export * from './args.js';
export * from './run.js';
