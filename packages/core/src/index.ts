/**
 * Core logic for sunrise, sunset and daylight reporting.
 * Each stage takes its inputs and collaborators as parameters; nothing is
 * read from ambient state.
 */

/**
 * Re-export domain types, errors, validation schemas and configuration.
 */
export * from './domain/index.js';

/**
 * Re-export calendar date resolution.
 */
export * from './date/index.js';

/**
 * Re-export location resolution and the IP/geocoding services.
 */
export * from './location/index.js';

/**
 * Re-export time zone resolution.
 */
export * from './zone/index.js';

/**
 * Re-export solar event computation.
 */
export * from './solar/index.js';

/**
 * Re-export output formatting.
 */
export * from './format/index.js';
