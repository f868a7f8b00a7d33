/**
 * Time zone resolution from coordinates.
 */

export * from './resolveZone.js';
export * from './offset.js';
