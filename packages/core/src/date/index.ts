/**
 * Calendar date resolution.
 */

export * from './calendar.js';
export * from './resolveDate.js';
