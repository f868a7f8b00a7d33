/**
 * Location resolution and the network services behind it.
 */

export * from './services.js';
export * from './http.js';
export * from './ipinfo.js';
export * from './nominatim.js';
export * from './resolveLocation.js';
