/**
 * Solar event computation.
 */

export type { SunTimes } from './suncalc-wrapper.js';
export * from './computeSolar.js';
