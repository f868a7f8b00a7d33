/**
 * Wrapper for suncalc to handle CommonJS import in ESM environment.
 */
import { createRequire } from 'module';
import type * as SunCalc from 'suncalc';

const require = createRequire(import.meta.url);
const suncalc: typeof SunCalc = require('suncalc');

export type SunTimes = ReturnType<typeof SunCalc.getTimes>;

export const getTimes = suncalc.getTimes.bind(suncalc);
export const getPosition = suncalc.getPosition.bind(suncalc);
