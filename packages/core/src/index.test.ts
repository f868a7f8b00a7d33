import { describe, it, expect } from 'vitest';
import * as core from './index.js';

describe('core package', () => {
  it('exports each pipeline stage', () => {
    expect(typeof core.resolveDate).toBe('function');
    expect(typeof core.resolveLocation).toBe('function');
    expect(typeof core.resolveZone).toBe('function');
    expect(typeof core.computeSolar).toBe('function');
    expect(typeof core.formatOutput).toBe('function');
  });

  it('runs the offline stages end to end', () => {
    const date = core.resolveDate({ date: '2025-06-21' }, new Date(2025, 0, 1));
    const location = core.coordinatesLocation(78.22, 15.64);
    const zone = core.resolveZone(location, { zonesAt: () => ['Europe/Oslo'] });
    const result = core.computeSolar(date, location, zone);

    expect(result.kind).toBe('all_day');
    expect(core.formatOutput(result, 'brief')).toBe('24:00:00');
  });
});
