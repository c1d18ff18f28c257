import { describe, expect, it } from 'vitest';

import { approxEqual, floorTo, roundTo } from '../../src/utils/rounding.js';

describe('floorTo', () => {
  it('rounds toward zero at the requested precision', () => {
    expect(floorTo(85.7142857, 6)).toBe(85.714285);
    expect(floorTo(1234.567, 2)).toBe(1234.56);
    expect(floorTo(0.6, 0)).toBe(0);
  });

  it('absorbs float noise instead of losing a cent', () => {
    expect(0.29 * 100).not.toBe(29);
    expect(floorTo(0.29, 2)).toBe(0.29);
  });
});

describe('roundTo', () => {
  it('rounds half up at the requested precision', () => {
    expect(roundTo(12.345678, 1)).toBe(12.3);
    expect(roundTo(0.125, 2)).toBe(0.13);
  });
});

describe('approxEqual', () => {
  it('compares within an epsilon', () => {
    expect(approxEqual(0.1 + 0.2, 0.3, 1e-9)).toBe(true);
    expect(approxEqual(1, 1.001, 1e-6)).toBe(false);
  });
});
