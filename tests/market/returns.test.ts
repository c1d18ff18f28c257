import { describe, expect, it } from 'vitest';

import { sixMonthReturn } from '../../src/market/returns.js';

describe('sixMonthReturn', () => {
  it('measures first to last close, skipping gaps', () => {
    expect(sixMonthReturn([100, null, 150])).toBe(50);
    expect(sixMonthReturn([200, 190, null, 150])).toBe(-25);
  });

  it('returns 0 with fewer than two usable closes', () => {
    expect(sixMonthReturn([100])).toBe(0);
    expect(sixMonthReturn([null, 100, null])).toBe(0);
    expect(sixMonthReturn([])).toBe(0);
  });

  it('returns 0 instead of dividing by a zero first close', () => {
    expect(sixMonthReturn([0, 10])).toBe(0);
  });

  it('ignores non-finite values', () => {
    expect(sixMonthReturn([Number.NaN, 80, 100])).toBe(25);
  });
});
