/**
 * Percentage return between the first and last non-null close of a window.
 * Fewer than two usable closes yields 0 rather than an error.
 */
export function sixMonthReturn(closes: ReadonlyArray<number | null | undefined>): number {
  const usable = closes.filter((c): c is number => typeof c === 'number' && Number.isFinite(c));
  if (usable.length < 2) return 0;

  const first = usable[0];
  const last = usable[usable.length - 1];
  if (first === 0) return 0;

  return ((last - first) / first) * 100;
}
