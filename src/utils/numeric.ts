/**
 * Null-aware numeric helpers shared by indicators and ratios.
 * `null` always means "no value"; these helpers never turn it into 0.
 */

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  return value;
}

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Divides when both operands are present and the denominator is non-zero.
 */
export function safeDivide(
  numerator: number | null | undefined,
  denominator: number | null | undefined
): number | null {
  const a = toFiniteNumber(numerator);
  const b = toFiniteNumber(denominator);
  if (a === null || b === null || b === 0) return null;
  return toFiniteNumber(a / b);
}

export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function lastValue<T>(series: ReadonlyArray<T | null>): T | null {
  return series.length > 0 ? series[series.length - 1] : null;
}
