// src/lib/numbers.ts

/** Working hours in one workday; also the fixed length of an all-day event. */
export const HOURS_PER_DAY = 8;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export const roundHours = (value: number) => roundTo(value, 2);

/** numerator / denominator as a percentage with one decimal; 0 when the denominator is not positive. */
export function percentOf(numerator: number, denominator: number): number {
  if (!(denominator > 0)) return 0;
  return roundTo((numerator / denominator) * 100, 1);
}
