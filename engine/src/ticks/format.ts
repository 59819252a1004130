import type { TickFormatter } from "../types.js";

const MAX_FRACTION_DIGITS = 6;

/**
 * Decimal places needed to show ticks `step` apart without noise,
 * e.g. 30 → 0, 2.5 → 1, 0.25 → 2.
 */
export function fractionDigitsForStep(step: number, cap = MAX_FRACTION_DIGITS): number {
  const abs = Math.abs(step);
  if (!Number.isFinite(abs) || abs === 0) return 0;
  for (let d = 0; d <= cap; d++) {
    const scaled = abs * 10 ** d;
    if (Math.abs(scaled - Math.round(scaled)) <= 1e-9 * Math.max(1, scaled)) return d;
  }
  return cap;
}

function tickStep(values: readonly number[]): number {
  let step = 0;
  for (let i = 1; i < values.length; i++) {
    const d = Math.abs(values[i] - values[i - 1]);
    if (d > 0 && (step === 0 || d < step)) step = d;
  }
  return step;
}

function formatNumber(value: number, digits: number): string {
  const fixed = value.toFixed(digits);
  // toFixed keeps trailing zeros, tick labels do not
  const trimmed = digits > 0 ? fixed.replace(/\.?0+$/, "") : fixed;
  return trimmed === "-0" ? "0" : trimmed;
}

function digitsFor(values: readonly number[]): number {
  let digits = fractionDigitsForStep(tickStep(values));
  for (const v of values) digits = Math.max(digits, Number.isInteger(v) ? 0 : fractionDigitsForStep(v));
  return Math.min(digits, MAX_FRACTION_DIGITS);
}

/** Longitude into (-180, 180]. */
export function wrapLongitude(lon: number): number {
  const wrapped = ((((lon + 180) % 360) + 360) % 360) - 180;
  return wrapped === -180 ? 180 : wrapped;
}

/** "120°W", "0°", "45.5°E", "180°". */
export const formatLongitude: TickFormatter = (values) => {
  const digits = digitsFor(values);
  return values.map((value) => {
    const lon = wrapLongitude(value);
    const text = formatNumber(Math.abs(lon), digits);
    if (text === "0" || text === "180") return `${text}°`;
    return `${text}°${lon > 0 ? "E" : "W"}`;
  });
};

/** "30°N", "0°", "45°S". */
export const formatLatitude: TickFormatter = (values) => {
  const digits = digitsFor(values);
  return values.map((lat) => {
    const text = formatNumber(Math.abs(lat), digits);
    if (text === "0") return "0°";
    return `${text}°${lat > 0 ? "N" : "S"}`;
  });
};

/** Bare numbers with a degree sign, no hemisphere. */
export const formatDegrees: TickFormatter = (values) => {
  const digits = digitsFor(values);
  return values.map((value) => `${formatNumber(value, digits)}°`);
};

export const formatPlain: TickFormatter = (values) => {
  const digits = digitsFor(values);
  return values.map((value) => formatNumber(value, digits));
};
