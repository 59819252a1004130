import { linspace } from "../interpolate.js";
import { breakPoint } from "../projection/project.js";
import type { Point, Range, SampledGrid, SpineLines } from "../types.js";

export const MIN_LINE_DENSITY = 2;
export const MAX_LINE_DENSITY = 10_000;

export function isValidDensity(density: number): boolean {
  return Number.isInteger(density) && density >= MIN_LINE_DENSITY && density <= MAX_LINE_DENSITY;
}

/** Entries in one batched grid sequence: K lines of D points and K-1 breaks. */
export function gridSequenceLength(tickCount: number, density: number): number {
  return tickCount > 0 ? tickCount * (density + 1) - 1 : 0;
}

/**
 * One batch of lines, each `density` points long. `at(value, s)` places the
 * s-th sample of the line for tick `value`.
 */
function batchLines(
  tickValues: readonly number[],
  samples: readonly number[],
  at: (value: number, s: number) => Point
): Point[] {
  const density = samples.length;
  const out = new Array<Point>(gridSequenceLength(tickValues.length, density));
  let index = 0;
  tickValues.forEach((value, t) => {
    if (t > 0) out[index++] = breakPoint();
    for (const s of samples) out[index++] = at(value, s);
  });
  return out;
}

export function sampleSpines(xLimits: Range, yLimits: Range, density: number): SpineLines {
  const xs = linspace(xLimits[0], xLimits[1], density);
  const ys = linspace(yLimits[0], yLimits[1], density);
  return {
    top: xs.map((x): Point => [x, yLimits[1]]),
    bottom: xs.map((x): Point => [x, yLimits[0]]),
    left: ys.map((y): Point => [xLimits[0], y]),
    right: ys.map((y): Point => [xLimits[1], y]),
  };
}

/**
 * Input-space samples for every gridline and the four spines.
 * x ticks give vertical lines across yLimits, y ticks horizontal lines
 * across xLimits; all lines and spines carry `density` points.
 */
export function sampleGrid(
  xLimits: Range,
  yLimits: Range,
  xTicks: readonly number[],
  yTicks: readonly number[],
  density: number
): SampledGrid {
  const xs = linspace(xLimits[0], xLimits[1], density);
  const ys = linspace(yLimits[0], yLimits[1], density);
  return {
    xGrid: batchLines(xTicks, ys, (x, y) => [x, y]),
    yGrid: batchLines(yTicks, xs, (y, x) => [x, y]),
    spines: sampleSpines(xLimits, yLimits, density),
  };
}
