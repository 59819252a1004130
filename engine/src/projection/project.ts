import type { Position } from "geojson";
import type { GeoTransform, Point } from "../types.js";

/**
 * Break sentinel for batched polylines: distinct lines in one flat `Point[]`
 * are separated by exactly one `[NaN, NaN]`, never leading or trailing.
 * Renderers lift the pen at a break.
 */
export function breakPoint(): Point {
  return [NaN, NaN];
}

export function isBreak(point: Point): boolean {
  return Number.isNaN(point[0]) && Number.isNaN(point[1]);
}

/** Join lines into one batch with a single break between neighbours. */
export function joinWithBreaks(lines: Point[][]): Point[] {
  const out: Point[] = [];
  lines.forEach((line, i) => {
    if (i > 0) out.push(breakPoint());
    for (const p of line) out.push(p);
  });
  return out;
}

/** Split a batch back into its lines; empty runs are dropped. */
export function splitAtBreaks(points: Point[]): Point[][] {
  const lines: Point[][] = [];
  let current: Point[] = [];
  for (const p of points) {
    if (isBreak(p)) {
      if (current.length > 0) lines.push(current);
      current = [];
    } else {
      current.push(p);
    }
  }
  if (current.length > 0) lines.push(current);
  return lines;
}

/**
 * Project a batch pointwise. Order and count are preserved and breaks are
 * copied through without touching the transform.
 */
export function projectPoints(transform: GeoTransform, points: readonly Point[]): Point[] {
  const out = new Array<Point>(points.length);
  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    out[i] = isBreak(p) ? breakPoint() : transform.forward(p);
  }
  return out;
}

export type NestedPositions = Position | NestedPositions[];

/** Project nested GeoJSON coordinate arrays, keeping their shape. */
export function projectCoordinates(transform: GeoTransform, coordinates: NestedPositions): NestedPositions {
  if (isPosition(coordinates)) {
    const [x, y] = transform.forward([coordinates[0], coordinates[1]]);
    return [x, y];
  }
  return coordinates.map((c) => projectCoordinates(transform, c));
}

function isPosition(value: NestedPositions): value is Position {
  return typeof value[0] === "number";
}
