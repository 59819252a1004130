import type { Point } from "../types.js";

export type Face = [number, number, number];

export interface TriangulatedGrid {
  points: Point[];
  faces: Face[];
}

/**
 * Lon/lat grid as points (longitude varying fastest) and two triangles per
 * cell, indices 0-based. No handling of the poles or the antimeridian.
 */
export function triangulatedGrid(lons: readonly number[], lats: readonly number[]): TriangulatedGrid {
  const nx = lons.length;
  const ny = lats.length;
  const points: Point[] = [];
  for (const lat of lats) {
    for (const lon of lons) points.push([lon, lat]);
  }
  const faces: Face[] = [];
  for (let j = 0; j < ny - 1; j++) {
    for (let i = 0; i < nx - 1; i++) {
      const c = j * nx + i;
      faces.push([c, c + 1, c + nx + 1], [c, c + nx, c + nx + 1]);
    }
  }
  return { points, faces };
}
