import { isBreak } from "../projection/project.js";
import type { PixelRect, PlaneBounds, Point } from "../types.js";

/**
 * Fit of a projected plane rectangle into a pixel area at equal x/y scale,
 * centred. Pixel y grows downwards.
 */
export interface PixelMapping {
  scale: number;
  offsetX: number;
  offsetY: number;
  bounds: PlaneBounds;
}

export function planeBoundsOf(...batches: ReadonlyArray<readonly Point[]>): PlaneBounds | null {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const batch of batches) {
    for (const [x, y] of batch) {
      if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  if (!Number.isFinite(minX) || !Number.isFinite(minY)) return null;
  return { minX, maxX, minY, maxY };
}

export function createPixelMapping(bounds: PlaneBounds, area: PixelRect): PixelMapping {
  const spanX = bounds.maxX - bounds.minX;
  const spanY = bounds.maxY - bounds.minY;
  const sx = spanX > 0 ? area.width / spanX : Infinity;
  const sy = spanY > 0 ? area.height / spanY : Infinity;
  let scale = Math.min(sx, sy);
  if (!Number.isFinite(scale) || scale <= 0) scale = 1;
  return {
    scale,
    offsetX: area.x + (area.width - spanX * scale) / 2,
    offsetY: area.y + (area.height - spanY * scale) / 2,
    bounds,
  };
}

export function planeToPixel(mapping: PixelMapping, point: Point): Point {
  if (isBreak(point)) return [NaN, NaN];
  return [
    mapping.offsetX + (point[0] - mapping.bounds.minX) * mapping.scale,
    mapping.offsetY + (mapping.bounds.maxY - point[1]) * mapping.scale,
  ];
}

export function pixelToPlane(mapping: PixelMapping, pixel: Point): Point {
  return [
    (pixel[0] - mapping.offsetX) / mapping.scale + mapping.bounds.minX,
    mapping.bounds.maxY - (pixel[1] - mapping.offsetY) / mapping.scale,
  ];
}

export function pointsToPixels(mapping: PixelMapping, points: readonly Point[]): Point[] {
  return points.map((p) => planeToPixel(mapping, p));
}
