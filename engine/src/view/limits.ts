import { linspace } from "../interpolate.js";
import type { Logger } from "../logger.js";
import type { GeoTransform, LimitRequest, Range, ViewLimits } from "../types.js";

export const DEFAULT_LIMITS: ViewLimits = { xmin: -180, xmax: 180, ymin: -90, ymax: 90 };

const DOMAIN_SAMPLES = 73; // every 5 degrees over a whole-world domain
const ROUND_TRIP_TOLERANCE = 1e-6;

function ordered(a: number, b: number): [number, number] {
  return a <= b ? [a, b] : [b, a];
}

/**
 * Bounds of the part of the transform's domain that it can actually map.
 * A sample counts when its forward image is finite and, where the transform
 * has an inverse, maps back onto itself. Returns null if nothing survives.
 */
export function findTransformLimits(transform: GeoTransform, samples = DOMAIN_SAMPLES): ViewLimits | null {
  const { lon, lat } = transform.domain();
  const lons = linspace(lon[0], lon[1], samples);
  const lats = linspace(lat[0], lat[1], samples);
  let xmin = Infinity;
  let xmax = -Infinity;
  let ymin = Infinity;
  let ymax = -Infinity;
  for (const x of lons) {
    for (const y of lats) {
      const projected = transform.forward([x, y]);
      if (!Number.isFinite(projected[0]) || !Number.isFinite(projected[1])) continue;
      if (transform.inverse) {
        const back = transform.inverse(projected);
        const tolerance = ROUND_TRIP_TOLERANCE * Math.max(1, Math.abs(x), Math.abs(y));
        // At a pole longitude is meaningless and some inverses give NaN latitude.
        const pole = Math.abs(y) >= 90 - tolerance;
        // The antimeridian may come back as its twin on the other side.
        const lonDiff = Math.abs(back[0] - x);
        const lonOk = pole || lonDiff <= tolerance || Math.abs(lonDiff - 360) <= tolerance;
        const latOk = Math.abs(back[1] - y) <= tolerance || (pole && Number.isNaN(back[1]));
        if (!lonOk || !latOk) continue;
      }
      if (x < xmin) xmin = x;
      if (x > xmax) xmax = x;
      if (y < ymin) ymin = y;
      if (y > ymax) ymax = y;
    }
  }
  if (!Number.isFinite(xmin) || !Number.isFinite(ymin)) return null;
  return { xmin, xmax, ymin, ymax };
}

function isFiniteRange(range: Range): boolean {
  return Number.isFinite(range[0]) && Number.isFinite(range[1]);
}

/**
 * Turns lon/lat limit requests into concrete view limits. `resolve` only
 * reads the fallback; the caller `commit`s limits once they are in use.
 */
export class ViewLimitsTracker {
  private previous: ViewLimits;
  private memo: { transform: GeoTransform; limits: ViewLimits | null } | null = null;

  constructor(initial: ViewLimits = DEFAULT_LIMITS, private readonly logger?: Logger) {
    this.previous = { ...initial };
  }

  get current(): ViewLimits {
    return { ...this.previous };
  }

  resolve(lonRequest: LimitRequest, latRequest: LimitRequest, transform: GeoTransform): ViewLimits {
    const auto = lonRequest === "automatic" || latRequest === "automatic" ? this.automatic(transform) : null;

    const x = this.axisRange(lonRequest, auto ? [auto.xmin, auto.xmax] : null, [this.previous.xmin, this.previous.xmax], "lon");
    const y = this.axisRange(latRequest, auto ? [auto.ymin, auto.ymax] : null, [this.previous.ymin, this.previous.ymax], "lat");
    return { xmin: x[0], xmax: x[1], ymin: y[0], ymax: y[1] };
  }

  commit(limits: ViewLimits): void {
    this.previous = { ...limits };
  }

  private axisRange(request: LimitRequest, auto: Range | null, previous: Range, axis: "lon" | "lat"): Range {
    if (request !== "automatic") {
      if (isFiniteRange(request)) return ordered(request[0], request[1]);
      this.logger?.warn(`non-finite ${axis} limits requested, keeping previous`, request);
      return previous;
    }
    if (auto && isFiniteRange(auto)) return ordered(auto[0], auto[1]);
    this.logger?.warn(`automatic ${axis} limits could not be resolved, keeping previous`, previous);
    return previous;
  }

  private automatic(transform: GeoTransform): ViewLimits | null {
    let memo = this.memo;
    if (!memo || memo.transform !== transform) {
      memo = { transform, limits: findTransformLimits(transform) };
      this.memo = memo;
    }
    return memo.limits;
  }
}
