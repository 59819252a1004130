import proj4 from "proj4";
import type { GeoProjection } from "d3-geo";
import { InvalidProjectionError } from "../errors.js";
import { Observable } from "../reactive/observable.js";
import type { Listener } from "../reactive/observable.js";
import type { GeoDomain, GeoTransform, Point } from "../types.js";

export const DEFAULT_SOURCE = "+proj=longlat +datum=WGS84";
export const DEFAULT_DEST = "+proj=eqearth";

export const WORLD_DOMAIN: GeoDomain = { lon: [-180, 180], lat: [-90, 90] };

interface PointConverter {
  forward(coordinates: number[]): number[];
  inverse(coordinates: number[]): number[];
}

/**
 * proj4 rejects non-finite input and may fail on points its projection
 * cannot represent; both come back as a NaN point.
 */
function convert(fn: (coordinates: number[]) => number[], a: number, b: number): Point {
  if (!Number.isFinite(a) || !Number.isFinite(b)) return [NaN, NaN];
  let out: number[] | null | undefined;
  try {
    out = fn([a, b]);
  } catch (err) {
    return [NaN, NaN];
  }
  if (!out || out.length < 2) return [NaN, NaN];
  return [out[0], out[1]];
}

/** Central longitude from a `+lon_0=` parameter, 0 when absent. */
export function centralLongitude(definition: string): number {
  const match = /\+lon_0=(-?\d+(?:\.\d+)?)/.exec(definition);
  return match ? Number(match[1]) : 0;
}

/**
 * Transform between two CRS definitions via proj4, axis order always lon/lat.
 * The longitude domain follows the destination's central longitude.
 */
export function createProjTransform(source: string, dest: string, domain?: GeoDomain): GeoTransform {
  let converter: PointConverter;
  try {
    converter = proj4(source, dest);
  } catch (err) {
    throw new InvalidProjectionError(`${source} -> ${dest}`, err);
  }
  const lon0 = centralLongitude(dest);
  const resolvedDomain: GeoDomain = domain ?? { lon: [lon0 - 180, lon0 + 180], lat: WORLD_DOMAIN.lat };
  return {
    label: `${source} -> ${dest}`,
    forward: ([lon, lat]) => convert((c) => converter.forward(c), lon, lat),
    inverse: ([x, y]) => convert((c) => converter.inverse(c), x, y),
    domain: () => resolvedDomain,
  };
}

/**
 * Wrap a d3-geo projection. d3 projects to screen orientation (y down); the
 * plane here has north up, so y is negated both ways.
 */
export function createGeoProjectionTransform(
  projection: GeoProjection,
  domain: GeoDomain = WORLD_DOMAIN,
  label = "d3-geo projection"
): GeoTransform {
  const transform: GeoTransform = {
    label,
    forward([lon, lat]) {
      const out = projection([lon, lat]);
      return out ? [out[0], -out[1]] : [NaN, NaN];
    },
    domain: () => domain,
  };
  if (projection.invert) {
    transform.inverse = ([x, y]) => {
      const out = projection.invert?.([x, -y]);
      return out ? [out[0], out[1]] : [NaN, NaN];
    };
  }
  return transform;
}

export function identityTransform(domain: GeoDomain = WORLD_DOMAIN): GeoTransform {
  return {
    label: "identity",
    forward: ([x, y]) => [x, y],
    inverse: ([x, y]) => [x, y],
    domain: () => domain,
  };
}

/** Holds the axis's current transform and tells dependents when it is replaced. */
export class TransformHolder {
  readonly observable: Observable<GeoTransform>;

  constructor(initial: GeoTransform) {
    this.observable = new Observable(initial);
  }

  get(): GeoTransform {
    return this.observable.value;
  }

  set(transform: GeoTransform): void;
  set(source: string, dest: string): void;
  set(next: GeoTransform | string, dest: string = DEFAULT_DEST): void {
    this.observable.set(typeof next === "string" ? createProjTransform(next, dest) : next);
  }

  subscribe(listener: Listener<GeoTransform>): () => void {
    return this.observable.subscribe(listener);
  }
}
