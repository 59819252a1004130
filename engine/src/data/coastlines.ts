import { createRequire } from "node:module";
import { mesh } from "topojson-client";
import type { Objects, Topology } from "topojson-specification";
import { joinWithBreaks } from "../projection/project.js";
import type { Point } from "../types.js";

export type CoastlineResolution = "110m" | "50m" | "10m";
export function isCoastlineResolution(value: string): value is CoastlineResolution {
  return value === "110m" || value === "50m" || value === "10m";
}

const require = createRequire(import.meta.url);
const cache = new Map<CoastlineResolution, Point[]>();

export function isTopology(value: unknown): value is Topology<Objects> {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || value.type !== "Topology") return false;
  return "objects" in value && typeof value.objects === "object" && "arcs" in value && Array.isArray(value.arcs);
}

function loadLandTopology(resolution: CoastlineResolution): Topology<Objects> {
  let data: unknown;
  try {
    data = require(`world-atlas/land-${resolution}.json`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to load coastline dataset ${resolution}. ${message}`);
  }
  if (!isTopology(data)) throw new Error(`Coastline dataset ${resolution} is not a TopoJSON topology`);
  return data;
}

/**
 * Outline of the Natural Earth land polygons as one lon/lat batch, lines
 * separated by `[NaN, NaN]`. Cached per resolution.
 */
export function loadCoastlines(resolution: CoastlineResolution = "110m"): Point[] {
  const cached = cache.get(resolution);
  if (cached) return cached;
  const topology = loadLandTopology(resolution);
  const land = topology.objects.land;
  if (!land) throw new Error(`Coastline dataset ${resolution} has no "land" object`);
  const outline = mesh(topology, land);
  const lines = outline.coordinates.map((line) => line.map((p): Point => [p[0], p[1]]));
  const batch = joinWithBreaks(lines);
  cache.set(resolution, batch);
  return batch;
}
