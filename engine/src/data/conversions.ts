import { geoBounds } from "d3-geo";
import type { Feature, FeatureCollection, Geometry, Position } from "geojson";
import { joinWithBreaks } from "../projection/project.js";
import type { Point, ViewLimits } from "../types.js";

export type GeoJsonInput = FeatureCollection | Feature | Geometry;

function toPoint(position: Position): Point {
  return [position[0], position[1]];
}

function geometriesOf(input: GeoJsonInput): Geometry[] {
  switch (input.type) {
    case "FeatureCollection":
      return input.features.flatMap((f) => geometriesOf(f));
    case "Feature":
      return input.geometry ? geometriesOf(input.geometry) : [];
    case "GeometryCollection":
      return input.geometries.flatMap((g) => geometriesOf(g));
    default:
      return [input];
  }
}

function linesOf(geometry: Geometry): Point[][] {
  switch (geometry.type) {
    case "LineString":
      return [geometry.coordinates.map(toPoint)];
    case "MultiLineString":
    case "Polygon":
      return geometry.coordinates.map((line) => line.map(toPoint));
    case "MultiPolygon":
      return geometry.coordinates.flatMap((polygon) => polygon.map((ring) => ring.map(toPoint)));
    default:
      return [];
  }
}

/** Every line and polygon ring as one break-separated batch. Points are left out. */
export function geoJsonToLines(input: GeoJsonInput): Point[] {
  return joinWithBreaks(geometriesOf(input).flatMap(linesOf).filter((line) => line.length > 0));
}

export function geoJsonToPoints(input: GeoJsonInput): Point[] {
  return geometriesOf(input).flatMap((geometry) => {
    if (geometry.type === "Point") return [toPoint(geometry.coordinates)];
    if (geometry.type === "MultiPoint") return geometry.coordinates.map(toPoint);
    return [];
  });
}

/**
 * Spherical lon/lat bounds of a GeoJSON object. Inputs spanning the
 * antimeridian get the full longitude range.
 */
export function geoJsonLimits(input: GeoJsonInput): ViewLimits | null {
  const [[west, south], [east, north]] = geoBounds(input);
  if (![west, south, east, north].every(Number.isFinite)) return null;
  return west <= east
    ? { xmin: west, xmax: east, ymin: south, ymax: north }
    : { xmin: -180, xmax: 180, ymin: south, ymax: north };
}
