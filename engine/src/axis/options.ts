import { GeoAxisConfigError } from "../errors.js";
import { isValidDensity, MAX_LINE_DENSITY, MIN_LINE_DENSITY } from "../grid/sampler.js";
import { consoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { DEFAULT_DEST, DEFAULT_SOURCE } from "../projection/transform.js";
import { formatLatitude, formatLongitude } from "../ticks/format.js";
import { linearTicks } from "../ticks/ticks.js";
import { isCoastlineResolution } from "../data/coastlines.js";
import type { CoastlineResolution } from "../data/coastlines.js";
import type { StyleRule } from "./style.js";
import type { GeoTransform, LimitRequest, LineStyle, TickFormatter, TickPolicy } from "../types.js";

export interface GeoAxisOptions {
  source: string;
  dest: string;
  /** Takes precedence over `source`/`dest`. */
  transformation?: GeoTransform;
  lonlims: LimitRequest;
  latlims: LimitRequest;
  coastlines: boolean;
  coastlineResolution: CoastlineResolution;
  coastlineAttributes: LineStyle;
  lineDensity: number;
  removeOverlappingTicks: boolean;
  xticks: TickPolicy;
  yticks: TickPolicy;
  xtickformat: TickFormatter;
  ytickformat: TickFormatter;
  xticklabelpad: number;
  yticklabelpad: number;
  xticklabelsize: number;
  yticklabelsize: number;
  ticklabelfont: string;
  xticklabelrotation: number;
  yticklabelrotation: number;
  xticklabelcolor: string;
  yticklabelcolor: string;
  xticklabelsvisible: boolean;
  yticklabelsvisible: boolean;
  xgridvisible: boolean;
  ygridvisible: boolean;
  gridstyle: LineStyle;
  topspinevisible: boolean;
  bottomspinevisible: boolean;
  leftspinevisible: boolean;
  rightspinevisible: boolean;
  spinestyle: LineStyle;
  styleRules: StyleRule[];
  logger: Logger;
}

export const DEFAULT_GEOAXIS_OPTIONS: GeoAxisOptions = {
  source: DEFAULT_SOURCE,
  dest: DEFAULT_DEST,
  lonlims: [-180, 180],
  latlims: [-90, 90],
  coastlines: false,
  coastlineResolution: "110m",
  coastlineAttributes: { color: "black", width: 1, label: "Coastlines" },
  lineDensity: 1000,
  removeOverlappingTicks: true,
  xticks: linearTicks(7),
  yticks: linearTicks(7),
  xtickformat: formatLongitude,
  ytickformat: formatLatitude,
  xticklabelpad: 5,
  yticklabelpad: 5,
  xticklabelsize: 14,
  yticklabelsize: 14,
  ticklabelfont: "sans-serif",
  xticklabelrotation: 0,
  yticklabelrotation: 0,
  xticklabelcolor: "black",
  yticklabelcolor: "black",
  xticklabelsvisible: true,
  yticklabelsvisible: true,
  xgridvisible: true,
  ygridvisible: true,
  gridstyle: { color: "rgba(0,0,0,0.12)", width: 1 },
  topspinevisible: true,
  bottomspinevisible: true,
  leftspinevisible: true,
  rightspinevisible: true,
  spinestyle: { color: "black", width: 1 },
  styleRules: [],
  logger: consoleLogger,
};

export function validateLimitRequest(option: string, request: LimitRequest): void {
  if (request === "automatic") return;
  const [min, max] = request;
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new GeoAxisConfigError(option, `limits must be finite, got [${min}, ${max}]`);
  }
  if (min > max) throw new GeoAxisConfigError(option, `limits are inverted: [${min}, ${max}]`);
}

function checkNonNegative(option: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new GeoAxisConfigError(option, `must be a finite number >= 0, got ${value}`);
  }
}

/** Defaults merged with `options`, rejecting values that can never draw. */
export function resolveGeoAxisOptions(options: Partial<GeoAxisOptions> = {}): GeoAxisOptions {
  const resolved: GeoAxisOptions = { ...DEFAULT_GEOAXIS_OPTIONS, ...options };
  if (!isValidDensity(resolved.lineDensity)) {
    throw new GeoAxisConfigError(
      "lineDensity",
      `must be an integer in [${MIN_LINE_DENSITY}, ${MAX_LINE_DENSITY}], got ${resolved.lineDensity}`
    );
  }
  validateLimitRequest("lonlims", resolved.lonlims);
  validateLimitRequest("latlims", resolved.latlims);
  checkNonNegative("xticklabelpad", resolved.xticklabelpad);
  checkNonNegative("yticklabelpad", resolved.yticklabelpad);
  checkNonNegative("xticklabelsize", resolved.xticklabelsize);
  checkNonNegative("yticklabelsize", resolved.yticklabelsize);
  if (!isCoastlineResolution(resolved.coastlineResolution)) {
    throw new GeoAxisConfigError("coastlineResolution", `unknown resolution "${resolved.coastlineResolution}"`);
  }
  return resolved;
}
