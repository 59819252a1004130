export type Point = [number, number]; // [lon, lat] in input space, [x, y] elsewhere
export type Range = readonly [number, number];

export interface GeoDomain {
  lon: Range;
  lat: Range;
}

/**
 * Forward mapping from lon/lat degrees to a projected plane.
 * Identity is tracked by reference: swapping transforms means swapping objects.
 */
export interface GeoTransform {
  readonly label: string;
  forward(point: Point): Point;
  inverse?(point: Point): Point;
  domain(): GeoDomain;
}

export interface ViewLimits {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

export type LimitRequest = Range | "automatic";

export interface TickSet {
  values: number[];
  labels: string[];
}

export type TickPolicy =
  | { type: "linear"; count: number }
  | { type: "fixed"; values: readonly number[]; labels?: readonly string[] };

export type TickFormatter = (values: readonly number[]) => string[];

export interface SpineLines {
  top: Point[];
  bottom: Point[];
  left: Point[];
  right: Point[];
}

export interface SampledGrid {
  xGrid: Point[];
  yGrid: Point[];
  spines: SpineLines;
}

export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PlaneBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface TextExtent {
  width: number;
  height: number;
}

export type TextMeasurer = (text: string, font: string, fontSize: number) => TextExtent;

export interface LabelStyle {
  pad: number;
  fontSize: number;
  font: string;
  rotation: number; // radians
  visible: boolean;
}

export interface LabelBox {
  x: number; // top-left, pixels
  y: number;
  width: number;
  height: number;
}

export interface OverlapState {
  x: boolean[];
  y: boolean[];
}

export interface LineStyle {
  color?: string;
  width?: number;
  dash?: "solid" | "dashed" | "dotted" | "dashdot";
  opacity?: number;
  label?: string;
}

export interface TextStyle {
  color?: string;
  font?: string;
  fontSize?: number;
  rotation?: number;
}

/**
 * Everything one recompute publishes. Lines are in projected plane units and
 * use the break-separated batch convention; tick points are pixels.
 */
export interface AxisFrame {
  revision: number;
  /** The transform this frame was projected with. */
  transform: GeoTransform;
  limits: ViewLimits;
  xTicks: TickSet;
  yTicks: TickSet;
  grid: { x: Point[]; y: Point[] };
  spines: SpineLines;
  xTickPoints: Point[];
  yTickPoints: Point[];
  xLabelBoxes: LabelBox[];
  yLabelBoxes: LabelBox[];
  visibility: OverlapState;
  planeBounds: PlaneBounds;
  pixelArea: PixelRect;
  xLabelStyle: LabelStyle;
  yLabelStyle: LabelStyle;
}
