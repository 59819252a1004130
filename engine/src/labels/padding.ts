import { planeToPixel } from "../view/pixelSpace.js";
import type { PixelMapping } from "../view/pixelSpace.js";
import type { GeoTransform, LabelBox, LabelStyle, Point, TextExtent, TextMeasurer } from "../types.js";

export const CHAR_WIDTH = 0.55; // fraction of font size
export const LINE_HEIGHT = 1.2;

/** Fallback measurer for hosts without real text metrics. */
export const approximateTextMeasure: TextMeasurer = (text, _font, fontSize) => ({
  width: text.length * fontSize * CHAR_WIDTH,
  height: fontSize * LINE_HEIGHT,
});

/** Axis-aligned extent of a `width × height` box turned by `rotation` radians. */
export function rotatedExtent(extent: TextExtent, rotation: number): TextExtent {
  const c = Math.abs(Math.cos(rotation));
  const s = Math.abs(Math.sin(rotation));
  return {
    width: extent.width * c + extent.height * s,
    height: extent.width * s + extent.height * c,
  };
}

export interface PadRequest {
  transform: GeoTransform;
  mapping: PixelMapping;
  /** Tick anchor in input space. */
  anchor: Point;
  /** Outward direction in input space, e.g. [0, -1] for labels under the frame. */
  outward: Point;
  /** Finite-difference step, in input units. */
  step: number;
  /** Pixel direction used when the transform gives no usable one. */
  fallback: Point;
  text: string;
  style: LabelStyle;
  measure: TextMeasurer;
}

export interface PlacedLabel {
  anchor: Point; // pixels
  position: Point; // label centre, pixels
  box: LabelBox;
}

function unit(dx: number, dy: number): Point | null {
  const length = Math.hypot(dx, dy);
  if (!Number.isFinite(length) || length < 1e-12) return null;
  return [dx / length, dy / length];
}

function toPixel(request: PadRequest, point: Point): Point {
  return planeToPixel(request.mapping, request.transform.forward(point));
}

/**
 * Pixel direction pointing away from the frame at the anchor. Steps inward,
 * which stays inside the view, and flips the result; if the transform cannot
 * map that point, steps outward instead.
 */
export function outwardPixelDirection(request: PadRequest, anchorPixel: Point): Point {
  const { anchor, outward, step } = request;
  const inside = toPixel(request, [anchor[0] - outward[0] * step, anchor[1] - outward[1] * step]);
  const fromInside = unit(anchorPixel[0] - inside[0], anchorPixel[1] - inside[1]);
  if (fromInside) return fromInside;
  const outside = toPixel(request, [anchor[0] + outward[0] * step, anchor[1] + outward[1] * step]);
  return unit(outside[0] - anchorPixel[0], outside[1] - anchorPixel[1]) ?? request.fallback;
}

/**
 * Place one tick label outside the frame. The centre moves along the outward
 * pixel direction by the base pad plus the distance from the centre of the
 * rotated label box to its edge along that direction.
 */
export function directionalPad(request: PadRequest): PlacedLabel {
  const anchorPixel = toPixel(request, request.anchor);
  const { width, height } = rotatedExtent(
    request.measure(request.text, request.style.font, request.style.fontSize),
    request.style.rotation
  );
  const [ux, uy] = outwardPixelDirection(request, anchorPixel);
  const reach = Math.min(
    Math.abs(ux) > 1e-12 ? width / 2 / Math.abs(ux) : Infinity,
    Math.abs(uy) > 1e-12 ? height / 2 / Math.abs(uy) : Infinity
  );
  const distance = request.style.pad + (Number.isFinite(reach) ? reach : 0);
  const position: Point = [anchorPixel[0] + ux * distance, anchorPixel[1] + uy * distance];
  return {
    anchor: anchorPixel,
    position,
    box: { x: position[0] - width / 2, y: position[1] - height / 2, width, height },
  };
}
