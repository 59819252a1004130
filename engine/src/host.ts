import type { Observable } from "./reactive/observable.js";
import type { LineStyle, PixelRect, Point, TextMeasurer, TextStyle } from "./types.js";

export type DrawableKind = "lines" | "scatter" | "text";

/** Handle to something the host draws. The axis owns it and hands it back to `remove`. */
export interface Drawable {
  readonly kind: DrawableKind;
}

export interface TextItem {
  text: string;
  position: Point; // label centre, pixels
  visible: boolean;
}

/**
 * What the axis needs from the scene it is drawn into. Point sources are in
 * pixels, y down, with `[NaN, NaN]` separating lines of one batch. Every
 * source and visibility flag belongs to the axis; the host only reads them.
 */
export interface AxisHost {
  readonly pixelArea: Observable<PixelRect>;
  measureText: TextMeasurer;
  createLines(points: Observable<Point[]>, style: LineStyle, visible: Observable<boolean>): Drawable;
  createScatter(points: Observable<Point[]>, style: LineStyle, visible: Observable<boolean>): Drawable;
  /** `style` changes together with `items` whenever the label font, size or rotation changes. */
  createText(items: Observable<TextItem[]>, style: Observable<TextStyle>, visible: Observable<boolean>): Drawable;
  remove(drawable: Drawable): void;
}
