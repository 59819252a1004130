import { geoJsonToLines } from "../data/conversions.js";
import type { GeoJsonInput } from "../data/conversions.js";
import { loadCoastlines } from "../data/coastlines.js";
import type { AxisHost, Drawable, TextItem } from "../host.js";
import type { Logger } from "../logger.js";
import { projectPoints } from "../projection/project.js";
import { createProjTransform, TransformHolder } from "../projection/transform.js";
import { lift, Observable } from "../reactive/observable.js";
import { createPixelMapping, pixelToPlane, pointsToPixels } from "../view/pixelSpace.js";
import type { PixelMapping } from "../view/pixelSpace.js";
import { GeoTickEngine } from "./engine.js";
import { COASTLINE_Z, DECORATION_Z, LayerStack, PLOT_Z } from "./layers.js";
import type { AxisLayer } from "./layers.js";
import { resolveGeoAxisOptions, validateLimitRequest } from "./options.js";
import type { GeoAxisOptions } from "./options.js";
import { resolveLineStyle } from "./style.js";
import type { DecorationTarget } from "./style.js";
import type {
  AxisFrame,
  GeoTransform,
  LabelStyle,
  LimitRequest,
  LineStyle,
  Point,
  SpineLines,
  TextStyle,
  TickFormatter,
  TickPolicy,
  ViewLimits,
} from "../types.js";

export interface PlotOptions {
  id?: string;
  zIndex?: number;
  /** Count this plot towards `datalims()`. Defaults to true. */
  autolimits?: boolean;
}

function mappingOf(frame: AxisFrame): PixelMapping {
  return createPixelMapping(frame.planeBounds, frame.pixelArea);
}

function labelItems(labels: readonly string[], positions: readonly Point[], visible: readonly boolean[]): TextItem[] {
  return labels.map((text, i) => ({ text, position: positions[i], visible: visible[i] }));
}

function sameTextStyle(a: TextStyle, b: TextStyle): boolean {
  return a.color === b.color && a.font === b.font && a.fontSize === b.fontSize && a.rotation === b.rotation;
}

type SpineVisibility = "topspinevisible" | "bottomspinevisible" | "leftspinevisible" | "rightspinevisible";

const SPINES: ReadonlyArray<[DecorationTarget, keyof SpineLines, SpineVisibility]> = [
  ["topspine", "top", "topspinevisible"],
  ["bottomspine", "bottom", "bottomspinevisible"],
  ["leftspine", "left", "leftspinevisible"],
  ["rightspine", "right", "rightspinevisible"],
];

/**
 * A plotting axis for lon/lat data. Everything added to it is drawn through
 * the current projection, framed by projected gridlines, spines and tick
 * labels that follow every change of limits, projection or tick settings.
 */
export class GeoAxis {
  readonly transform: TransformHolder;
  readonly lonlims: Observable<LimitRequest>;
  readonly latlims: Observable<LimitRequest>;
  readonly xticks: Observable<TickPolicy>;
  readonly yticks: Observable<TickPolicy>;
  readonly xtickformat: Observable<TickFormatter>;
  readonly ytickformat: Observable<TickFormatter>;
  readonly lineDensity: Observable<number>;
  readonly removeOverlappingTicks: Observable<boolean>;
  readonly xLabelStyle: Observable<LabelStyle>;
  readonly yLabelStyle: Observable<LabelStyle>;
  readonly xgridvisible: Observable<boolean>;
  readonly ygridvisible: Observable<boolean>;
  readonly topspinevisible: Observable<boolean>;
  readonly bottomspinevisible: Observable<boolean>;
  readonly leftspinevisible: Observable<boolean>;
  readonly rightspinevisible: Observable<boolean>;
  readonly engine: GeoTickEngine;

  private readonly options: GeoAxisOptions;
  private readonly logger: Logger;
  private readonly stack = new LayerStack();
  private readonly disposers: Array<() => void> = [];
  private nextPlotId = 1;
  private destroyed = false;

  constructor(private readonly host: AxisHost, options: Partial<GeoAxisOptions> = {}) {
    const o = resolveGeoAxisOptions(options);
    this.options = o;
    this.logger = o.logger;
    this.transform = new TransformHolder(o.transformation ?? createProjTransform(o.source, o.dest));
    this.lonlims = new Observable(o.lonlims);
    this.latlims = new Observable(o.latlims);
    this.xticks = new Observable(o.xticks);
    this.yticks = new Observable(o.yticks);
    this.xtickformat = new Observable(o.xtickformat);
    this.ytickformat = new Observable(o.ytickformat);
    this.lineDensity = new Observable(o.lineDensity);
    this.removeOverlappingTicks = new Observable(o.removeOverlappingTicks);
    this.xLabelStyle = new Observable<LabelStyle>({
      pad: o.xticklabelpad,
      fontSize: o.xticklabelsize,
      font: o.ticklabelfont,
      rotation: o.xticklabelrotation,
      visible: o.xticklabelsvisible,
    });
    this.yLabelStyle = new Observable<LabelStyle>({
      pad: o.yticklabelpad,
      fontSize: o.yticklabelsize,
      font: o.ticklabelfont,
      rotation: o.yticklabelrotation,
      visible: o.yticklabelsvisible,
    });
    this.xgridvisible = new Observable(o.xgridvisible);
    this.ygridvisible = new Observable(o.ygridvisible);
    this.topspinevisible = new Observable(o.topspinevisible);
    this.bottomspinevisible = new Observable(o.bottomspinevisible);
    this.leftspinevisible = new Observable(o.leftspinevisible);
    this.rightspinevisible = new Observable(o.rightspinevisible);

    this.engine = new GeoTickEngine(
      {
        transform: this.transform,
        lonlims: this.lonlims,
        latlims: this.latlims,
        xticks: this.xticks,
        yticks: this.yticks,
        xtickformat: this.xtickformat,
        ytickformat: this.ytickformat,
        pixelArea: host.pixelArea,
        lineDensity: this.lineDensity,
        removeOverlappingTicks: this.removeOverlappingTicks,
        xLabelStyle: this.xLabelStyle,
        yLabelStyle: this.yLabelStyle,
      },
      { measureText: host.measureText, logger: this.logger }
    );

    this.addDecorations();
    if (o.coastlines) this.addCoastlines();
  }

  /** Current resolved view limits in lon/lat. */
  get limits(): ViewLimits {
    return this.engine.frame.limits;
  }

  /** Apply several changes and recompute the frame once. */
  batch<R>(fn: () => R): R {
    return this.engine.batch(fn);
  }

  setProjection(source: string, dest: string): void {
    this.transform.set(createProjTransform(source, dest));
  }

  setTransformation(transform: GeoTransform): void {
    this.transform.set(transform);
  }

  xlims(min: number, max: number): void {
    validateLimitRequest("lonlims", [min, max]);
    this.lonlims.set([min, max]);
  }

  ylims(min: number, max: number): void {
    validateLimitRequest("latlims", [min, max]);
    this.latlims.set([min, max]);
  }

  lines(points: Point[], style: LineStyle = {}, options: PlotOptions = {}): AxisLayer {
    return this.addPlot("lines", points, style, options);
  }

  scatter(points: Point[], style: LineStyle = {}, options: PlotOptions = {}): AxisLayer {
    return this.addPlot("scatter", points, style, options);
  }

  /** Lines and polygon rings of a GeoJSON object. */
  geometry(input: GeoJsonInput, style: LineStyle = {}, options: PlotOptions = {}): AxisLayer {
    return this.addPlot("lines", geoJsonToLines(input), style, options);
  }

  removePlot(id: string): boolean {
    const layer = this.stack.get(id);
    if (!layer || layer.role !== "plot") return false;
    this.dropLayer(layer);
    return true;
  }

  /**
   * Lon/lat bounds of the visible plots that take part in autolimits.
   * Decorations and coastlines never do. Null when there is no finite data.
   */
  datalims(): ViewLimits | null {
    let xmin = Infinity;
    let xmax = -Infinity;
    let ymin = Infinity;
    let ymax = -Infinity;
    for (const layer of this.stack.plots()) {
      if (!layer.autolimits || !layer.visible.value || !layer.data) continue;
      for (const [x, y] of layer.data.value) {
        if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
        xmin = Math.min(xmin, x);
        xmax = Math.max(xmax, x);
        ymin = Math.min(ymin, y);
        ymax = Math.max(ymax, y);
      }
    }
    if (!Number.isFinite(xmin) || !Number.isFinite(ymin)) return null;
    return { xmin, xmax, ymin, ymax };
  }

  /** Fit the view to `datalims()`. Returns the applied `[xmin, xmax, ymin, ymax]`, or null with nothing to fit. */
  applyDatalims(): [number, number, number, number] | null {
    const lims = this.datalims();
    if (!lims) {
      this.logger.warn("no plotted data to fit limits to");
      return null;
    }
    this.batch(() => {
      this.lonlims.set([lims.xmin, lims.xmax]);
      this.latlims.set([lims.ymin, lims.ymax]);
    });
    return [lims.xmin, lims.xmax, lims.ymin, lims.ymax];
  }

  /** lon/lat under a pixel, or null where the projection has no inverse there. */
  pixelToLonLat(pixel: Point): Point | null {
    const transform = this.transform.get();
    if (!transform.inverse) return null;
    const lonlat = transform.inverse(pixelToPlane(mappingOf(this.engine.frame), pixel));
    return Number.isFinite(lonlat[0]) && Number.isFinite(lonlat[1]) ? lonlat : null;
  }

  layers(): AxisLayer[] {
    return this.stack.list();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const layer of this.stack.list()) this.dropLayer(layer);
    this.disposers.forEach((dispose) => dispose());
    this.disposers.length = 0;
    this.engine.dispose();
  }

  /** An observable that follows every published frame. */
  private fromFrame<T>(select: (frame: AxisFrame, mapping: PixelMapping) => T): { output: Observable<T>; dispose: () => void } {
    const current = this.engine.frame;
    const output = new Observable(select(current, mappingOf(current)));
    const dispose = this.engine.subscribe((frame) => output.set(select(frame, mappingOf(frame))));
    return { output, dispose };
  }

  private addDecoration(
    id: string,
    points: (frame: AxisFrame) => Point[],
    target: DecorationTarget,
    base: LineStyle,
    visible: Observable<boolean>
  ): void {
    const source = this.fromFrame((frame, mapping) => pointsToPixels(mapping, points(frame)));
    const style = resolveLineStyle(target, base, this.options.styleRules);
    this.stack.register({
      id,
      zIndex: DECORATION_Z,
      role: "decoration",
      drawable: this.host.createLines(source.output, style, visible),
      visible,
      autolimits: false,
      dispose: source.dispose,
    });
  }

  /** Text and text style both come from the frame, so drawn labels always match the boxes they were placed with. */
  private addTickLabels(id: string, axis: "x" | "y", style: Observable<LabelStyle>, color: string): void {
    const itemsOf = (frame: AxisFrame): TextItem[] =>
      axis === "x"
        ? labelItems(frame.xTicks.labels, frame.xTickPoints, frame.visibility.x)
        : labelItems(frame.yTicks.labels, frame.yTickPoints, frame.visibility.y);
    const textStyleOf = (frame: AxisFrame): TextStyle => {
      const { font, fontSize, rotation } = axis === "x" ? frame.xLabelStyle : frame.yLabelStyle;
      return { color, font, fontSize, rotation };
    };
    const items = new Observable(itemsOf(this.engine.frame));
    const textStyle = new Observable(textStyleOf(this.engine.frame));
    const stopFrames = this.engine.subscribe((frame) => {
      const next = textStyleOf(frame);
      if (!sameTextStyle(next, textStyle.value)) textStyle.set(next);
      items.set(itemsOf(frame));
    });
    const visible = lift(style, (s) => s.visible);
    this.stack.register({
      id,
      zIndex: DECORATION_Z,
      role: "decoration",
      drawable: this.host.createText(items, textStyle, visible.output),
      visible: visible.output,
      autolimits: false,
      dispose: () => {
        stopFrames();
        visible.dispose();
      },
    });
  }

  private addDecorations(): void {
    const o = this.options;
    this.addDecoration("xgrid", (f) => f.grid.x, "xgrid", o.gridstyle, this.xgridvisible);
    this.addDecoration("ygrid", (f) => f.grid.y, "ygrid", o.gridstyle, this.ygridvisible);
    for (const [target, side, flag] of SPINES) {
      this.addDecoration(target, (f) => f.spines[side], target, o.spinestyle, this[flag]);
    }
    this.addTickLabels("xticklabels", "x", this.xLabelStyle, o.xticklabelcolor);
    this.addTickLabels("yticklabels", "y", this.yLabelStyle, o.yticklabelcolor);
  }

  private addCoastlines(): void {
    let coast: Point[];
    try {
      coast = loadCoastlines(this.options.coastlineResolution);
    } catch (err) {
      this.logger.error("coastlines unavailable, axis drawn without them", err);
      return;
    }
    const style = resolveLineStyle("coastlines", this.options.coastlineAttributes, this.options.styleRules);
    this.addPlot("lines", coast, style, { id: "coastlines", zIndex: COASTLINE_Z, autolimits: false });
  }

  private addPlot(kind: "lines" | "scatter", points: Point[], style: LineStyle, options: PlotOptions): AxisLayer {
    const id = options.id ?? `plot-${this.nextPlotId++}`;
    if (this.stack.get(id)) throw new Error(`Layer "${id}" is already registered`);
    const data = new Observable(points);
    const visible = new Observable(true);
    // Reprojected only when the frame's transform or the data changes.
    const initial = this.engine.frame.transform;
    let projected = { transform: initial, source: points, plane: projectPoints(initial, points) };
    const pixelsFor = (frame: AxisFrame): Point[] => {
      if (projected.transform !== frame.transform || projected.source !== data.value) {
        projected = { transform: frame.transform, source: data.value, plane: projectPoints(frame.transform, data.value) };
      }
      return pointsToPixels(mappingOf(frame), projected.plane);
    };
    const pixels = new Observable(pixelsFor(this.engine.frame));
    const stopFrames = this.engine.subscribe((frame) => pixels.set(pixelsFor(frame)));
    const stopData = data.subscribe(() => pixels.set(pixelsFor(this.engine.frame)));
    const drawable: Drawable =
      kind === "lines"
        ? this.host.createLines(pixels, style, visible)
        : this.host.createScatter(pixels, style, visible);
    const layer: AxisLayer = {
      id,
      zIndex: options.zIndex ?? PLOT_Z,
      role: "plot",
      drawable,
      visible,
      data,
      autolimits: options.autolimits ?? true,
      dispose: () => {
        stopData();
        stopFrames();
      },
    };
    this.stack.register(layer);
    return layer;
  }

  private dropLayer(layer: AxisLayer): void {
    this.stack.unregister(layer.id);
    layer.dispose();
    this.host.remove(layer.drawable);
  }
}
