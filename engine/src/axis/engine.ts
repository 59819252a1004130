import { isValidDensity, sampleGrid } from "../grid/sampler.js";
import { directionalPad } from "../labels/padding.js";
import type { PlacedLabel } from "../labels/padding.js";
import { resolveLabelOverlaps } from "../labels/overlap.js";
import { consoleLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { projectPoints } from "../projection/project.js";
import type { TransformHolder } from "../projection/transform.js";
import { Observable, onAny } from "../reactive/observable.js";
import type { Listener } from "../reactive/observable.js";
import { RecomputeScheduler } from "../reactive/scheduler.js";
import { generateTicks } from "../ticks/ticks.js";
import { createPixelMapping, planeBoundsOf } from "../view/pixelSpace.js";
import type { PixelMapping } from "../view/pixelSpace.js";
import { ViewLimitsTracker } from "../view/limits.js";
import type {
  AxisFrame,
  GeoTransform,
  LabelStyle,
  LimitRequest,
  PixelRect,
  Point,
  SpineLines,
  TextMeasurer,
  TickFormatter,
  TickPolicy,
  TickSet,
  ViewLimits,
} from "../types.js";

export interface GeoTickEngineInputs {
  transform: TransformHolder;
  lonlims: Observable<LimitRequest>;
  latlims: Observable<LimitRequest>;
  xticks: Observable<TickPolicy>;
  yticks: Observable<TickPolicy>;
  xtickformat: Observable<TickFormatter>;
  ytickformat: Observable<TickFormatter>;
  pixelArea: Observable<PixelRect>;
  lineDensity: Observable<number>;
  removeOverlappingTicks: Observable<boolean>;
  xLabelStyle: Observable<LabelStyle>;
  yLabelStyle: Observable<LabelStyle>;
}

export interface GeoTickEngineOptions {
  measureText: TextMeasurer;
  logger?: Logger;
  initialLimits?: ViewLimits;
}

const FALLBACK_DOWN: Point = [0, 1];
const FALLBACK_LEFT: Point = [-1, 0];
const STEP_FRACTION = 1e-3;

function fdStep(min: number, max: number): number {
  return Math.max(Math.abs(max - min) * STEP_FRACTION, 1e-9);
}

/**
 * Recomputes ticks, gridlines, spines and label placement whenever any input
 * changes, and publishes the result as one `AxisFrame`. Changes made inside
 * `batch()` or during a pass coalesce into a single further pass. A pass that
 * throws publishes nothing; the previous frame stays current.
 */
export class GeoTickEngine {
  private readonly scheduler: RecomputeScheduler;
  private readonly tracker: ViewLimitsTracker;
  private readonly logger: Logger;
  private readonly output = new Observable<AxisFrame | null>(null);
  private readonly unsubscribe: () => void;
  private density: number;
  private revision = 0;
  private error: unknown = null;

  constructor(private readonly inputs: GeoTickEngineInputs, private readonly options: GeoTickEngineOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.tracker = new ViewLimitsTracker(options.initialLimits, this.logger);
    this.density = inputs.lineDensity.value;
    this.scheduler = new RecomputeScheduler(
      () => this.recompute(),
      (err) => this.fail(err)
    );
    this.unsubscribe = onAny(
      [
        inputs.transform.observable,
        inputs.lonlims,
        inputs.latlims,
        inputs.xticks,
        inputs.yticks,
        inputs.xtickformat,
        inputs.ytickformat,
        inputs.pixelArea,
        inputs.lineDensity,
        inputs.removeOverlappingTicks,
        inputs.xLabelStyle,
        inputs.yLabelStyle,
      ],
      () => this.scheduler.invalidate()
    );
    this.scheduler.flush();
    if (!this.output.value) {
      this.unsubscribe();
      throw this.error instanceof Error ? this.error : new Error(`Initial axis recompute failed: ${String(this.error)}`);
    }
  }

  /** The latest published frame. */
  get frame(): AxisFrame {
    const frame = this.output.value;
    if (!frame) throw new Error("GeoTickEngine has no frame");
    return frame;
  }

  /** Error of the most recent pass, or null once a pass succeeds. */
  get lastError(): unknown {
    return this.error;
  }

  get passCount(): number {
    return this.scheduler.passCount;
  }

  get limits(): ViewLimits {
    return this.tracker.current;
  }

  subscribe(listener: Listener<AxisFrame>): () => void {
    return this.output.subscribe((frame) => {
      if (frame) listener(frame);
    });
  }

  /** Apply several input changes and recompute once afterwards. */
  batch<R>(fn: () => R): R {
    return this.scheduler.batch(fn);
  }

  dispose(): void {
    this.unsubscribe();
  }

  private fail(err: unknown): void {
    this.error = err;
    this.logger.error("axis recompute failed, keeping previous frame", err);
  }

  private currentDensity(): number {
    const requested = this.inputs.lineDensity.value;
    if (isValidDensity(requested)) {
      this.density = requested;
    } else if (requested !== this.density) {
      this.logger.warn(`invalid line density ${requested}, keeping ${this.density}`);
    }
    return this.density;
  }

  private recompute(): void {
    const { inputs } = this;
    const transform = inputs.transform.get();
    const limits = this.tracker.resolve(inputs.lonlims.value, inputs.latlims.value, transform);
    const xRange = [limits.xmin, limits.xmax] as const;
    const yRange = [limits.ymin, limits.ymax] as const;

    const xTicks = generateTicks(xRange, inputs.xticks.value, inputs.xtickformat.value);
    const yTicks = generateTicks(yRange, inputs.yticks.value, inputs.ytickformat.value);

    const sampled = sampleGrid(xRange, yRange, xTicks.values, yTicks.values, this.currentDensity());
    const grid = { x: projectPoints(transform, sampled.xGrid), y: projectPoints(transform, sampled.yGrid) };
    const spines: SpineLines = {
      top: projectPoints(transform, sampled.spines.top),
      bottom: projectPoints(transform, sampled.spines.bottom),
      left: projectPoints(transform, sampled.spines.left),
      right: projectPoints(transform, sampled.spines.right),
    };

    const planeBounds = planeBoundsOf(spines.top, spines.bottom, spines.left, spines.right, grid.x, grid.y);
    if (!planeBounds) throw new Error(`Transform "${transform.label}" maps no part of the view to finite coordinates`);
    const pixelArea = inputs.pixelArea.value;
    const mapping = createPixelMapping(planeBounds, pixelArea);

    const xLabelStyle = inputs.xLabelStyle.value;
    const yLabelStyle = inputs.yLabelStyle.value;
    const xLabels = this.placeLabels(transform, mapping, xTicks, xLabelStyle, (v) => [v, limits.ymin], [0, -1], fdStep(limits.ymin, limits.ymax), FALLBACK_DOWN);
    const yLabels = this.placeLabels(transform, mapping, yTicks, yLabelStyle, (v) => [limits.xmin, v], [-1, 0], fdStep(limits.xmin, limits.xmax), FALLBACK_LEFT);

    const xLabelBoxes = xLabels.map((l) => l.box);
    const yLabelBoxes = yLabels.map((l) => l.box);
    const visibility = resolveLabelOverlaps(xLabelBoxes, yLabelBoxes, {
      removeOverlapping: inputs.removeOverlappingTicks.value,
      xVisible: xLabelStyle.visible,
      yVisible: yLabelStyle.visible,
    });

    this.revision += 1;
    this.error = null;
    this.tracker.commit(limits);
    this.output.set({
      revision: this.revision,
      transform,
      limits,
      xTicks,
      yTicks,
      grid,
      spines,
      xTickPoints: xLabels.map((l) => l.position),
      yTickPoints: yLabels.map((l) => l.position),
      xLabelBoxes,
      yLabelBoxes,
      visibility,
      planeBounds,
      pixelArea: { ...pixelArea },
      xLabelStyle,
      yLabelStyle,
    });
  }

  private placeLabels(
    transform: GeoTransform,
    mapping: PixelMapping,
    ticks: TickSet,
    style: LabelStyle,
    anchorAt: (value: number) => Point,
    outward: Point,
    step: number,
    fallback: Point
  ): PlacedLabel[] {
    return ticks.values.map((value, i) =>
      directionalPad({
        transform,
        mapping,
        anchor: anchorAt(value),
        outward,
        step,
        fallback,
        text: ticks.labels[i],
        style,
        measure: this.options.measureText,
      })
    );
  }
}
