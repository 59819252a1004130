import { describe, expect, it } from "vitest";
import { GeoTickEngine } from "../src/axis/engine.js";
import type { GeoTickEngineInputs } from "../src/axis/engine.js";
import { TransformHolder } from "../src/projection/transform.js";
import { Observable } from "../src/reactive/observable.js";
import { formatLatitude, formatLongitude, formatPlain } from "../src/ticks/format.js";
import { linearTicks } from "../src/ticks/ticks.js";
import type { GeoTransform, LabelStyle, LimitRequest, PixelRect, TickFormatter, TickPolicy } from "../src/types.js";
import { fixedMeasure, plainIdentity, silentLogger } from "./helpers/fakeHost.js";

const labelStyle: LabelStyle = { pad: 5, fontSize: 10, font: "sans-serif", rotation: 0, visible: true };

function inputs(transform: GeoTransform = plainIdentity()): GeoTickEngineInputs {
  return {
    transform: new TransformHolder(transform),
    lonlims: new Observable<LimitRequest>([-180, 180]),
    latlims: new Observable<LimitRequest>([-90, 90]),
    xticks: new Observable<TickPolicy>(linearTicks(7)),
    yticks: new Observable<TickPolicy>(linearTicks(7)),
    xtickformat: new Observable<TickFormatter>(formatLongitude),
    ytickformat: new Observable<TickFormatter>(formatLatitude),
    pixelArea: new Observable<PixelRect>({ x: 0, y: 0, width: 360, height: 180 }),
    lineDensity: new Observable(10),
    removeOverlappingTicks: new Observable(true),
    xLabelStyle: new Observable(labelStyle),
    yLabelStyle: new Observable(labelStyle),
  };
}

function build(transform?: GeoTransform) {
  const logger = silentLogger();
  const i = inputs(transform);
  const engine = new GeoTickEngine(i, { measureText: fixedMeasure, logger });
  return { engine, inputs: i, logger };
}

describe("GeoTickEngine", () => {
  it("publishes one frame at construction", () => {
    const { engine } = build();
    const frame = engine.frame;
    expect(engine.passCount).toBe(1);
    expect(frame.revision).toBe(1);
    expect(frame.limits).toEqual({ xmin: -180, xmax: 180, ymin: -90, ymax: 90 });
    expect(frame.xTicks.values).toEqual([-150, -100, -50, 0, 50, 100, 150]);
    expect(frame.yTicks.values).toEqual([-90, -60, -30, 0, 30, 60, 90]);
    expect(frame.grid.x).toHaveLength(7 * 11 - 1);
    expect(frame.spines.top).toHaveLength(10);
    expect(frame.xTickPoints).toHaveLength(7);
    expect(frame.yLabelBoxes).toHaveLength(7);
    expect(frame.visibility.x).toEqual([true, true, true, true, true, true, true]);
  });

  it("places the x label for 0° under the bottom spine", () => {
    const { engine } = build();
    const frame = engine.frame;
    expect(frame.xTicks.labels[3]).toBe("0°");
    expect(frame.xTickPoints[3][0]).toBeCloseTo(180, 9);
    expect(frame.xTickPoints[3][1]).toBeCloseTo(190, 9);
  });

  it("recomputes once for a batch of changes", () => {
    const { engine, inputs: i } = build();
    engine.batch(() => {
      i.lonlims.set([-90, 90]);
      i.latlims.set([-45, 45]);
      i.xticks.set(linearTicks(3));
    });
    expect(engine.passCount).toBe(2);
    expect(engine.frame.revision).toBe(2);
    expect(engine.frame.limits).toEqual({ xmin: -90, xmax: 90, ymin: -45, ymax: 45 });
  });

  it("folds a change made during a pass into one more pass with the latest inputs", () => {
    const { engine, inputs: i } = build();
    let fired = false;
    const reentrant: TickFormatter = (values) => {
      if (!fired) {
        fired = true;
        i.lineDensity.set(20);
      }
      return formatPlain(values);
    };
    i.xtickformat.set(reentrant);
    expect(engine.passCount).toBe(3);
    expect(engine.frame.revision).toBe(3);
    expect(engine.frame.spines.top).toHaveLength(20);
  });

  it("keeps the last good frame when a pass fails", () => {
    const { engine, inputs: i, logger } = build();
    i.xtickformat.set(() => []);
    expect(engine.frame.revision).toBe(1);
    expect(engine.lastError).toBeInstanceOf(Error);
    expect(logger.error).toHaveBeenCalledTimes(1);

    i.xtickformat.set(formatPlain);
    expect(engine.frame.revision).toBe(2);
    expect(engine.frame.xTicks.labels[0]).toBe("-150");
    expect(engine.lastError).toBeNull();
  });

  it("leaves the resolved limits alone when a pass fails after resolving them", () => {
    const { engine, inputs: i } = build();
    engine.batch(() => {
      i.lonlims.set([-20, 20]);
      i.xtickformat.set(() => []);
    });
    expect(engine.lastError).toBeInstanceOf(Error);
    expect(engine.limits).toEqual({ xmin: -180, xmax: 180, ymin: -90, ymax: 90 });
    expect(engine.frame.limits).toEqual(engine.limits);
  });

  it("keeps the previous density when an invalid one arrives", () => {
    const { engine, inputs: i, logger } = build();
    i.lineDensity.set(1);
    expect(engine.frame.spines.left).toHaveLength(10);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("follows the pixel area", () => {
    const { engine, inputs: i } = build();
    i.pixelArea.set({ x: 0, y: 0, width: 720, height: 360 });
    expect(engine.frame.pixelArea).toEqual({ x: 0, y: 0, width: 720, height: 360 });
    expect(engine.frame.xTickPoints[3][1]).toBeCloseTo(370, 9);
  });

  it("hides labels when their style is not visible", () => {
    const { engine, inputs: i } = build();
    i.yLabelStyle.set({ ...labelStyle, visible: false });
    expect(engine.frame.visibility.y.every((v) => !v)).toBe(true);
    expect(engine.frame.yTickPoints).toHaveLength(7);
  });

  it("stops listening once disposed", () => {
    const { engine, inputs: i } = build();
    engine.dispose();
    i.lonlims.set([0, 10]);
    expect(engine.passCount).toBe(1);
  });

  it("throws when the first pass cannot produce a frame", () => {
    const nowhere: GeoTransform = { ...plainIdentity(), forward: () => [NaN, NaN] };
    expect(() => build(nowhere)).toThrow(/maps no part of the view/);
  });
});
