import { describe, expect, it } from "vitest";
import { approximateTextMeasure, directionalPad, rotatedExtent } from "../src/labels/padding.js";
import type { PadRequest } from "../src/labels/padding.js";
import { boxesOverlap, resolveLabelOverlaps } from "../src/labels/overlap.js";
import { identityTransform } from "../src/projection/transform.js";
import { createPixelMapping } from "../src/view/pixelSpace.js";
import type { GeoTransform, LabelBox, LabelStyle } from "../src/types.js";
import { fixedMeasure } from "./helpers/fakeHost.js";

const style: LabelStyle = { pad: 5, fontSize: 10, font: "sans-serif", rotation: 0, visible: true };
const mapping = createPixelMapping(
  { minX: -180, maxX: 180, minY: -90, maxY: 90 },
  { x: 0, y: 0, width: 360, height: 180 }
);

function request(overrides: Partial<PadRequest>): PadRequest {
  return {
    transform: identityTransform(),
    mapping,
    anchor: [0, -90],
    outward: [0, -1],
    step: 0.18,
    fallback: [0, 1],
    text: "0°",
    style,
    measure: fixedMeasure,
    ...overrides,
  };
}

describe("directionalPad", () => {
  it("pushes x labels below the bottom spine by pad plus half the label height", () => {
    const placed = directionalPad(request({}));
    expect(placed.anchor).toEqual([180, 180]);
    expect(placed.position[0]).toBeCloseTo(180, 9);
    expect(placed.position[1]).toBeCloseTo(190, 9);
    expect(placed.box.x).toBeCloseTo(174, 9);
    expect(placed.box.y).toBeCloseTo(185, 9);
    expect(placed.box.width).toBe(12);
    expect(placed.box.height).toBe(10);
  });

  it("pushes y labels left of the left spine by pad plus half the label width", () => {
    const placed = directionalPad(request({ anchor: [-180, 0], outward: [-1, 0], step: 0.36, fallback: [-1, 0] }));
    expect(placed.anchor).toEqual([0, 90]);
    expect(placed.position[0]).toBeCloseTo(-11, 9);
    expect(placed.position[1]).toBeCloseTo(90, 9);
    expect(placed.box.x).toBeCloseTo(-17, 9);
  });

  it("steps outward when the transform cannot map the inward point", () => {
    const edgeOnly: GeoTransform = {
      ...identityTransform(),
      forward: ([x, y]) => (y > -90 ? [NaN, NaN] : [x, y]),
    };
    const placed = directionalPad(request({ transform: edgeOnly }));
    expect(placed.position[0]).toBeCloseTo(180, 9);
    expect(placed.position[1]).toBeCloseTo(190, 9);
  });

  it("falls back to the given direction when the transform is degenerate", () => {
    const flat: GeoTransform = { ...identityTransform(), forward: () => [0, 0] };
    const placed = directionalPad(request({ transform: flat }));
    expect(placed.anchor).toEqual([180, 90]);
    expect(placed.position).toEqual([180, 100]);
  });

  it("measures the rotated label", () => {
    const placed = directionalPad(request({ style: { ...style, rotation: Math.PI / 2 } }));
    expect(placed.box.width).toBeCloseTo(10, 9);
    expect(placed.box.height).toBeCloseTo(12, 9);
    expect(placed.position[1]).toBeCloseTo(191, 9);
  });
});

describe("text extents", () => {
  it("swaps width and height at a quarter turn", () => {
    const extent = rotatedExtent({ width: 12, height: 10 }, Math.PI / 2);
    expect(extent.width).toBeCloseTo(10, 9);
    expect(extent.height).toBeCloseTo(12, 9);
  });

  it("approximates text from character count and font size", () => {
    const extent = approximateTextMeasure("abcd", "sans-serif", 10);
    expect(extent.width).toBeCloseTo(22, 9);
    expect(extent.height).toBeCloseTo(12, 9);
  });
});

const box = (x: number, y: number, width = 10, height = 10): LabelBox => ({ x, y, width, height });
const on = { removeOverlapping: true, xVisible: true, yVisible: true };

describe("boxesOverlap", () => {
  it("does not count shared edges", () => {
    expect(boxesOverlap(box(0, 0), box(10, 0))).toBe(false);
    expect(boxesOverlap(box(0, 0), box(9.5, 0))).toBe(true);
    expect(boxesOverlap(box(0, 0), box(0, 10))).toBe(false);
  });
});

describe("resolveLabelOverlaps", () => {
  it("lets the earlier label of an axis win", () => {
    const state = resolveLabelOverlaps([box(0, 0), box(5, 0), box(12, 0)], [], on);
    expect(state.x).toEqual([true, false, true]);
  });

  it("hides x labels that overlap a visible y label", () => {
    const state = resolveLabelOverlaps([box(5, 5), box(50, 50)], [box(0, 0)], on);
    expect(state.y).toEqual([true]);
    expect(state.x).toEqual([false, true]);
  });

  it("ignores y labels that are themselves hidden", () => {
    const state = resolveLabelOverlaps([box(25, 0)], [box(0, 0), box(5, 0, 25)], on);
    expect(state.y).toEqual([true, false]);
    expect(state.x).toEqual([true]);
  });

  it("shows every finite label when overlap removal is off", () => {
    const state = resolveLabelOverlaps([box(0, 0), box(1, 1)], [box(0, 0)], { ...on, removeOverlapping: false });
    expect(state).toEqual({ x: [true, true], y: [true] });
  });

  it("hides disabled and non-finite labels", () => {
    const state = resolveLabelOverlaps([box(NaN, 0), box(20, 0)], [box(0, 40)], { ...on, yVisible: false });
    expect(state).toEqual({ x: [false, true], y: [false] });
  });

  it("is idempotent", () => {
    const xs = [box(0, 0), box(4, 0), box(8, 0), box(30, 0)];
    const ys = [box(2, 2), box(2, 30)];
    expect(resolveLabelOverlaps(xs, ys, on)).toEqual(resolveLabelOverlaps(xs, ys, on));
  });

  it("handles no labels at all", () => {
    expect(resolveLabelOverlaps([], [], on)).toEqual({ x: [], y: [] });
  });
});
