import { describe, expect, it, vi } from "vitest";
import {
  breakPoint,
  isBreak,
  joinWithBreaks,
  projectCoordinates,
  projectPoints,
  splitAtBreaks,
} from "../src/projection/project.js";
import type { GeoTransform, Point } from "../src/types.js";

function shifted() {
  const forward = vi.fn(([x, y]: Point): Point => [x + 1, y * 2]);
  const transform: GeoTransform = {
    label: "shift",
    forward,
    domain: () => ({ lon: [-180, 180], lat: [-90, 90] }),
  };
  return { transform, forward };
}

describe("batch conventions", () => {
  it("joins lines with exactly one break between neighbours", () => {
    const batch = joinWithBreaks([
      [
        [0, 0],
        [1, 1],
      ],
      [[2, 2]],
    ]);
    expect(batch).toHaveLength(4);
    expect(isBreak(batch[2])).toBe(true);
    expect(splitAtBreaks(batch)).toEqual([
      [
        [0, 0],
        [1, 1],
      ],
      [[2, 2]],
    ]);
  });

  it("treats only a double NaN as a break", () => {
    expect(isBreak(breakPoint())).toBe(true);
    expect(isBreak([NaN, 0])).toBe(false);
  });
});

describe("projectPoints", () => {
  it("projects pointwise and passes breaks through", () => {
    const { transform, forward } = shifted();
    const out = projectPoints(transform, [[0, 1], breakPoint(), [2, 3]]);
    expect(out[0]).toEqual([1, 2]);
    expect(isBreak(out[1])).toBe(true);
    expect(out[2]).toEqual([3, 6]);
    expect(forward).toHaveBeenCalledTimes(2);
  });

  it("maps empty to empty", () => {
    expect(projectPoints(shifted().transform, [])).toEqual([]);
  });
});

describe("projectCoordinates", () => {
  it("keeps the nesting of GeoJSON coordinates", () => {
    const rings = [
      [
        [0, 0],
        [1, 0],
        [0, 0],
      ],
    ];
    expect(projectCoordinates(shifted().transform, rings)).toEqual([
      [
        [1, 0],
        [2, 0],
        [1, 0],
      ],
    ]);
  });
});
