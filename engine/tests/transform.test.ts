import { describe, expect, it, vi } from "vitest";
import { geoEquirectangular } from "d3-geo";
import { InvalidProjectionError } from "../src/errors.js";
import {
  centralLongitude,
  createGeoProjectionTransform,
  createProjTransform,
  identityTransform,
  TransformHolder,
} from "../src/projection/transform.js";

describe("proj4 transforms", () => {
  it("projects the origin of Equal Earth to the plane origin and back", () => {
    const t = createProjTransform("+proj=longlat +datum=WGS84", "+proj=eqearth");
    const [x, y] = t.forward([0, 0]);
    expect(x).toBeCloseTo(0, 6);
    expect(y).toBeCloseTo(0, 6);
    const east = t.forward([90, 45]);
    expect(east[0]).toBeGreaterThan(0);
    expect(east[1]).toBeGreaterThan(0);
    const back = t.inverse?.(east);
    expect(back?.[0]).toBeCloseTo(90, 6);
    expect(back?.[1]).toBeCloseTo(45, 6);
  });

  it("recovers every point of a domain grid through the inverse", () => {
    const t = createProjTransform("+proj=longlat +datum=WGS84", "+proj=eqearth");
    for (let lon = -180; lon <= 180; lon += 15) {
      for (let lat = -90; lat <= 90; lat += 15) {
        const projected = t.forward([lon, lat]);
        expect(Number.isFinite(projected[0]) && Number.isFinite(projected[1])).toBe(true);
        const back = t.inverse?.(projected) ?? [NaN, NaN];
        if (Math.abs(lat) === 90) {
          // Longitude is undefined at a pole and the inverse may not return a latitude.
          if (!Number.isNaN(back[1])) expect(back[1]).toBeCloseTo(lat, 4);
          continue;
        }
        // ±180 may come back as its twin.
        const lonError = Math.abs(((back[0] - lon + 540) % 360) - 180);
        expect(lonError).toBeLessThan(1e-5);
        expect(back[1]).toBeCloseTo(lat, 5);
      }
    }
  });

  it("returns NaN for non-finite input instead of throwing", () => {
    const t = createProjTransform("+proj=longlat +datum=WGS84", "+proj=eqearth");
    const out = t.forward([NaN, 10]);
    expect(Number.isNaN(out[0])).toBe(true);
    expect(Number.isNaN(out[1])).toBe(true);
  });

  it("wraps unparseable definitions in InvalidProjectionError", () => {
    expect(() => createProjTransform("+proj=longlat +datum=WGS84", "+proj=notaprojection")).toThrow(
      InvalidProjectionError
    );
    try {
      createProjTransform("+proj=longlat +datum=WGS84", "+proj=notaprojection");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidProjectionError);
      if (err instanceof InvalidProjectionError) {
        expect(err.definition).toBe("+proj=longlat +datum=WGS84 -> +proj=notaprojection");
        expect(err.name).toBe("InvalidProjectionError");
      }
    }
  });

  it("centres the longitude domain on lon_0", () => {
    expect(centralLongitude("+proj=eqearth +lon_0=150")).toBe(150);
    expect(centralLongitude("+proj=eqearth")).toBe(0);
    const t = createProjTransform("+proj=longlat +datum=WGS84", "+proj=eqearth +lon_0=150");
    expect(t.domain()).toEqual({ lon: [-30, 330], lat: [-90, 90] });
  });
});

describe("d3-geo transforms", () => {
  it("flips d3's screen y so north is up", () => {
    const projection = geoEquirectangular().scale(1).translate([0, 0]);
    const t = createGeoProjectionTransform(projection);
    const [x, y] = t.forward([180, 45]);
    expect(x).toBeCloseTo(Math.PI, 9);
    expect(y).toBeCloseTo(Math.PI / 4, 9);
    const back = t.inverse?.([x, y]);
    expect(back?.[0]).toBeCloseTo(180, 9);
    expect(back?.[1]).toBeCloseTo(45, 9);
  });
});

describe("TransformHolder", () => {
  it("notifies dependents when the transform is replaced", () => {
    const holder = new TransformHolder(identityTransform());
    const listener = vi.fn();
    holder.subscribe(listener);
    const next = identityTransform({ lon: [0, 10], lat: [0, 10] });
    holder.set(next);
    expect(holder.get()).toBe(next);
    expect(listener).toHaveBeenCalledWith(next);
  });

  it("builds a proj4 transform from definition strings", () => {
    const holder = new TransformHolder(identityTransform());
    holder.set("+proj=longlat +datum=WGS84", "+proj=eqearth");
    expect(holder.get().label).toBe("+proj=longlat +datum=WGS84 -> +proj=eqearth");
  });
});
