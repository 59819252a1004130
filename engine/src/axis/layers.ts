import type { Drawable } from "../host.js";
import type { Observable } from "../reactive/observable.js";
import type { Point } from "../types.js";

export type LayerRole = "decoration" | "plot";

export interface AxisLayer {
  id: string;
  zIndex: number;
  role: LayerRole;
  drawable: Drawable;
  visible: Observable<boolean>;
  /** lon/lat points behind the drawable; absent for decorations drawn from frames. */
  data?: Observable<Point[]>;
  /** Whether the layer counts towards `datalims()`. */
  autolimits: boolean;
  dispose: () => void;
}

export const PLOT_Z = 0;
export const COASTLINE_Z = 99;
export const DECORATION_Z = 100;

/** Drawables owned by one axis, kept in zIndex order (ties keep insertion order). */
export class LayerStack {
  private layers: AxisLayer[] = [];

  register(layer: AxisLayer): void {
    if (this.layers.find((l) => l.id === layer.id)) {
      throw new Error(`Layer "${layer.id}" is already registered`);
    }
    this.layers.push(layer);
    this.layers.sort((a, b) => a.zIndex - b.zIndex);
  }

  unregister(id: string): AxisLayer | undefined {
    const idx = this.layers.findIndex((l) => l.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.layers.splice(idx, 1);
    return removed;
  }

  get(id: string): AxisLayer | undefined {
    return this.layers.find((l) => l.id === id);
  }

  list(): AxisLayer[] {
    return [...this.layers];
  }

  plots(): AxisLayer[] {
    return this.layers.filter((l) => l.role === "plot");
  }
}
