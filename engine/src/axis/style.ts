import type { LineStyle } from "../types.js";

export type DecorationTarget =
  | "xgrid"
  | "ygrid"
  | "topspine"
  | "bottomspine"
  | "leftspine"
  | "rightspine"
  | "coastlines";

export interface StyleRule extends LineStyle {
  target: DecorationTarget;
}

/** Style for one decoration: `base`, then every matching rule in order. Last matching rule wins. */
export function resolveLineStyle(target: DecorationTarget, base: LineStyle, rules: readonly StyleRule[]): LineStyle {
  const resolved: LineStyle = { ...base };
  for (const rule of rules) {
    if (rule.target !== target) continue;
    if (rule.color !== undefined) resolved.color = rule.color;
    if (rule.width !== undefined) resolved.width = rule.width;
    if (rule.dash !== undefined) resolved.dash = rule.dash;
    if (rule.opacity !== undefined) resolved.opacity = rule.opacity;
    if (rule.label !== undefined) resolved.label = rule.label;
  }
  return resolved;
}
