import type { Range, TickFormatter, TickPolicy, TickSet } from "../types.js";

/** Step multipliers, simplest first. */
const NICE_MULTIPLIERS = [1, 2, 2.5, 3, 5] as const;
const EPS = 1e-9;

interface Candidate {
  step: number;
  first: number; // index of the first tick, in steps from zero
  count: number;
  coverage: number;
  simplicity: number;
}

function better(a: Candidate, b: Candidate, target: number): boolean {
  const da = Math.abs(a.count - target);
  const db = Math.abs(b.count - target);
  if (da !== db) return da < db;
  if (Math.abs(a.coverage - b.coverage) > EPS) return a.coverage > b.coverage;
  return a.simplicity < b.simplicity;
}

/** Strip float noise from k * step, e.g. 3 * 0.1. */
function cleanMultiple(k: number, step: number): number {
  const v = Number((k * step).toPrecision(12));
  return v === 0 ? 0 : v;
}

/**
 * Nice round tick values inside [min, max], aiming for `count` of them.
 * Candidates are multiplier × 10^k steps; the winner has the tick count
 * closest to `count`, then the widest coverage of the range, then the
 * simplest multiplier. Inverted or zero-width bounds give `[min]`.
 */
export function linearTickValues(min: number, max: number, count: number): number[] {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return [];
  if (!(max > min)) return [min];
  const target = Math.max(1, Math.round(count));
  const range = max - min;
  const baseExponent = Math.floor(Math.log10(range / target));

  let best: Candidate | null = null;
  for (let exponent = baseExponent - 1; exponent <= baseExponent + 1; exponent++) {
    const magnitude = 10 ** exponent;
    for (const [simplicity, multiplier] of NICE_MULTIPLIERS.entries()) {
      const step = multiplier * magnitude;
      const first = Math.ceil(min / step - EPS);
      const last = Math.floor(max / step + EPS);
      const tickCount = last - first + 1;
      if (tickCount < 1) continue;
      const candidate: Candidate = {
        step,
        first,
        count: tickCount,
        coverage: ((last - first) * step) / range,
        simplicity,
      };
      if (!best || better(candidate, best, target)) best = candidate;
    }
  }

  if (!best) return [min];
  const values: number[] = [];
  for (let i = 0; i < best.count; i++) values.push(cleanMultiple(best.first + i, best.step));
  return values;
}

function withinLimits(value: number, limits: Range): boolean {
  const tolerance = EPS * Math.max(1, Math.abs(limits[1] - limits[0]));
  return value >= limits[0] - tolerance && value <= limits[1] + tolerance;
}

/**
 * Tick values and labels for one axis. Pure: the same inputs always give the
 * same TickSet.
 */
export function generateTicks(limits: Range, policy: TickPolicy, formatter: TickFormatter): TickSet {
  if (policy.type === "fixed") {
    const values: number[] = [];
    const supplied: string[] = [];
    policy.values.forEach((value, i) => {
      if (!Number.isFinite(value) || !withinLimits(value, limits)) return;
      values.push(value);
      const label = policy.labels?.[i];
      if (label !== undefined) supplied.push(label);
    });
    const labels = policy.labels && supplied.length === values.length ? supplied : formatter(values);
    return checked(values, labels);
  }
  const values = linearTickValues(limits[0], limits[1], policy.count);
  return checked(values, formatter(values));
}

function checked(values: number[], labels: string[]): TickSet {
  if (labels.length !== values.length) {
    throw new Error(`Tick formatter returned ${labels.length} labels for ${values.length} values`);
  }
  return { values, labels: [...labels] };
}

export const linearTicks = (count: number): TickPolicy => ({ type: "linear", count });

export const fixedTicks = (values: readonly number[], labels?: readonly string[]): TickPolicy =>
  labels ? { type: "fixed", values, labels } : { type: "fixed", values };
