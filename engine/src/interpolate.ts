/**
 * `count` evenly spaced values from `start` to `stop`, both ends included.
 * The last value is exactly `stop` so spines close on the frame corners.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  const n = Math.max(0, Math.floor(count));
  if (n === 0) return [];
  if (n === 1) return [start];
  const out = new Array<number>(n);
  const step = (stop - start) / (n - 1);
  for (let i = 0; i < n - 1; i++) out[i] = start + i * step;
  out[n - 1] = stop;
  return out;
}
