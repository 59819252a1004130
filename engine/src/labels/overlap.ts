import type { LabelBox, OverlapState } from "../types.js";

/** Boxes that only share an edge do not overlap. */
export function boxesOverlap(a: LabelBox, b: LabelBox): boolean {
  return !(
    a.x + a.width <= b.x ||
    b.x + b.width <= a.x ||
    a.y + a.height <= b.y ||
    b.y + b.height <= a.y
  );
}

function isFiniteBox(box: LabelBox): boolean {
  return (
    Number.isFinite(box.x) && Number.isFinite(box.y) && Number.isFinite(box.width) && Number.isFinite(box.height)
  );
}

export interface OverlapOptions {
  removeOverlapping: boolean;
  xVisible: boolean;
  yVisible: boolean;
}

/**
 * Visibility per label. y labels are settled first and win over x labels;
 * within one axis a label yields to any earlier visible label it overlaps.
 */
export function resolveLabelOverlaps(
  xBoxes: readonly LabelBox[],
  yBoxes: readonly LabelBox[],
  options: OverlapOptions
): OverlapState {
  const y = settleAxis(yBoxes, options.yVisible, options.removeOverlapping, []);
  const shownY = yBoxes.filter((_, i) => y[i]);
  const x = settleAxis(xBoxes, options.xVisible, options.removeOverlapping, shownY);
  return { x, y };
}

function settleAxis(
  boxes: readonly LabelBox[],
  enabled: boolean,
  removeOverlapping: boolean,
  blockers: readonly LabelBox[]
): boolean[] {
  const visible = new Array<boolean>(boxes.length).fill(false);
  if (!enabled) return visible;
  const shown: LabelBox[] = [];
  boxes.forEach((box, i) => {
    if (!isFiniteBox(box)) return;
    if (removeOverlapping) {
      if (blockers.some((other) => boxesOverlap(box, other))) return;
      if (shown.some((other) => boxesOverlap(box, other))) return;
    }
    visible[i] = true;
    shown.push(box);
  });
  return visible;
}
