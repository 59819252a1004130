export type NodeState = "clean" | "dirty";
export type SchedulerPhase = "idle" | "recomputing";

/**
 * Runs a single recompute callback in response to invalidations.
 *
 * Invalidations that arrive inside `batch()` or while a pass is running only
 * mark the node dirty; one more pass follows, reading whatever the inputs are
 * by then. At most one pass is ever pending.
 */
export class RecomputeScheduler {
  private phase: SchedulerPhase = "idle";
  private state: NodeState = "dirty";
  private batchDepth = 0;
  private passes = 0;

  constructor(
    private readonly run: () => void,
    private readonly onError: (err: unknown) => void
  ) {}

  get currentPhase(): SchedulerPhase {
    return this.phase;
  }

  get nodeState(): NodeState {
    return this.state;
  }

  /** Number of passes started since construction. */
  get passCount(): number {
    return this.passes;
  }

  invalidate(): void {
    this.state = "dirty";
    if (this.batchDepth > 0 || this.phase === "recomputing") return;
    this.flush();
  }

  batch<R>(fn: () => R): R {
    this.batchDepth += 1;
    try {
      return fn();
    } finally {
      this.batchDepth -= 1;
      if (this.batchDepth === 0 && this.state === "dirty") this.flush();
    }
  }

  flush(): void {
    if (this.phase === "recomputing") return;
    this.phase = "recomputing";
    try {
      while (this.state === "dirty") {
        this.state = "clean";
        this.passes += 1;
        try {
          this.run();
        } catch (err) {
          this.onError(err);
        }
      }
    } finally {
      this.phase = "idle";
    }
  }
}
