export type Listener<T> = (value: T) => void;

/**
 * A value that pushes every assignment to its listeners. Listeners run
 * synchronously, in subscription order.
 */
export class Observable<T> {
  private current: T;
  private listeners = new Set<Listener<T>>();

  constructor(initial: T) {
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  set(next: T): void {
    this.current = next;
    this.notify();
  }

  /** Replace the value without telling anyone; pair with `notify()`. */
  setSilently(next: T): void {
    this.current = next;
  }

  notify(): void {
    for (const listener of [...this.listeners]) listener(this.current);
  }

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

/** Derive an observable from one source; the result follows every source change. */
export function lift<S, T>(source: Observable<S>, fn: (value: S) => T): { output: Observable<T>; dispose: () => void } {
  const output = new Observable<T>(fn(source.value));
  const dispose = source.subscribe((value) => output.set(fn(value)));
  return { output, dispose };
}

export interface Subscribable {
  subscribe(listener: () => void): () => void;
}

/** Call `listener` whenever any of `sources` notifies. Returns an unsubscribe. */
export function onAny(sources: readonly Subscribable[], listener: () => void): () => void {
  const disposers = sources.map((source) => source.subscribe(() => listener()));
  return () => disposers.forEach((dispose) => dispose());
}
