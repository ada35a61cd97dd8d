export interface DrainResult {
  drained: boolean;
  /** Handlers still pending when the wait ended */
  abandoned: number;
}

/** Keeps the promises of running event handlers so shutdown can wait on them. */
export class InflightTracker {
  private readonly pending = new Set<Promise<void>>();

  /** Registers `task` and hands it back unchanged; the caller still owns its errors. */
  track<T>(task: Promise<T>): Promise<T> {
    const entry: Promise<void> = Promise.allSettled([task]).then(() => {
      this.pending.delete(entry);
    });
    this.pending.add(entry);
    return task;
  }

  /**
   * Waits for everything tracked so far, at most `timeoutMs`.
   */
  async drain(timeoutMs: number): Promise<DrainResult> {
    if (this.pending.size === 0) return { drained: true, abandoned: 0 };
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">(resolve => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const settled = Promise.allSettled([...this.pending]).then(() => "done" as const);
    const outcome = await Promise.race([settled, timedOut]);
    clearTimeout(timer);
    if (outcome === "done") return { drained: true, abandoned: 0 };
    return { drained: false, abandoned: this.pending.size };
  }

  get size(): number {
    return this.pending.size;
  }
}
