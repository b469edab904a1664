/**
 * Detached background work.
 *
 * Tasks start on the next microtask. Failures are logged, not rethrown, so
 * the promise `run` returns always resolves; callers may hand it to a lock
 * or ignore it. `drain()` waits for everything still pending (shutdown, tests).
 */
export class BackgroundTasks {
  private pending = new Set<Promise<void>>();

  constructor(private name = "background") {}

  run(label: string, task: () => Promise<unknown>): Promise<void> {
    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`[${this.name}] ${label} failed: ${message}`);
        },
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
    return tracked;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get size(): number {
    return this.pending.size;
  }
}
