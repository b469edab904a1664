/**
 * Promise-chained mutual exclusion, one chain per key.
 *
 * `run(key, fn)` starts `fn` only after every earlier `run` for the same key
 * has settled, together with any work those runs handed to `hold`. Different
 * keys never wait on each other.
 */

/** Keeps the key locked until `work` settles, even after `fn` has returned. */
export type Hold = (work: Promise<unknown>) => void;

function noop(): void {}

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: (hold: Hold) => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    // hold() must be called before fn settles; later calls are not waited for.
    const held: Promise<void>[] = [];
    const hold: Hold = (work) => {
      // Only settlement matters here; the holder reports its own failures.
      held.push(work.then(noop, noop));
    };

    const result = previous.then(() => fn(hold));
    const release = async (): Promise<void> => {
      await Promise.all(held);
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
    const tail: Promise<void> = result.then(release, release);
    this.tails.set(key, tail);
    return result;
  }

  /** Resolves once every run queued so far for `key`, and its held work, has settled. */
  async settled(key: string): Promise<void> {
    await this.tails.get(key);
  }

  /** Whether any holder or waiter exists for `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
