import { RequestAbortedError } from "@/commands/errors";

/**
 * Single world-wide exclusion scope. Ticks, assignments and snapshot reads all
 * run through `runExclusive`, one at a time in call order.
 *
 * Critical sections are synchronous, so once one starts it finishes before any
 * other work (a timer, an incoming request) can observe the world.
 */
export class WorldLock {
  private queue: Array<() => void> = [];
  private locked = false;

  runExclusive<T>(fn: () => T, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const execute = () => {
        this.locked = true;
        try {
          // A caller that went away while queued gets nothing applied.
          if (signal?.aborted) throw new RequestAbortedError();
          resolve(fn());
        } catch (err) {
          reject(err);
        } finally {
          this.release();
        }
      };

      if (this.locked) {
        this.queue.push(execute);
      } else {
        execute();
      }
    });
  }

  isLocked(): boolean {
    return this.locked;
  }

  pending(): number {
    return this.queue.length;
  }

  private release() {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }
}
