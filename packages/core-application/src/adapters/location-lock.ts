import path from "node:path";

/**
 * In-process mutual exclusion keyed by resolved file path. Work queued for
 * one location runs strictly one at a time; different locations do not wait
 * on each other.
 */
export class LocationLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(location: string, work: () => Promise<T>): Promise<T> {
    const key = path.resolve(location);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(location: string): boolean {
    return this.tails.has(path.resolve(location));
  }
}
