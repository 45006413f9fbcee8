import path from "node:path";

/**
 * Serializes work per install root. Operations on different roots run freely.
 */
export class InstallLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(root: string, fn: () => Promise<T>): Promise<T> {
    const key = path.resolve(root);
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isLocked(root: string): boolean {
    return this.tails.has(path.resolve(root));
  }
}

export const installLock = new InstallLock();
