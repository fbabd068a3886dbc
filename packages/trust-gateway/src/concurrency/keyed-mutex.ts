// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Serialises async work per key while letting different keys run freely.
 *
 * Each key owns a promise chain; `runExclusive()` appends to the chain for
 * its key and resolves once its own task settles.  A rejected task does not
 * poison the chain for later callers.  The chain entry is dropped when the
 * last queued task for a key finishes, so idle keys cost nothing.
 */
export class KeyedMutex {
  readonly #tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` once every previously queued task for `key` has settled.
   *
   * @returns Whatever `task` resolves to; rejections propagate to the caller.
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.#tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  /** True while at least one task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.#tails.has(key);
  }
}
