/**
 * In-process FIFO mutex
 *
 * Waiters are released strictly in arrival order.
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  get locked(): boolean {
    return this.#locked;
  }

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter; the lock never reads as free
      next();
    } else {
      this.#locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
