/**
 * First-come, first-served lock for async critical sections. The gauge runs
 * every stdin write through it so percent lines land in call order.
 */
export class AsyncFifoMutex {
  private held = false;
  private readonly queue: Array<() => void> = [];

  async runExclusive<T>(section: () => Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await section();
    } finally {
      this.unlock();
    }
  }

  private lock(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  // Ownership passes straight to the next waiter, so `held` stays set.
  private unlock(): void {
    const next = this.queue.shift();
    if (next) next();
    else this.held = false;
  }
}
