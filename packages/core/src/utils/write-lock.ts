/**
 * Admits one writer at a time, in arrival order.
 */
export class WriteLock {
  private held = false;
  private readonly queue: Array<() => void> = [];

  /**
   * Wait for the lock. The returned release function hands the lock to the
   * next waiter; calling it again does nothing.
   */
  async acquire(): Promise<() => void> {
    if (this.held) {
      await new Promise<void>((resolve) => {
        this.queue.push(resolve);
      });
    }
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.queue.shift();
    if (next) {
      // Stays held; the next writer takes it over
      next();
    } else {
      this.held = false;
    }
  }
}
