/**
 * Counting semaphore with first-in, first-out hand-off.
 *
 * A released slot goes straight to the oldest waiter, so a late `acquire`
 * can never overtake one that is already queued.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Semaphore: size must be a positive integer, got ${size}`);
    }
    this.available = size;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }

  get value(): number {
    return this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }
}
