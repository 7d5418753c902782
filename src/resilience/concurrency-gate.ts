export interface Permit {
  /** Returns the permit to the pool. Calling it twice is a no-op. */
  release(): void;
}

/**
 * Counting permit pool. Callers never wait: tryAcquire() either hands out a
 * permit or returns null, and the caller retries when a permit is released.
 */
export class ConcurrencyGate {
  readonly name: string;
  readonly size: number;

  private held = 0;

  constructor(name: string, size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`[Gate:${name}] size must be a positive integer`);
    }
    this.name = name;
    this.size = size;
  }

  tryAcquire(): Permit | null {
    if (this.held >= this.size) return null;
    this.held++;
    return this.createPermit();
  }

  available(): number {
    return this.size - this.held;
  }

  inUse(): number {
    return this.held;
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.held--;
      },
    };
  }
}
