export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Hands out at most one request slot per `minDelayMs`.
 *
 * `acquire()` resolves once the previous slot was released at least
 * `minDelayMs` ago; `release()` marks the end of the request. The gap is
 * measured from the end of one request to the start of the next, so slow
 * responses never eat into the delay.
 */
export class RequestScheduler {
  private lastReleasedAt: number | null = null;
  private waitedMs = 0;

  constructor(
    readonly minDelayMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(minDelayMs) || minDelayMs < 0) {
      throw new RangeError(`minDelayMs must be a non-negative number, got ${minDelayMs}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.lastReleasedAt === null) return;
    const wait = this.lastReleasedAt + this.minDelayMs - this.clock.now();
    if (wait > 0) {
      this.waitedMs += wait;
      await this.clock.sleep(wait);
    }
  }

  release(): void {
    this.lastReleasedAt = this.clock.now();
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Total time spent waiting for slots. */
  get totalWaitMs(): number {
    return this.waitedMs;
  }
}
