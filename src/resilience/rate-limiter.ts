import { logger } from "../logger";
import { ConfigError, RateLimitExceededError } from "../errors";

export interface RateLimiterOptions {
  name: string;
  /** Sustained refill rate, tokens per second. */
  ratePerSecond: number;
  /** Burst capacity; must be at least ratePerSecond. */
  capacity: number;
  /** Longest tryConsume() will wait for a refill before giving up. */
  waitTimeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface Waiter {
  deadline: number;
  resolve: () => void;
  reject: (error: unknown) => void;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Token bucket with continuous refill. */
export class RateLimiter {
  readonly name: string;

  private tokens: number;
  private lastRefill: number;
  private readonly waiters: Waiter[] = [];
  private draining = false;

  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private readonly waitTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions) {
    if (options.ratePerSecond <= 0) {
      throw new ConfigError(
        `[RateLimiter:${options.name}] ratePerSecond must be positive`,
      );
    }
    if (options.capacity < options.ratePerSecond) {
      throw new ConfigError(
        `[RateLimiter:${options.name}] capacity (${options.capacity}) must be >= ratePerSecond (${options.ratePerSecond})`,
      );
    }

    this.name = options.name;
    this.ratePerSecond = options.ratePerSecond;
    this.capacity = options.capacity;
    this.waitTimeoutMs = Math.max(0, options.waitTimeoutMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  /**
   * Takes a token, waiting up to waitTimeoutMs for a refill. Callers that have
   * to wait are served in arrival order.
   */
  tryConsume(): Promise<void> {
    if (this.waiters.length === 0 && this.take()) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      this.waiters.push({
        deadline: this.now() + this.waitTimeoutMs,
        resolve,
        reject,
      });
      if (!this.draining) {
        this.draining = true;
        void this.drain().catch((error: unknown) => {
          this.draining = false;
          for (const waiter of this.waiters.splice(0)) waiter.reject(error);
        });
      }
    });
  }

  /** Number of callers waiting for a token. */
  pending(): number {
    return this.waiters.length;
  }

  availableTokens(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  usedTokens(): number {
    return this.capacity - this.availableTokens();
  }

  reset(): void {
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  private take(): boolean {
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  private async drain(): Promise<void> {
    for (;;) {
      const head = this.waiters[0];
      if (!head) break;
      if (this.take()) {
        this.waiters.shift();
        head.resolve();
        continue;
      }

      const remainingMs = head.deadline - this.now();
      if (remainingMs <= 0) {
        this.waiters.shift();
        head.reject(
          new RateLimitExceededError(
            `Rate limit exceeded for ${this.name}: ${this.ratePerSecond}/s, burst ${this.capacity}`,
          ),
        );
        continue;
      }

      const waitMs = Math.min(this.msUntilNextToken(), remainingMs);
      logger.debug(
        `[RateLimiter:${this.name}] bucket empty, ${this.waiters.length} waiting, next check in ${waitMs}ms`,
      );
      await this.sleep(waitMs);
    }
    this.draining = false;
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = now - this.lastRefill;
    if (elapsedMs <= 0) return;
    this.tokens = Math.min(
      this.capacity,
      this.tokens + (elapsedMs * this.ratePerSecond) / 1000,
    );
    this.lastRefill = now;
  }

  private msUntilNextToken(): number {
    const missing = 1 - this.tokens;
    return Math.max(0, Math.ceil((missing * 1000) / this.ratePerSecond));
  }
}
