import { logger } from "../logger";
import { CircuitOpenError } from "../errors";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerOptions {
  name: string;
  /** Number of most recent calls kept in the sliding window. */
  windowSize: number;
  /** The breaker never trips before the window holds this many calls. */
  minimumCalls: number;
  /** Failure ratio in [0, 1]; the breaker trips when the ratio exceeds it. */
  failureRateThreshold: number;
  cooldownMs: number;
  /** Errors for which this returns false count as successful calls. */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitMetrics {
  state: CircuitState;
  calls: number;
  failures: number;
  failureRate: number;
}

export class CircuitBreaker {
  readonly name: string;

  private state: CircuitState = "CLOSED";
  private window: boolean[] = [];
  private openedAt = 0;
  private probeInFlight = false;

  private readonly windowSize: number;
  private readonly minimumCalls: number;
  private readonly failureRateThreshold: number;
  private readonly cooldownMs: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;

  constructor(options: CircuitBreakerOptions) {
    if (options.windowSize < 1) {
      throw new RangeError("windowSize must be at least 1");
    }
    if (options.failureRateThreshold < 0 || options.failureRateThreshold > 1) {
      throw new RangeError("failureRateThreshold must be within [0, 1]");
    }

    this.name = options.name;
    this.windowSize = options.windowSize;
    this.minimumCalls = Math.min(
      Math.max(1, options.minimumCalls),
      options.windowSize,
    );
    this.failureRateThreshold = options.failureRateThreshold;
    this.cooldownMs = options.cooldownMs;
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  /** Current state; an OPEN breaker whose cooldown has elapsed reports HALF_OPEN. */
  getState(): CircuitState {
    if (
      this.state === "OPEN" &&
      this.now() - this.openedAt >= this.cooldownMs
    ) {
      this.moveTo("HALF_OPEN");
    }
    return this.state;
  }

  isOpen(): boolean {
    return this.getState() === "OPEN";
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.getState();
    if (state === "OPEN") {
      throw new CircuitOpenError(this.name);
    }

    const isProbe = state === "HALF_OPEN";
    if (isProbe) {
      if (this.probeInFlight) {
        throw new CircuitOpenError(this.name);
      }
      this.probeInFlight = true;
    }

    try {
      const result = await fn();
      this.onSuccess(isProbe);
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure(isProbe);
      } else {
        this.onSuccess(isProbe);
      }
      throw error;
    } finally {
      if (isProbe) {
        this.probeInFlight = false;
      }
    }
  }

  getMetrics(): CircuitMetrics {
    const failures = this.window.filter(Boolean).length;
    return {
      state: this.getState(),
      calls: this.window.length,
      failures,
      failureRate: this.window.length > 0 ? failures / this.window.length : 0,
    };
  }

  reset(): void {
    this.window = [];
    this.probeInFlight = false;
    this.openedAt = 0;
    this.moveTo("CLOSED");
  }

  private onSuccess(isProbe: boolean): void {
    if (isProbe) {
      this.window = [];
      this.moveTo("CLOSED");
      return;
    }
    this.record(false);
  }

  private onFailure(isProbe: boolean): void {
    if (isProbe) {
      this.trip();
      return;
    }
    this.record(true);

    const { calls, failureRate } = this.getMetrics();
    if (
      this.state === "CLOSED" &&
      calls >= this.minimumCalls &&
      failureRate > this.failureRateThreshold
    ) {
      this.trip();
    }
  }

  private record(failed: boolean): void {
    this.window.push(failed);
    if (this.window.length > this.windowSize) {
      this.window.shift();
    }
  }

  private trip(): void {
    this.openedAt = this.now();
    this.moveTo("OPEN");
  }

  private moveTo(next: CircuitState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;

    if (next === "OPEN") {
      logger.warn(
        `[CircuitBreaker:${this.name}] ${previous} -> OPEN for ${this.cooldownMs}ms`,
      );
    } else {
      logger.info(`[CircuitBreaker:${this.name}] ${previous} -> ${next}`);
    }
    this.onStateChange?.(previous, next);
  }
}
