import { createChildLogger } from "./logger.js";

const log = createChildLogger({ module: "rate-limiter" });

export interface RateLimiterOptions {
  /** Maximum grants inside any window of `windowMs`. */
  requests: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Sliding-log limiter shared by every worker of a run. `acquire()` resolves
 * once a slot is granted; callers over capacity queue in FIFO order instead
 * of failing. Grant bookkeeping happens synchronously between awaits, so
 * concurrent acquirers can never overshoot the ceiling.
 */
export class RateLimiter {
  private readonly grants: number[] = [];
  private readonly waiters: Array<() => void> = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: RateLimiterOptions) {
    if (!Number.isInteger(opts.requests) || opts.requests < 1) {
      throw new RangeError(`requests must be a positive integer, got ${opts.requests}`);
    }
    if (opts.windowMs <= 0) {
      throw new RangeError(`windowMs must be positive, got ${opts.windowMs}`);
    }
    this.now = opts.now ?? Date.now;
  }

  acquire(): Promise<void> {
    if (this.waiters.length === 0 && this.tryGrant()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
      log.debug(
        { queued: this.waiters.length, limit: this.opts.requests },
        "Rate limit reached, queueing request"
      );
      this.schedule();
    });
  }

  /** Number of callers currently waiting for a slot. */
  get pending(): number {
    return this.waiters.length;
  }

  private tryGrant(): boolean {
    const now = this.now();
    while (this.grants.length > 0 && now - this.grants[0] >= this.opts.windowMs) {
      this.grants.shift();
    }
    if (this.grants.length >= this.opts.requests) return false;
    this.grants.push(now);
    return true;
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    const oldest = this.grants[0] ?? this.now();
    const delay = Math.max(0, oldest + this.opts.windowMs - this.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.drain();
    }, delay);
  }

  private drain(): void {
    while (this.waiters.length > 0 && this.tryGrant()) {
      const next = this.waiters.shift();
      next?.();
    }
    this.schedule();
  }
}
