import { createLogger } from '../logger';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep';

const log = createLogger('limiter');

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /** Minimum spacing between the return of one call and the next (ms) */
  minIntervalMs: number;

  /** Length of the observability window the call counter resets on (ms) */
  windowMs: number;
}

const DEFAULT_CONFIG: RateLimiterConfig = {
  minIntervalMs: 2500,
  windowMs: 60_000,
};

export interface RateLimiterStats {
  count: number;
  lastCallTime: number | null;
  windowResetTime: number;
}

/**
 * Spaces out calls to a quota-limited service. Callers are served one at a
 * time in arrival order; each waits until `minIntervalMs` has passed since the
 * previous caller was let through.
 */
export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly sleep: Sleeper;
  private lastCallTime: number | null = null;
  private count = 0;
  private windowResetTime: number;
  private lock: Promise<void> = Promise.resolve();

  constructor(config: Partial<RateLimiterConfig> = {}, sleep: Sleeper = defaultSleep) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.sleep = sleep;
    this.windowResetTime = Date.now() + this.config.windowMs;
  }

  waitIfNeeded(): Promise<void> {
    const turn = this.lock.then(() => this.throttle());
    // keep the chain alive for later callers even if this turn rejects
    this.lock = turn.catch((err: unknown) => log.error('limiter turn failed', err));
    return turn;
  }

  stats(): RateLimiterStats {
    this.rollWindow(Date.now());
    return { count: this.count, lastCallTime: this.lastCallTime, windowResetTime: this.windowResetTime };
  }

  private async throttle() {
    this.rollWindow(Date.now());

    // loop: timers may fire a millisecond early
    while (this.lastCallTime !== null) {
      const wait = this.config.minIntervalMs - (Date.now() - this.lastCallTime);
      if (wait <= 0) break;
      log.debug(`waiting ${(wait / 1000).toFixed(1)}s before the next request`);
      await this.sleep(wait);
    }

    this.lastCallTime = Date.now();
    this.count += 1;
  }

  private rollWindow(now: number) {
    if (now >= this.windowResetTime) {
      this.count = 0;
      this.windowResetTime = now + this.config.windowMs;
    }
  }
}
