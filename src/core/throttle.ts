import { sleep as defaultSleep, type SleepFn } from "./sleep";

export interface ThrottleOptions {
  minDelayMs: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Serialises outbound requests and keeps at least `minDelayMs` between the end
 * of one request and the start of the next. Shared by every stage of a run.
 */
export class RequestThrottle {
  private readonly minDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private lastFinishedAt?: number;

  constructor(options: ThrottleOptions) {
    this.minDelayMs = Math.max(0, options.minDelayMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.lastFinishedAt !== undefined) {
      const waitMs = this.lastFinishedAt + this.minDelayMs - this.now();
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
    }

    try {
      return await task();
    } finally {
      this.lastFinishedAt = this.now();
    }
  }
}
