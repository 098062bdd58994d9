/**
 * Minimum-interval throttle for outbound completion requests.
 * One instance may be shared by any number of clients; callers are
 * serialised through a promise chain so the interval holds process-wide.
 */

import { Sleep, sleep as defaultSleep } from "../utils/timeout";

export interface RequestThrottleOptions {
  clock?: () => number;
  sleep?: Sleep;
  /** Epoch ms of the last request made before this process started */
  initialLastRequestAt?: number;
}

export class RequestThrottle {
  private lastRequestAt: number;
  private queue: Promise<void> = Promise.resolve();
  private readonly clock: () => number;
  private readonly sleep: Sleep;

  constructor(
    public readonly minIntervalMs: number,
    options: RequestThrottleOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.lastRequestAt = options.initialLastRequestAt ?? 0;
  }

  /**
   * Resolve when the caller may issue its request; stamps the request time.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitTurn());
    // Keep the chain alive whatever happens to one caller
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  get lastRequestTime(): number {
    return this.lastRequestAt;
  }

  private async waitTurn(): Promise<void> {
    const elapsed = this.clock() - this.lastRequestAt;
    if (elapsed < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - elapsed);
    }
    this.lastRequestAt = this.clock();
  }
}
