import { delay } from "./utils";

/**
 * Enforces a minimum gap between request starts across every caller sharing
 * the instance. Slots are reserved synchronously, so concurrent workers never
 * get the same one.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minDelayMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = delay
  ) {}

  async wait(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minDelayMs;
    const wait = slot - now;
    if (wait > 0) await this.sleep(wait);
  }
}
