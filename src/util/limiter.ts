import { sleep as defaultSleep, type Sleep } from "./time.js";

/**
 * Token bucket pacing outbound bridge calls. The bridge documents roughly
 * ten light commands per second before it starts dropping them.
 */
export class TokenBucketLimiter {
  private readonly capacity: number;
  private readonly refillRatePerSec: number;
  private tokens: number;
  private last: number;

  constructor(rps = 10, private readonly sleep: Sleep = defaultSleep) {
    this.refillRatePerSec = Math.max(0, rps);
    this.capacity = Math.max(1, Math.floor(this.refillRatePerSec));
    this.tokens = this.capacity;
    this.last = Date.now();
  }

  get unlimited() {
    return this.refillRatePerSec === 0;
  }

  async take(): Promise<void> {
    if (this.unlimited) return;
    while (true) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = ((1 - this.tokens) / this.refillRatePerSec) * 1000;
      await this.sleep(Math.ceil(waitMs));
    }
  }

  private refill() {
    const now = Date.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);
  }
}
