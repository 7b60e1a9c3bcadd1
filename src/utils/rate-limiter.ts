import type { RateLimitConfig, RateLimitStatus } from '../types.js';
import { sleep } from './retry.js';

/** Token bucket over tokens and requests per minute. */
export class RateLimiter {
  private tokenBucket: number;
  private requestBucket: number;
  private lastRefill: number;
  private readonly tokensPerMinute: number;
  private readonly requestsPerMinute: number;

  constructor(config: RateLimitConfig) {
    this.tokensPerMinute = config.tokensPerMinute;
    this.requestsPerMinute = config.requestsPerMinute;
    this.tokenBucket = config.tokensPerMinute;
    this.requestBucket = config.requestsPerMinute;
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const elapsedMinutes = (now - this.lastRefill) / 60000;

    this.tokenBucket = Math.min(this.tokensPerMinute, this.tokenBucket + this.tokensPerMinute * elapsedMinutes);
    this.requestBucket = Math.min(this.requestsPerMinute, this.requestBucket + this.requestsPerMinute * elapsedMinutes);
    this.lastRefill = now;
  }

  // A request bigger than the whole bucket only waits for a full bucket.
  private clamp(tokens: number): number {
    return Math.min(tokens, this.tokensPerMinute);
  }

  canProceed(estimatedTokens: number): boolean {
    this.refill();
    return this.requestBucket >= 1 && this.tokenBucket >= this.clamp(estimatedTokens);
  }

  consume(tokens: number): void {
    this.refill();
    this.tokenBucket -= tokens;
    this.requestBucket -= 1;
  }

  getStatus(): RateLimitStatus {
    this.refill();
    return {
      remainingTokens: Math.max(0, Math.floor(this.tokenBucket)),
      remainingRequests: Math.max(0, Math.floor(this.requestBucket)),
      resetInMs: this.calculateResetTime(),
    };
  }

  private calculateResetTime(): number {
    if (this.tokenBucket >= this.tokensPerMinute && this.requestBucket >= this.requestsPerMinute) {
      return 0;
    }
    const tokenRefillTime = ((this.tokensPerMinute - this.tokenBucket) / this.tokensPerMinute) * 60000;
    const requestRefillTime = ((this.requestsPerMinute - this.requestBucket) / this.requestsPerMinute) * 60000;
    return Math.max(tokenRefillTime, requestRefillTime);
  }

  async waitForCapacity(estimatedTokens: number, signal?: AbortSignal): Promise<void> {
    while (!this.canProceed(estimatedTokens)) {
      signal?.throwIfAborted();
      await sleep(Math.max(1, Math.min(this.getStatus().resetInMs, 1000)), signal);
    }
  }
}
