import { ProviderError, RateLimitError } from '../errors.js';
import type {
  BackendClient,
  BackendRequest,
  BackendResponse,
  BackendStreamEvent,
  RateLimitConfig,
  RateLimitStatus,
  TokenUsageDelta,
} from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';

export interface CostConfig {
  inputTokenCostPer1k: number;
  outputTokenCostPer1k: number;
}

export interface BackendConfig {
  apiKey: string;
  model: string;
  rateLimit?: RateLimitConfig;
}

export function usageTotal(usage: TokenUsageDelta): number {
  return (usage.input ?? 0) + (usage.output ?? 0);
}

/**
 * Shared plumbing for vendor clients. Subclasses stream the call and report
 * usage deltas as events; `response.usage` repeats the totals.
 */
export abstract class BaseBackend implements BackendClient {
  abstract readonly vendor: string;
  protected abstract readonly costConfig: CostConfig;

  protected readonly rateLimiter?: RateLimiter;
  private log?: Logger;

  constructor(
    readonly model: string,
    rateLimit?: RateLimitConfig
  ) {
    this.rateLimiter = rateLimit ? new RateLimiter(rateLimit) : undefined;
  }

  protected abstract executeStream(
    request: BackendRequest,
    onEvent: (event: BackendStreamEvent) => void
  ): Promise<BackendResponse>;

  protected get logger(): Logger {
    this.log ??= createLogger('backend').child({ backend: this.vendor, model: this.model });
    return this.log;
  }

  async stream(request: BackendRequest, onEvent: (event: BackendStreamEvent) => void): Promise<BackendResponse> {
    const estimatedTokens = this.estimateInputTokens(
      request.system + request.messages.map((message) => message.content).join('\n')
    );
    await this.rateLimiter?.waitForCapacity(estimatedTokens, request.signal);

    const startedAt = Date.now();
    const response = await this.executeStream(request, onEvent);
    this.rateLimiter?.consume(usageTotal(response.usage) || estimatedTokens);

    this.logger.debug(
      {
        durationMs: Date.now() - startedAt,
        inputTokens: response.usage.input ?? 0,
        outputTokens: response.usage.output ?? 0,
        cost: this.calculateCost(response.usage),
        stopReason: response.stopReason,
      },
      'Backend call completed'
    );
    return response;
  }

  async complete(request: BackendRequest): Promise<BackendResponse> {
    return this.stream(request, () => undefined);
  }

  getRemainingCapacity(): RateLimitStatus | undefined {
    return this.rateLimiter?.getStatus();
  }

  protected estimateInputTokens(text: string): number {
    return Math.ceil(text.length / 4);
  }

  calculateCost(usage: TokenUsageDelta): number {
    const inputCost = ((usage.input ?? 0) / 1000) * this.costConfig.inputTokenCostPer1k;
    const outputCost = ((usage.output ?? 0) / 1000) * this.costConfig.outputTokenCostPer1k;
    return inputCost + outputCost;
  }

  protected httpError(message: string, status: number | undefined, retryAfterMs = 0): ProviderError {
    if (status === 429) {
      return new RateLimitError(this.vendor, retryAfterMs);
    }
    const retryable = status === undefined || status === 408 || status >= 500;
    return new ProviderError(message, this.vendor, status, retryable);
  }
}
