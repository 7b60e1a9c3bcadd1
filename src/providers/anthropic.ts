import Anthropic from '@anthropic-ai/sdk';
import type { BackendRequest, BackendResponse, BackendStreamEvent, TokenUsageDelta } from '../types.js';
import { BaseBackend, type BackendConfig, type CostConfig } from './base.js';

const MODEL_COSTS: Record<string, CostConfig> = {
  'claude-sonnet-4-20250514': { inputTokenCostPer1k: 0.003, outputTokenCostPer1k: 0.015 },
  'claude-3-7-sonnet-20250219': { inputTokenCostPer1k: 0.003, outputTokenCostPer1k: 0.015 },
  'claude-3-5-sonnet-20241022': { inputTokenCostPer1k: 0.003, outputTokenCostPer1k: 0.015 },
  'claude-3-5-haiku-20241022': { inputTokenCostPer1k: 0.0008, outputTokenCostPer1k: 0.004 },
};

function retryAfterMs(headers: Record<string, string | null | undefined> | undefined): number {
  const seconds = Number(headers?.['retry-after']);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
}

export class AnthropicBackend extends BaseBackend {
  readonly vendor = 'anthropic';
  protected readonly costConfig: CostConfig;

  private readonly client: Anthropic;

  constructor(config: BackendConfig) {
    super(config.model, config.rateLimit);
    this.costConfig = MODEL_COSTS[config.model] ?? MODEL_COSTS['claude-sonnet-4-20250514'];
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  protected async executeStream(
    request: BackendRequest,
    onEvent: (event: BackendStreamEvent) => void
  ): Promise<BackendResponse> {
    const params: Anthropic.MessageCreateParamsStreaming = {
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
      stream: true,
    };
    // Extended thinking only accepts the default temperature.
    if (request.extendedThinking) {
      params.thinking = { type: 'enabled', budget_tokens: request.extendedThinking.budgetTokens };
    } else {
      params.temperature = request.temperature;
    }

    try {
      const stream = await this.client.messages.create(params, { signal: request.signal });

      let text = '';
      let stopReason: string | undefined;
      let reportedOutput = 0;
      const totals: Required<TokenUsageDelta> = { input: 0, output: 0, cacheCreationInput: 0, cacheReadInput: 0 };
      const blockTypes = new Map<number, string>();

      for await (const event of stream) {
        switch (event.type) {
          case 'message_start': {
            const usage = event.message.usage;
            const delta: Required<TokenUsageDelta> = {
              input: usage.input_tokens,
              output: usage.output_tokens,
              cacheCreationInput: usage.cache_creation_input_tokens ?? 0,
              cacheReadInput: usage.cache_read_input_tokens ?? 0,
            };
            reportedOutput = usage.output_tokens;
            totals.input += delta.input;
            totals.output += delta.output;
            totals.cacheCreationInput += delta.cacheCreationInput;
            totals.cacheReadInput += delta.cacheReadInput;
            onEvent({ type: 'usage', delta });
            break;
          }
          case 'content_block_start':
            blockTypes.set(event.index, event.content_block.type);
            if (event.content_block.type === 'thinking') onEvent({ type: 'reasoning_start' });
            break;
          case 'content_block_delta':
            if (event.delta.type === 'text_delta') {
              text += event.delta.text;
              onEvent({ type: 'text', text: event.delta.text });
            } else if (event.delta.type === 'thinking_delta') {
              onEvent({ type: 'reasoning_delta', text: event.delta.thinking });
            }
            break;
          case 'content_block_stop':
            if (blockTypes.get(event.index) === 'thinking') onEvent({ type: 'reasoning_end' });
            break;
          case 'message_delta': {
            // Output counts on message_delta are cumulative.
            const added = event.usage.output_tokens - reportedOutput;
            reportedOutput = event.usage.output_tokens;
            if (added > 0) {
              totals.output += added;
              onEvent({ type: 'usage', delta: { output: added } });
            }
            stopReason = event.delta.stop_reason ?? undefined;
            break;
          }
        }
      }

      return { text, usage: totals, stopReason };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw this.httpError(error.message, error.status, retryAfterMs(error.headers));
      }
      throw error;
    }
  }
}
