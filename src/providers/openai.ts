import OpenAI from 'openai';
import type { BackendRequest, BackendResponse, BackendStreamEvent, TokenUsageDelta } from '../types.js';
import { BaseBackend, type BackendConfig, type CostConfig } from './base.js';

const MODEL_COSTS: Record<string, CostConfig> = {
  'gpt-4o': { inputTokenCostPer1k: 0.0025, outputTokenCostPer1k: 0.01 },
  'gpt-4o-mini': { inputTokenCostPer1k: 0.00015, outputTokenCostPer1k: 0.0006 },
  'gpt-4.1': { inputTokenCostPer1k: 0.002, outputTokenCostPer1k: 0.008 },
  'gpt-5': { inputTokenCostPer1k: 0.00125, outputTokenCostPer1k: 0.01 },
};

export class OpenAIBackend extends BaseBackend {
  readonly vendor = 'openai';
  protected readonly costConfig: CostConfig;

  private readonly client: OpenAI;

  constructor(config: BackendConfig & { baseURL?: string }) {
    super(config.model, config.rateLimit);
    this.costConfig = MODEL_COSTS[config.model] ?? MODEL_COSTS['gpt-4o'];
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  protected async executeStream(
    request: BackendRequest,
    onEvent: (event: BackendStreamEvent) => void
  ): Promise<BackendResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [{ role: 'system', content: request.system }];
    for (const message of request.messages) {
      messages.push(
        message.role === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content }
      );
    }

    try {
      const stream = await this.client.chat.completions.create(
        {
          model: request.model,
          messages,
          temperature: request.temperature,
          max_completion_tokens: request.maxTokens,
          stream: true,
          stream_options: { include_usage: true },
        },
        { signal: request.signal }
      );

      let text = '';
      let stopReason: string | undefined;
      let usage: TokenUsageDelta = {};

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        const content = choice?.delta?.content;
        if (content) {
          text += content;
          onEvent({ type: 'text', text: content });
        }
        if (choice?.finish_reason) stopReason = choice.finish_reason;
        if (chunk.usage) {
          usage = {
            input: chunk.usage.prompt_tokens,
            output: chunk.usage.completion_tokens,
            cacheReadInput: chunk.usage.prompt_tokens_details?.cached_tokens ?? 0,
          };
          onEvent({ type: 'usage', delta: usage });
        }
      }

      return { text, usage, stopReason };
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw this.httpError(error.message, error.status);
      }
      throw error;
    }
  }
}
