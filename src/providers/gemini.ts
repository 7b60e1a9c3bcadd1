import { GoogleGenerativeAI, GoogleGenerativeAIFetchError, type Content } from '@google/generative-ai';
import { ProviderError } from '../errors.js';
import type { BackendRequest, BackendResponse, BackendStreamEvent, TokenUsageDelta } from '../types.js';
import { BaseBackend, type BackendConfig, type CostConfig } from './base.js';

const MODEL_COSTS: Record<string, CostConfig> = {
  'gemini-1.5-pro': { inputTokenCostPer1k: 0.00125, outputTokenCostPer1k: 0.005 },
  'gemini-1.5-flash': { inputTokenCostPer1k: 0.000075, outputTokenCostPer1k: 0.0003 },
  'gemini-2.0-flash': { inputTokenCostPer1k: 0.0001, outputTokenCostPer1k: 0.0004 },
};

export class GeminiBackend extends BaseBackend {
  readonly vendor = 'gemini';
  protected readonly costConfig: CostConfig;

  private readonly client: GoogleGenerativeAI;

  constructor(config: BackendConfig) {
    super(config.model, config.rateLimit);
    this.costConfig = MODEL_COSTS[config.model] ?? MODEL_COSTS['gemini-2.0-flash'];
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  protected async executeStream(
    request: BackendRequest,
    onEvent: (event: BackendStreamEvent) => void
  ): Promise<BackendResponse> {
    const model = this.client.getGenerativeModel({
      model: request.model,
      systemInstruction: request.system,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens,
      },
    });
    const contents: Content[] = request.messages.map((message) => ({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: message.content }],
    }));

    try {
      const result = await model.generateContentStream({ contents }, { signal: request.signal });

      let text = '';
      let stopReason: string | undefined;
      for await (const chunk of result.stream) {
        const piece = chunk.text();
        if (piece) {
          text += piece;
          onEvent({ type: 'text', text: piece });
        }
        stopReason = chunk.candidates?.[0]?.finishReason ?? stopReason;
      }

      // Usage metadata is cumulative, so only the aggregated response counts.
      const metadata = (await result.response).usageMetadata;
      const usage: TokenUsageDelta = {
        input: metadata?.promptTokenCount ?? this.estimateInputTokens(request.system),
        output: metadata?.candidatesTokenCount ?? Math.ceil(text.length / 4),
      };
      onEvent({ type: 'usage', delta: usage });

      return { text, usage, stopReason };
    } catch (error) {
      if (error instanceof GoogleGenerativeAIFetchError) {
        throw this.httpError(error.message, error.status);
      }
      if (error instanceof Error && error.message.toLowerCase().includes('safety')) {
        throw new ProviderError(error.message, this.vendor, undefined, false);
      }
      throw error;
    }
  }
}
