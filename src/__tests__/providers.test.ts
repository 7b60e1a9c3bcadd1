import { describe, it, expect } from 'vitest';
import { parseProviderConfig } from '../config/schema.js';
import { decodeResponse } from '../engine/response-decoder.js';
import { ConfigurationError } from '../errors.js';
import { getJudgePrompt, getTranslationSystemPrompt, getTranslationUserPrompt, type PromptInput } from '../prompts.js';
import {
  AnthropicBackend,
  GeminiBackend,
  MockBackend,
  OpenAIBackend,
  backendFactoryFor,
  createBackendClient,
} from '../providers/index.js';
import type { BackendRequest, BackendStreamEvent } from '../types.js';

const prompt: PromptInput = {
  sourceLocale: 'en',
  targetLocale: 'ko',
  strings: [
    { key: 'greeting', text: 'Hello' },
    { key: 'bold', text: '<b>Hi</b> & bye' },
  ],
};

function requestFor(user: string): BackendRequest {
  return {
    model: 'mock',
    system: getTranslationSystemPrompt(prompt),
    messages: [{ role: 'user', content: user }],
    temperature: 0.3,
    maxTokens: 1000,
  };
}

describe('MockBackend', () => {
  it('should translate every string to a tagged copy', async () => {
    const backend = new MockBackend();

    const response = await backend.complete(requestFor(getTranslationUserPrompt(prompt)));

    expect(decodeResponse(response.text)).toEqual([
      { key: 'greeting', translated: '[ko] Hello' },
      { key: 'bold', translated: '[ko] <b>Hi</b> & bye' },
    ]);
    expect(response.stopReason).toBe('end_turn');
  });

  it('should stream the reply in chunks between usage events', async () => {
    const backend = new MockBackend('mock', 5);
    const events: BackendStreamEvent[] = [];

    const response = await backend.stream(requestFor(getTranslationUserPrompt(prompt)), (event) => events.push(event));

    const text = events.flatMap((event) => (event.type === 'text' ? [event.text] : [])).join('');
    expect(text).toBe(response.text);
    expect(events[0]).toEqual({ type: 'usage', delta: { input: response.usage.input } });
    expect(events[events.length - 1]).toEqual({ type: 'usage', delta: { output: Math.ceil(response.text.length / 4) } });
    expect(events.filter((event) => event.type === 'text').every((event) => event.type === 'text' && event.text.length <= 5)).toBe(true);
  });

  it('should pick the first candidate for judge prompts', async () => {
    const backend = new MockBackend();
    const judgePrompt = getJudgePrompt('Hello', 'ko', [
      { provider: 'a', text: '안녕' },
      { provider: 'b', text: '안녕하세요' },
    ]);

    const response = await backend.complete({ ...requestFor(judgePrompt), system: 'judge' });

    expect(response.text).toBe('1');
  });

  it('should cost nothing', () => {
    expect(new MockBackend().calculateCost({ input: 1000, output: 1000 })).toBe(0);
  });
});

describe('createBackendClient', () => {
  it('should require the vendor API key', () => {
    const config = parseProviderConfig({ vendor: 'anthropic', model: 'claude-3-5-haiku-20241022' });

    expect(() => createBackendClient(config)).toThrow(ConfigurationError);
    expect(() => createBackendClient(config)).toThrow('ANTHROPIC_API_KEY is required for the anthropic provider');
    expect(() => createBackendClient(parseProviderConfig({ vendor: 'gemini', model: 'gemini-1.5-flash' }))).toThrow(
      'GEMINI_API_KEY is required for the gemini provider'
    );
  });

  it('should build the client for each vendor', () => {
    const credentials = { anthropicApiKey: 'test-secret', openaiApiKey: 'test-secret', geminiApiKey: 'test-secret' };
    const factory = backendFactoryFor(credentials);

    const anthropic = factory(parseProviderConfig({ vendor: 'anthropic', model: 'claude-3-5-haiku-20241022' }));
    const openai = factory(parseProviderConfig({ vendor: 'openai', model: 'gpt-4o-mini' }));
    const gemini = factory(parseProviderConfig({ vendor: 'gemini', model: 'gemini-1.5-flash' }));
    const mock = createBackendClient(parseProviderConfig({ vendor: 'mock', model: 'offline' }));

    expect(anthropic).toBeInstanceOf(AnthropicBackend);
    expect(openai).toBeInstanceOf(OpenAIBackend);
    expect(gemini).toBeInstanceOf(GeminiBackend);
    expect(mock).toBeInstanceOf(MockBackend);
    expect([anthropic.vendor, openai.vendor, gemini.vendor, mock.vendor]).toEqual([
      'anthropic',
      'openai',
      'gemini',
      'mock',
    ]);
    expect(mock.model).toBe('offline');
  });

  it('should report rate limit capacity only when a limit is configured', () => {
    const limited = new AnthropicBackend({
      apiKey: 'test-secret',
      model: 'claude-3-5-haiku-20241022',
      rateLimit: { tokensPerMinute: 1000, requestsPerMinute: 10 },
    });

    expect(limited.getRemainingCapacity()).toEqual({ remainingTokens: 1000, remainingRequests: 10, resetInMs: 0 });
    expect(new MockBackend().getRemainingCapacity()).toBeUndefined();
  });
});
