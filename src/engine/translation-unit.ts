import {
  getTranslationSystemPrompt,
  getTranslationUserPrompt,
  type PromptInput,
} from '../prompts.js';
import type {
  BackendClient,
  BackendStreamEvent,
  LocalizedItem,
  NamedProviderConfig,
  TokenUsage,
  TranslationCallbacks,
} from '../types.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { StreamingResponseDecoder } from './response-decoder.js';
import { TokenUsageAccumulator } from './token-usage.js';
import { runWithVerification, stripKeyPrefix } from './verification.js';

export interface UnitOptions {
  attempts: number;
  timeoutMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  callbacks: TranslationCallbacks;
  /** Receives the unit's final token total, on success and on failure. */
  onUsage?: (usage: TokenUsage) => void;
  /** Cancels the unit: the running call, pending backoff and later attempts. */
  signal?: AbortSignal;
}

export interface UnitResult {
  provider: string;
  items: LocalizedItem[];
  warnings: string[];
  attempts: number;
  usage: TokenUsage;
}

const log = createLogger('translation-unit');

/**
 * One provider translating one key set into one locale. Each attempt gets its
 * own decoder, and nothing from an attempt that failed or timed out is kept.
 * The unit's token total is reported as final exactly once.
 */
export async function runTranslationUnit(
  prompt: PromptInput,
  provider: NamedProviderConfig,
  backend: BackendClient,
  options: UnitOptions
): Promise<UnitResult> {
  const { callbacks } = options;
  const system = getTranslationSystemPrompt(prompt);
  const user = getTranslationUserPrompt(prompt);
  callbacks.onPromptGenerated?.('system', system);
  callbacks.onPromptGenerated?.('user', user);

  const usage = new TokenUsageAccumulator(callbacks.onTokenUsage);
  const sourceKeys = prompt.strings.map((entry) => entry.key);

  try {
    const verified = await runWithVerification(
      async () => {
        let live = true;
        const decoder = new StreamingResponseDecoder({
          onItem: (item) =>
            callbacks.onTranslated?.(
              { ...item, key: stripKeyPrefix(item.key, prompt.keyPrefix) },
              prompt.targetLocale,
              provider.name
            ),
          onReasoningStart: () => callbacks.onReasoningStart?.(),
          onReasoningDelta: (text) => callbacks.onReasoningDelta?.(text),
          onReasoningEnd: (text) => callbacks.onReasoningEnd?.(text),
        });

        let reasoning = '';
        const onEvent = (event: BackendStreamEvent): void => {
          if (!live) return;
          switch (event.type) {
            case 'text':
              callbacks.onRawChunk?.(event.text);
              decoder.feed(event.text);
              break;
            case 'reasoning_start':
              reasoning = '';
              callbacks.onReasoningStart?.();
              break;
            case 'reasoning_delta':
              reasoning += event.text;
              callbacks.onReasoningDelta?.(event.text);
              break;
            case 'reasoning_end':
              callbacks.onReasoningEnd?.(reasoning);
              reasoning = '';
              break;
            case 'usage':
              usage.record(event.delta);
              break;
          }
        };

        try {
          const response = await withTimeout(provider.name, options.timeoutMs, (signal) =>
            backend.stream(
              {
                model: provider.model,
                system,
                messages: [{ role: 'user', content: user }],
                temperature: provider.temperature,
                maxTokens: provider.maxTokens,
                extendedThinking: provider.extendedThinking,
                signal,
              },
              onEvent
            ),
            options.signal
          );
          return decoder.finish(response.text);
        } finally {
          live = false;
        }
      },
      sourceKeys,
      {
        attempts: options.attempts,
        baseDelayMs: options.retryBaseDelayMs,
        maxDelayMs: options.retryMaxDelayMs,
        keyPrefix: prompt.keyPrefix,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) =>
          log.warn(
            { provider: provider.name, locale: prompt.targetLocale, attempt, delayMs },
            `Attempt failed, retrying: ${errorMessage(error)}`
          ),
      }
    );

    return {
      provider: provider.name,
      items: verified.items,
      warnings: verified.warnings.map((warning) => `[${provider.name}/${prompt.targetLocale}] ${warning}`),
      attempts: verified.attempts,
      usage: usage.finalize(),
    };
  } finally {
    options.onUsage?.(usage.finalize());
  }
}
