import { z } from 'zod';
import { loadEnvConfig } from '../config/env.js';
import { isRecord, parseProviderConfig, parseProviderMap } from '../config/schema.js';
import type { TranslationContext } from '../core/translation-context.js';
import { keyPrefixOf, textOf } from '../core/translation-request.js';
import {
  ConsensusEngine,
  type FallbackSelector,
  type LocaleResolution,
} from '../engine/consensus.js';
import { errorMessage, isConfigurationError } from '../errors.js';
import type { PromptInput, PromptString } from '../prompts.js';
import { backendFactoryFor } from '../providers/index.js';
import type { BackendFactory, ProviderCredentials, TranslationOutput } from '../types.js';
import { glossaryFor } from './glossary.js';
import { PluginSettings } from './plugin-settings.js';
import type { ProviderPlugin } from './types.js';

export const MULTI_PROVIDER_PLUGIN = 'multi_provider';
export const MULTI_PROVIDER_SERVICE = 'translation.multi_provider';

export const multiProviderConfigSchema = z.object({
  /** Provider name to provider config; validated per run. */
  providers: z.record(z.record(z.unknown())).default({}),
  judge: z.record(z.unknown()).optional(),
  executionMode: z.enum(['parallel', 'sequential']).default('parallel'),
  consensusThreshold: z.number().int().min(1).default(2),
  fallbackOnFailure: z.boolean().default(true),
  retryAttempts: z.number().int().min(1).default(2),
  timeoutMs: z.number().int().min(0).default(30000),
  retryBaseDelayMs: z.number().int().min(0).default(1000),
  retryMaxDelayMs: z.number().int().min(0).default(10000),
  temperatureOverrides: z.record(z.number()).default({ 'gpt-5': 1 }),
});

export type MultiProviderConfig = z.infer<typeof multiProviderConfigSchema>;

export interface MultiProviderOptions {
  config?: Record<string, unknown>;
  backendFactory?: BackendFactory;
  credentials?: ProviderCredentials;
  fallbackSelector?: FallbackSelector;
}

type LocaleOutcome =
  | { locale: string; ok: true; resolution: LocaleResolution }
  | { locale: string; ok: false; error: unknown };

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
}

/**
 * Runs every target locale through the consensus engine at once and yields
 * each locale's translations as soon as that locale resolves.
 */
export class MultiProviderPlugin implements ProviderPlugin {
  readonly kind = 'provider';
  readonly name = MULTI_PROVIDER_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 50;
  readonly dependencies: readonly string[] = [];
  readonly provides = [MULTI_PROVIDER_SERVICE];
  readonly when: readonly string[] = [];

  private readonly settings: PluginSettings<MultiProviderConfig>;
  private readonly backendFactory: BackendFactory;
  private readonly fallbackSelector?: FallbackSelector;

  constructor(options: MultiProviderOptions = {}) {
    this.settings = new PluginSettings(MULTI_PROVIDER_PLUGIN, multiProviderConfigSchema, options.config);
    this.backendFactory =
      options.backendFactory ?? backendFactoryFor(options.credentials ?? loadEnvConfig(process.env).credentials);
    this.fallbackSelector = options.fallbackSelector;
  }

  async *execute(context: TranslationContext): AsyncGenerator<TranslationOutput> {
    const config = this.settings.resolve(context);
    const engine = new ConsensusEngine(
      {
        providers: parseProviderMap(config.providers),
        judge: config.judge ? parseProviderConfig(config.judge) : undefined,
        executionMode: config.executionMode,
        consensusThreshold: config.consensusThreshold,
        fallbackOnFailure: config.fallbackOnFailure,
        retryAttempts: config.retryAttempts,
        timeoutMs: config.timeoutMs,
        retryBaseDelayMs: config.retryBaseDelayMs,
        retryMaxDelayMs: config.retryMaxDelayMs,
        temperatureOverrides: config.temperatureOverrides,
      },
      {
        backendFactory: this.backendFactory,
        fallbackSelector: this.fallbackSelector,
        logger: this.settings.logger,
      }
    );

    // Aborted when the consumer stops reading, so no locale keeps calling backends.
    const controller = new AbortController();
    const pending = new Map<string, Promise<LocaleOutcome>>();
    for (const locale of context.request.targetLocales) {
      const prompt = this.buildPrompt(context, locale);
      if (prompt.strings.length === 0) continue;

      const job = engine
        .translateLocale({
          prompt,
          callbacks: context.callbacks,
          onUsage: (usage) => context.usage.absorb(usage),
          signal: controller.signal,
        })
        .then(
          (resolution): LocaleOutcome => ({ locale, ok: true, resolution }),
          (error: unknown): LocaleOutcome => ({ locale, ok: false, error })
        );
      pending.set(locale, job);
    }

    try {
      while (pending.size > 0) {
        const outcome = await Promise.race(pending.values());
        pending.delete(outcome.locale);

        if (!outcome.ok) {
          if (isConfigurationError(outcome.error)) throw outcome.error;
          this.settings.logger.error({ locale: outcome.locale, err: outcome.error }, 'Locale failed');
          context.addError(errorMessage(outcome.error));
          continue;
        }

        const { resolution } = outcome;
        for (const warning of resolution.warnings) {
          context.addWarning(warning);
        }
        for (const translation of resolution.translations) {
          context.setTranslation(resolution.locale, translation.key, translation.value);
          yield {
            key: translation.key,
            locale: resolution.locale,
            value: translation.value,
            cached: false,
            provider: translation.provider,
            metadata: { method: translation.method, candidates: translation.candidates },
          };
        }
      }
    } finally {
      if (pending.size > 0) {
        controller.abort();
        this.settings.logger.info({ locales: [...pending.keys()] }, 'Cancelled unfinished locales');
      }
    }
  }

  private buildPrompt(context: TranslationContext, locale: string): PromptInput {
    const { request } = context;
    const strings: PromptString[] = [];
    for (const key of context.pendingKeys(locale)) {
      const entry = context.texts[key];
      if (entry === undefined) continue;
      strings.push(
        typeof entry === 'string'
          ? { key, text: entry }
          : { key, text: textOf(entry), context: entry.context, references: entry.references }
      );
    }

    const glossary = glossaryFor(context, locale);
    const approved = isRecord(request.metadata.approved) ? stringRecord(request.metadata.approved[locale]) : undefined;
    const filename = request.metadata.filename;

    return {
      sourceLocale: request.sourceLocale,
      targetLocale: locale,
      strings,
      rules: glossary?.rules,
      glossary: glossary?.terms,
      keyPrefix: keyPrefixOf(request),
      filename: typeof filename === 'string' ? filename : undefined,
      approved,
      localeNames: stringRecord(request.metadata.localeNames),
    };
  }
}
