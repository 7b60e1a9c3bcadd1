import type { CatalogResolver, CatalogTransformer } from './catalog/json-catalog.js';
import { defaultProviderInput, loadEnvConfig } from './config/env.js';
import { PluginRegistry } from './core/plugin-registry.js';
import { TranslationPipeline } from './core/translation-pipeline.js';
import {
  createTranslationRequest,
  type TranslationRequest,
  type TranslationRequestInput,
} from './core/translation-request.js';
import type { FallbackSelector } from './engine/consensus.js';
import { ConfigurationError, TranslationFailedError } from './errors.js';
import { CatalogOutputPlugin } from './plugins/catalog-output.js';
import { DiffTrackingPlugin } from './plugins/diff-tracking.js';
import { GlossaryPlugin } from './plugins/glossary.js';
import { MultiProviderPlugin } from './plugins/multi-provider.js';
import { PiiMaskingPlugin } from './plugins/pii-masking.js';
import { ProgressObserver } from './plugins/progress-observer.js';
import { TokenChunkingPlugin } from './plugins/token-chunking.js';
import type { TranslationPlugin } from './plugins/types.js';
import { ValidationPlugin } from './plugins/validation.js';
import { backendFactoryFor } from './providers/index.js';
import { openStateStore, type StateStore } from './storage/state-store.js';
import { TranslationResult } from './translation-result.js';
import type {
  BackendFactory,
  GlossaryLookup,
  ProviderCredentials,
  RuleLookup,
  TextEntry,
  TranslationCallbacks,
  TranslationOutput,
} from './types.js';

export interface TrackChangesOptions {
  /** Defaults to `openStateStore()`, shared by every run of this builder. */
  store?: StateStore;
  config?: Record<string, unknown>;
}

type Catalogs = CatalogResolver | Readonly<Record<string, CatalogTransformer>>;

/**
 * Fluent setup for one translation job. Each call to `translate` or
 * `stream` builds a fresh pipeline from the current settings.
 */
export class TranslationBuilder {
  private sourceLocale = '';
  private targetLocales: string[] = [];
  private providers: Record<string, Record<string, unknown>> = {};
  private judge?: Record<string, unknown>;
  private consensus: Record<string, unknown> = {};
  private glossary: Record<string, string> = {};
  private glossaryLookup?: GlossaryLookup;
  private rules: string[] = [];
  private ruleLookup?: RuleLookup;
  private diffTracking?: TrackChangesOptions;
  private stateStore?: StateStore;
  private catalogs?: Catalogs;
  private chunking?: Record<string, unknown>;
  private validation?: Record<string, unknown>;
  private piiMasking?: Record<string, unknown>;
  private tenantId?: string;
  private metadata: Record<string, unknown> = {};
  private approved: Record<string, Record<string, string>> = {};
  private requestOptions: Record<string, unknown> = {};
  private callbacks: TranslationCallbacks = {};
  private backendFactory?: BackendFactory;
  private credentials?: ProviderCredentials;
  private fallbackSelector?: FallbackSelector;
  private extraPlugins: TranslationPlugin[] = [];

  static create(): TranslationBuilder {
    return new TranslationBuilder();
  }

  from(locale: string): this {
    this.sourceLocale = locale;
    return this;
  }

  to(locales: string | readonly string[]): this {
    this.targetLocales = typeof locales === 'string' ? [locales] : [...locales];
    return this;
  }

  /** Provider name to provider config (`vendor`, `model`, and optional tuning). */
  withProviders(providers: Record<string, Record<string, unknown>>): this {
    this.providers = { ...this.providers, ...providers };
    return this;
  }

  withJudge(config: Record<string, unknown>): this {
    this.judge = config;
    return this;
  }

  /** Consensus tuning such as `executionMode`, `retryAttempts` or `timeoutMs`. */
  withConsensus(settings: Record<string, unknown>): this {
    this.consensus = { ...this.consensus, ...settings };
    return this;
  }

  withGlossary(glossary: Record<string, string> | GlossaryLookup): this {
    if (typeof glossary === 'function') this.glossaryLookup = glossary;
    else this.glossary = { ...this.glossary, ...glossary };
    return this;
  }

  withRules(rules: readonly string[] | RuleLookup): this {
    if (typeof rules === 'function') this.ruleLookup = rules;
    else this.rules = [...this.rules, ...rules];
    return this;
  }

  trackChanges(options: TrackChangesOptions = {}): this {
    this.diffTracking = options;
    return this;
  }

  /** Target catalogs: already translated keys are skipped and results are written back. */
  withCatalog(catalogs: Catalogs): this {
    this.catalogs = catalogs;
    this.diffTracking ??= {};
    return this;
  }

  withTokenChunking(config: Record<string, unknown> = {}): this {
    this.chunking = config;
    return this;
  }

  withValidation(config: Record<string, unknown> = {}): this {
    this.validation = config;
    return this;
  }

  /** Masks personal data before anything is sent to a backend. */
  secure(config: Record<string, unknown> = {}): this {
    this.piiMasking = config;
    return this;
  }

  forTenant(tenantId: string): this {
    this.tenantId = tenantId;
    return this;
  }

  /** Approved translations for a locale, shown to the model for consistency. */
  withReference(locale: string, translations: Record<string, string>): this {
    this.approved[locale] = { ...this.approved[locale], ...translations };
    return this;
  }

  withMetadata(metadata: Record<string, unknown>): this {
    this.metadata = { ...this.metadata, ...metadata };
    return this;
  }

  withCallbacks(callbacks: TranslationCallbacks): this {
    this.callbacks = { ...this.callbacks, ...callbacks };
    return this;
  }

  onProgress(listener: (output: TranslationOutput) => void): this {
    this.callbacks = { ...this.callbacks, onProgress: listener };
    return this;
  }

  option(name: string, value: unknown): this {
    this.requestOptions[name] = value;
    return this;
  }

  options(values: Record<string, unknown>): this {
    this.requestOptions = { ...this.requestOptions, ...values };
    return this;
  }

  withBackendFactory(factory: BackendFactory): this {
    this.backendFactory = factory;
    return this;
  }

  withCredentials(credentials: ProviderCredentials): this {
    this.credentials = credentials;
    return this;
  }

  withFallbackSelector(selector: FallbackSelector): this {
    this.fallbackSelector = selector;
    return this;
  }

  withPlugin(plugin: TranslationPlugin): this {
    this.extraPlugins.push(plugin);
    return this;
  }

  buildRequest(texts: Record<string, TextEntry>): TranslationRequest {
    if (!this.sourceLocale.trim()) {
      throw new ConfigurationError('Source locale is required');
    }
    if (this.targetLocales.length === 0) {
      throw new ConfigurationError('Target locale(s) required');
    }
    if (Object.keys(this.providers).length === 0) {
      throw new ConfigurationError('At least one provider is required');
    }

    const input: TranslationRequestInput = {
      sourceLocale: this.sourceLocale,
      targetLocales: this.targetLocales,
      texts,
      metadata: Object.keys(this.approved).length > 0 ? { ...this.metadata, approved: this.approved } : this.metadata,
      options: this.requestOptions,
      tenantId: this.tenantId,
    };
    return createTranslationRequest(input);
  }

  buildPipeline(): TranslationPipeline {
    const registry = new PluginRegistry();

    if (this.piiMasking) registry.register(new PiiMaskingPlugin(this.piiMasking));
    if (this.diffTracking) {
      registry.register(
        new DiffTrackingPlugin({
          config: this.diffTracking.config,
          store: this.diffTracking.store ?? (this.stateStore ??= openStateStore()),
          catalogs: this.catalogs,
        })
      );
    }
    registry.register(
      new GlossaryPlugin({
        config: { glossary: this.glossary, rules: this.rules },
        glossaryLookup: this.glossaryLookup,
        ruleLookup: this.ruleLookup,
      })
    );
    if (this.chunking) registry.register(new TokenChunkingPlugin(this.chunking));
    registry.register(
      new MultiProviderPlugin({
        config: { ...this.consensus, providers: this.providers, ...(this.judge ? { judge: this.judge } : {}) },
        backendFactory: this.backendFactory ?? backendFactoryFor(this.credentials ?? loadEnvConfig().credentials),
        fallbackSelector: this.fallbackSelector,
      })
    );
    if (this.validation) registry.register(new ValidationPlugin(this.validation));
    if (this.catalogs) registry.register(new CatalogOutputPlugin(this.catalogs));
    registry.register(new ProgressObserver());
    for (const plugin of this.extraPlugins) {
      registry.register(plugin);
    }

    return new TranslationPipeline(registry);
  }

  /** Outputs in completion order. */
  async *stream(texts: Record<string, TextEntry>): AsyncGenerator<TranslationOutput> {
    const request = this.buildRequest(texts);
    yield* this.buildPipeline().process(request, this.callbacks);
  }

  /**
   * Runs the job to completion. Fails only when nothing usable came back and
   * at least one locale failed; otherwise warnings travel with the result.
   */
  async translate(texts: Record<string, TextEntry>): Promise<TranslationResult> {
    const request = this.buildRequest(texts);
    const pipeline = this.buildPipeline();
    const context = pipeline.createContext(request, this.callbacks);

    const outputs: TranslationOutput[] = [];
    for await (const output of pipeline.execute(context)) {
      outputs.push(output);
    }

    const result = new TranslationResult(context, outputs);
    if (result.translatedCount === 0 && result.errors.length > 0) {
      throw new TranslationFailedError(result.errors);
    }
    return result;
  }
}

export interface TranslateOptions {
  /** Defaults to the single provider described by the environment. */
  providers?: Record<string, Record<string, unknown>>;
  judge?: Record<string, unknown>;
  consensus?: Record<string, unknown>;
  callbacks?: TranslationCallbacks;
  backendFactory?: BackendFactory;
  credentials?: ProviderCredentials;
  catalogs?: Catalogs;
  rules?: readonly string[] | RuleLookup;
  glossary?: Record<string, string> | GlossaryLookup;
}

/** One-call entry point over the default pipeline. */
export async function translate(
  input: Omit<TranslationRequestInput, 'pluginConfigs'>,
  options: TranslateOptions = {}
): Promise<TranslationResult> {
  const builder = TranslationBuilder.create()
    .from(input.sourceLocale)
    .to(input.targetLocales)
    .withMetadata(input.metadata ?? {})
    .options(input.options ?? {});

  if (options.providers) {
    builder.withProviders(options.providers);
  } else {
    const env = loadEnvConfig();
    builder.withProviders({ [env.provider]: defaultProviderInput(env) }).withConsensus({
      retryAttempts: env.retries,
      timeoutMs: env.timeoutMs,
    });
    builder.withCredentials(options.credentials ?? env.credentials);
  }
  if (options.credentials) builder.withCredentials(options.credentials);
  if (options.judge) builder.withJudge(options.judge);
  if (options.consensus) builder.withConsensus(options.consensus);
  if (options.callbacks) builder.withCallbacks(options.callbacks);
  if (options.backendFactory) builder.withBackendFactory(options.backendFactory);
  if (options.catalogs) builder.withCatalog(options.catalogs);
  if (options.rules) builder.withRules(options.rules);
  if (options.glossary) builder.withGlossary(options.glossary);
  if (input.tenantId) builder.forTenant(input.tenantId);

  return builder.translate(input.texts);
}
