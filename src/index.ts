export type {
  TokenUsage,
  TokenUsageDelta,
  LocalizedItem,
  TextEntry,
  TextWithContext,
  RateLimitConfig,
  RateLimitStatus,
  Vendor,
  ExtendedThinkingConfig,
  ProviderConfig,
  NamedProviderConfig,
  ProviderCredentials,
  TranslationOutput,
  PromptKind,
  TranslationCallbacks,
  BackendMessage,
  BackendRequest,
  BackendStreamEvent,
  BackendResponse,
  BackendClient,
  BackendFactory,
  RuleLookup,
  GlossaryLookup,
} from './types.js';
export { VENDORS } from './types.js';

export {
  TranslationError,
  ProviderError,
  RateLimitError,
  ProviderTimeoutError,
  VerificationFailedError,
  RetryExhaustedError,
  CircularDependencyError,
  MissingDependencyError,
  UnconfiguredProviderError,
  ConfigurationError,
  JudgeParseFailure,
  ServiceNotFoundError,
  LocaleFailedError,
  TranslationFailedError,
  isConfigurationError,
  errorMessage,
} from './errors.js';

export { loadEnvConfig, type TranslatorEnvConfig } from './config/env.js';
export { parseProviderConfig, parseProviderMap, providerConfigSchema } from './config/schema.js';

export { TranslationBuilder, translate, type TranslateOptions, type TrackChangesOptions } from './translation-builder.js';
export { TranslationResult } from './translation-result.js';

export { PipelineStages, DEFAULT_STAGE_ORDER } from './core/pipeline-stages.js';
export { PluginRegistry } from './core/plugin-registry.js';
export { TranslationContext, type ReadonlyTranslationContext } from './core/translation-context.js';
export { TranslationPipeline, type PipelineOptions } from './core/translation-pipeline.js';
export { createTranslationRequest, type TranslationRequest, type TranslationRequestInput } from './core/translation-request.js';

export { StreamingResponseDecoder, decodeResponse, type DecoderCallbacks } from './engine/response-decoder.js';
export { verifyItems, runWithVerification } from './engine/verification.js';
export { ConsensusEngine, longestCandidate, type Candidate, type FallbackSelector } from './engine/consensus.js';
export { TokenUsageAccumulator } from './engine/token-usage.js';

export type { MiddlewarePlugin, ProviderPlugin, ObserverPlugin, TranslationPlugin, PipelineEvent, Next } from './plugins/types.js';
export { PluginSettings } from './plugins/plugin-settings.js';
export { GlossaryPlugin } from './plugins/glossary.js';
export { MultiProviderPlugin } from './plugins/multi-provider.js';
export { PiiMaskingPlugin, PiiMasker } from './plugins/pii-masking.js';
export { DiffTrackingPlugin, detectChanges } from './plugins/diff-tracking.js';
export { TokenChunkingPlugin, estimateTokens, createChunks } from './plugins/token-chunking.js';
export { ValidationPlugin, validateTranslation } from './plugins/validation.js';
export { CatalogOutputPlugin } from './plugins/catalog-output.js';
export { ProgressObserver } from './plugins/progress-observer.js';

export {
  AnthropicBackend,
  OpenAIBackend,
  GeminiBackend,
  MockBackend,
  BaseBackend,
  createBackendClient,
  backendFactoryFor,
} from './providers/index.js';

export {
  MemoryStateStore,
  SqliteStateStore,
  openStateStore,
  type StateStore,
  type TranslationState,
} from './storage/state-store.js';
export { JsonCatalogTransformer, catalogResolver, type CatalogTransformer, type CatalogTree } from './catalog/json-catalog.js';

export { RateLimiter } from './utils/rate-limiter.js';
export { withRetry, type RetryConfig } from './utils/retry.js';
export { ContentHasher } from './utils/content-hash.js';

export { getTranslationSystemPrompt, getTranslationUserPrompt, getJudgePrompt } from './prompts.js';
