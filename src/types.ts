export interface TokenUsage {
  input: number;
  output: number;
  total: number;
  cacheCreationInput: number;
  cacheReadInput: number;
  /** True once the totals are authoritative for the unit that produced them. */
  final: boolean;
}

export interface TokenUsageDelta {
  input?: number;
  output?: number;
  cacheCreationInput?: number;
  cacheReadInput?: number;
}

/** One decoded translation unit. */
export interface LocalizedItem {
  key: string;
  translated: string;
  comment?: string;
}

export interface TextWithContext {
  text: string;
  context?: string;
  /** Approved translations of the same string, keyed by locale. */
  references?: Record<string, string>;
}

export type TextEntry = string | TextWithContext;

export interface RateLimitConfig {
  tokensPerMinute: number;
  requestsPerMinute: number;
}

export interface RateLimitStatus {
  remainingTokens: number;
  remainingRequests: number;
  resetInMs: number;
}

export const VENDORS = ['anthropic', 'openai', 'gemini', 'mock'] as const;

export type Vendor = (typeof VENDORS)[number];

export interface ExtendedThinkingConfig {
  budgetTokens: number;
}

export interface ProviderConfig {
  vendor: Vendor;
  model: string;
  temperature: number;
  maxTokens: number;
  extendedThinking?: ExtendedThinkingConfig;
  rateLimit?: RateLimitConfig;
  extras: Record<string, unknown>;
}

export interface NamedProviderConfig extends ProviderConfig {
  /** Label used in judge prompts and output metadata. */
  name: string;
}

export interface ProviderCredentials {
  anthropicApiKey?: string;
  openaiApiKey?: string;
  geminiApiKey?: string;
}

export interface TranslationOutput {
  key: string;
  locale: string;
  value: string;
  cached: boolean;
  provider?: string;
  metadata: Record<string, unknown>;
}

export type PromptKind = 'system' | 'user' | 'judge';

export interface TranslationCallbacks {
  onStart?: (locales: string[], keyCount: number) => void;
  onTranslated?: (item: LocalizedItem, locale: string, provider: string) => void;
  onRawChunk?: (text: string) => void;
  onReasoningStart?: () => void;
  onReasoningDelta?: (text: string) => void;
  onReasoningEnd?: (fullText: string) => void;
  onTokenUsage?: (usage: TokenUsage) => void;
  onPromptGenerated?: (kind: PromptKind, text: string) => void;
  onProviderCompleted?: (locale: string, provider: string, itemCount: number) => void;
  onProgress?: (output: TranslationOutput) => void;
}

export interface BackendMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface BackendRequest {
  model: string;
  system: string;
  messages: BackendMessage[];
  temperature: number;
  maxTokens: number;
  extendedThinking?: ExtendedThinkingConfig;
  signal?: AbortSignal;
}

export type BackendStreamEvent =
  | { type: 'text'; text: string }
  | { type: 'reasoning_start' }
  | { type: 'reasoning_delta'; text: string }
  | { type: 'reasoning_end' }
  | { type: 'usage'; delta: TokenUsageDelta };

export interface BackendResponse {
  text: string;
  usage: TokenUsageDelta;
  stopReason?: string;
}

/** Performs the vendor HTTP call. */
export interface BackendClient {
  readonly vendor: string;
  readonly model: string;
  stream(request: BackendRequest, onEvent: (event: BackendStreamEvent) => void): Promise<BackendResponse>;
  complete(request: BackendRequest): Promise<BackendResponse>;
}

export type BackendFactory = (config: ProviderConfig) => BackendClient;

/** Returns rule lines appended verbatim to the system prompt. */
export type RuleLookup = (locale: string) => string[] | Promise<string[]>;

/** Returns source term to translated term pairs for a locale. */
export type GlossaryLookup = (locale: string) => Record<string, string> | Promise<Record<string, string>>;
