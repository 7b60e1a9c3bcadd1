import { TokenUsageAccumulator } from '../engine/token-usage.js';
import type { TextEntry, TokenUsage, TranslationCallbacks } from '../types.js';
import type { TranslationRequest } from './translation-request.js';

export interface ContextSnapshot {
  sourceLocale: string;
  targetLocales: string[];
  currentStage: string | null;
  textCount: number;
  translationCount: number;
  warnings: string[];
  errors: string[];
  tokenUsage: TokenUsage;
  stageTimings: Record<string, number>;
  pluginData: Record<string, Record<string, unknown>>;
  durationMs: number;
}

/** What observers get to see. */
export interface ReadonlyTranslationContext {
  readonly request: TranslationRequest;
  readonly callbacks: TranslationCallbacks;
  readonly texts: Readonly<Record<string, TextEntry>>;
  readonly currentStage: string | null;
  readonly warnings: readonly string[];
  readonly errors: readonly string[];
  readonly tokenUsage: TokenUsage;
  readonly durationMs: number;
  getTranslations(locale: string): Record<string, string>;
  hasTranslation(locale: string, key: string): boolean;
  isSkipped(locale: string, key: string): boolean;
  pendingKeys(locale: string): string[];
  getPluginData(plugin: string, key: string): unknown;
  configOverlay(plugin: string): Record<string, unknown> | undefined;
  stageTiming(stage: string): number | undefined;
  snapshot(): ContextSnapshot;
}

export interface TranslationContextOptions {
  callbacks?: TranslationCallbacks;
  /** Merged tenant and request overrides, by plugin name. */
  overlays?: ReadonlyMap<string, Record<string, unknown>>;
}

/**
 * Mutable state for one pipeline run. Only the pipeline and the plugins it
 * invokes write to it.
 */
export class TranslationContext implements ReadonlyTranslationContext {
  /** Working set of source texts; narrowed by filtering and chunking. */
  texts: Record<string, TextEntry>;
  currentStage: string | null = null;

  readonly callbacks: TranslationCallbacks;
  readonly usage = new TokenUsageAccumulator();
  private readonly translations = new Map<string, Map<string, string>>();
  private readonly warningList: string[] = [];
  private readonly errorList: string[] = [];
  private readonly skipped = new Map<string, Set<string>>();
  private readonly pluginData = new Map<string, Map<string, unknown>>();
  private readonly stageTimings = new Map<string, number>();
  private readonly overlays: ReadonlyMap<string, Record<string, unknown>>;
  private readonly startedAt = Date.now();
  private completedAt: number | undefined;

  constructor(
    readonly request: TranslationRequest,
    options: TranslationContextOptions = {}
  ) {
    this.texts = { ...request.texts };
    this.callbacks = options.callbacks ?? {};
    this.overlays = options.overlays ?? new Map();
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  get tokenUsage(): TokenUsage {
    return this.usage.snapshot();
  }

  get durationMs(): number {
    return (this.completedAt ?? Date.now()) - this.startedAt;
  }

  setTranslation(locale: string, key: string, value: string): void {
    let entries = this.translations.get(locale);
    if (!entries) {
      entries = new Map();
      this.translations.set(locale, entries);
    }
    entries.set(key, value);
  }

  removeTranslation(locale: string, key: string): void {
    this.translations.get(locale)?.delete(key);
  }

  getTranslation(locale: string, key: string): string | undefined {
    return this.translations.get(locale)?.get(key);
  }

  getTranslations(locale: string): Record<string, string> {
    return Object.fromEntries(this.translations.get(locale) ?? []);
  }

  allTranslations(): Record<string, Record<string, string>> {
    const result: Record<string, Record<string, string>> = {};
    for (const [locale, entries] of this.translations) {
      result[locale] = Object.fromEntries(entries);
    }
    return result;
  }

  hasTranslation(locale: string, key: string): boolean {
    return this.translations.get(locale)?.has(key) ?? false;
  }

  addWarning(message: string): void {
    this.warningList.push(message);
  }

  addError(message: string): void {
    this.errorList.push(message);
  }

  /** Marks a key as not needing translation for a locale. */
  skip(locale: string, key: string): void {
    let keys = this.skipped.get(locale);
    if (!keys) {
      keys = new Set();
      this.skipped.set(locale, keys);
    }
    keys.add(key);
  }

  isSkipped(locale: string, key: string): boolean {
    return this.skipped.get(locale)?.has(key) ?? false;
  }

  /** Keys of the working set that still need a translation for `locale`. */
  pendingKeys(locale: string): string[] {
    return Object.keys(this.texts).filter((key) => !this.isSkipped(locale, key));
  }

  setPluginData(plugin: string, key: string, value: unknown): void {
    let data = this.pluginData.get(plugin);
    if (!data) {
      data = new Map();
      this.pluginData.set(plugin, data);
    }
    data.set(key, value);
  }

  getPluginData(plugin: string, key: string): unknown {
    return this.pluginData.get(plugin)?.get(key);
  }

  configOverlay(plugin: string): Record<string, unknown> | undefined {
    return this.overlays.get(plugin);
  }

  recordStageTiming(stage: string, elapsedMs: number): void {
    this.stageTimings.set(stage, (this.stageTimings.get(stage) ?? 0) + elapsedMs);
  }

  stageTiming(stage: string): number | undefined {
    return this.stageTimings.get(stage);
  }

  complete(): void {
    this.completedAt ??= Date.now();
  }

  snapshot(): ContextSnapshot {
    let translationCount = 0;
    for (const entries of this.translations.values()) {
      translationCount += entries.size;
    }
    const pluginData: Record<string, Record<string, unknown>> = {};
    for (const [plugin, data] of this.pluginData) {
      pluginData[plugin] = Object.fromEntries(data);
    }

    return {
      sourceLocale: this.request.sourceLocale,
      targetLocales: [...this.request.targetLocales],
      currentStage: this.currentStage,
      textCount: Object.keys(this.texts).length,
      translationCount,
      warnings: [...this.warningList],
      errors: [...this.errorList],
      tokenUsage: this.tokenUsage,
      stageTimings: Object.fromEntries(this.stageTimings),
      pluginData,
      durationMs: this.durationMs,
    };
  }
}
