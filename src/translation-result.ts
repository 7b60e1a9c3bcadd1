import type { TranslationContext } from './core/translation-context.js';
import type { TokenUsage, TranslationOutput } from './types.js';

/** What a finished run hands back: translations, final usage and diagnostics. */
export class TranslationResult {
  readonly translations: Record<string, Record<string, string>>;
  readonly tokenUsage: TokenUsage;
  readonly warnings: string[];
  readonly errors: string[];
  readonly outputs: TranslationOutput[];
  readonly durationMs: number;

  constructor(context: TranslationContext, outputs: TranslationOutput[]) {
    const translations: Record<string, Record<string, string>> = {};
    for (const locale of context.request.targetLocales) {
      const entries: Record<string, string> = {};
      for (const [key, value] of Object.entries(context.getTranslations(locale))) {
        if (key in context.request.texts) entries[key] = value;
      }
      translations[locale] = entries;
    }

    this.translations = translations;
    this.tokenUsage = context.usage.finalize();
    this.warnings = [...context.warnings];
    this.errors = [...context.errors];
    this.outputs = outputs;
    this.durationMs = context.durationMs;
  }

  get(locale: string, key: string): string | undefined {
    return this.translations[locale]?.[key];
  }

  forLocale(locale: string): Record<string, string> {
    return { ...(this.translations[locale] ?? {}) };
  }

  get translatedCount(): number {
    return Object.values(this.translations).reduce((count, entries) => count + Object.keys(entries).length, 0);
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }
}
