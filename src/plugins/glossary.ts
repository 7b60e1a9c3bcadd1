import { z } from 'zod';
import { isRecord } from '../config/schema.js';
import { PipelineStages } from '../core/pipeline-stages.js';
import type { ReadonlyTranslationContext, TranslationContext } from '../core/translation-context.js';
import type { GlossaryLookup, RuleLookup, TranslationOutput } from '../types.js';
import { PluginSettings } from './plugin-settings.js';
import type { ProviderPlugin } from './types.js';

export const GLOSSARY_PLUGIN = 'glossary';

export const glossaryConfigSchema = z.object({
  /** Source term to target term, applied to every locale. */
  glossary: z.record(z.string()).default({}),
  /** Rule lines for every locale, ahead of looked-up ones. */
  rules: z.array(z.string()).default([]),
  /** Per-locale terms; these win over `glossary`. */
  locales: z.record(z.record(z.string())).default({}),
});

export type GlossaryConfig = z.infer<typeof glossaryConfigSchema>;

export interface LocaleGlossary {
  rules: string[];
  terms: Record<string, string>;
}

export interface GlossaryPluginOptions {
  config?: Record<string, unknown>;
  ruleLookup?: RuleLookup;
  glossaryLookup?: GlossaryLookup;
}

function isLocaleGlossary(value: unknown): value is LocaleGlossary {
  if (!isRecord(value) || !Array.isArray(value.rules) || !isRecord(value.terms)) return false;
  return (
    value.rules.every((rule) => typeof rule === 'string') &&
    Object.values(value.terms).every((term) => typeof term === 'string')
  );
}

/** Rules and terms the glossary plugin collected for a locale, if it ran. */
export function glossaryFor(context: ReadonlyTranslationContext, locale: string): LocaleGlossary | undefined {
  const data = context.getPluginData(GLOSSARY_PLUGIN, locale);
  return isLocaleGlossary(data) ? data : undefined;
}

/** Collects rule lines and glossary terms per target locale for the prompts. */
export class GlossaryPlugin implements ProviderPlugin {
  readonly kind = 'provider';
  readonly name = GLOSSARY_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 80;
  readonly dependencies: readonly string[] = [];
  readonly provides = ['glossary.lookup'];
  readonly when = [PipelineStages.PREPARATION];

  private readonly settings: PluginSettings<GlossaryConfig>;
  private readonly ruleLookup?: RuleLookup;
  private readonly glossaryLookup?: GlossaryLookup;

  constructor(options: GlossaryPluginOptions = {}) {
    this.settings = new PluginSettings(GLOSSARY_PLUGIN, glossaryConfigSchema, options.config);
    this.ruleLookup = options.ruleLookup;
    this.glossaryLookup = options.glossaryLookup;
  }

  async *execute(context: TranslationContext): AsyncGenerator<TranslationOutput> {
    const config = this.settings.resolve(context);

    for (const locale of context.request.targetLocales) {
      const rules = [...config.rules, ...((await this.ruleLookup?.(locale)) ?? [])];
      const terms = {
        ...config.glossary,
        ...config.locales[locale],
        ...((await this.glossaryLookup?.(locale)) ?? {}),
      };
      const entry: LocaleGlossary = { rules, terms };
      context.setPluginData(GLOSSARY_PLUGIN, locale, entry);
      this.settings.logger.debug({ locale, rules: rules.length, terms: Object.keys(terms).length }, 'Glossary loaded');
    }
  }
}
