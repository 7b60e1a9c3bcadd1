import { describe, it, expect } from 'vitest';
import { PluginRegistry } from '../core/plugin-registry.js';
import { TranslationContext } from '../core/translation-context.js';
import { TranslationPipeline } from '../core/translation-pipeline.js';
import { createTranslationRequest } from '../core/translation-request.js';
import { GlossaryPlugin, glossaryFor } from '../plugins/glossary.js';
import { collect, echoTranslator } from './helpers/plugins.js';

const request = createTranslationRequest({
  sourceLocale: 'en',
  targetLocales: ['de', 'fr'],
  texts: { cart: 'Add to cart' },
});

describe('GlossaryPlugin', () => {
  it('should combine configured and looked-up rules and terms per locale', async () => {
    const plugin = new GlossaryPlugin({
      config: {
        glossary: { cart: 'basket', checkout: 'checkout' },
        rules: ['Use the formal register.'],
        locales: { de: { cart: 'Warenkorb' } },
      },
      ruleLookup: (locale) => (locale === 'de' ? ['Capitalize nouns.'] : []),
      glossaryLookup: async (locale): Promise<Record<string, string>> => (locale === 'fr' ? { checkout: 'paiement' } : {}),
    });
    const context = new TranslationContext(request);

    await collect(plugin.execute(context));

    expect(glossaryFor(context, 'de')).toEqual({
      rules: ['Use the formal register.', 'Capitalize nouns.'],
      terms: { cart: 'Warenkorb', checkout: 'checkout' },
    });
    expect(glossaryFor(context, 'fr')).toEqual({
      rules: ['Use the formal register.'],
      terms: { cart: 'basket', checkout: 'paiement' },
    });
  });

  it('should run during preparation so the translation stage can read it', async () => {
    const plugin = new GlossaryPlugin({ config: { glossary: { cart: 'Warenkorb' } } });
    const pipeline = new TranslationPipeline(new PluginRegistry().register(plugin).register(echoTranslator()));
    const context = pipeline.createContext(request);

    await collect(pipeline.execute(context));

    expect(glossaryFor(context, 'de')?.terms).toEqual({ cart: 'Warenkorb' });
  });

  it('should return nothing when the plugin did not run', () => {
    expect(glossaryFor(new TranslationContext(request), 'de')).toBeUndefined();
  });
});
