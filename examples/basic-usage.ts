// Example: translating a small catalog with the offline backend

import { JsonCatalogTransformer, MemoryStateStore, TranslationBuilder } from '../src/index.js';

async function main() {
  const source = {
    'nav.home': 'Home',
    'nav.cart': 'Cart',
    'checkout.contact': 'Questions? Write to support@example.com',
  };

  // Korean catalog that already has one string
  const ko = new JsonCatalogTransformer({ nav: { home: '홈' } });
  const store = new MemoryStateStore();

  const job = () =>
    TranslationBuilder.create()
      .from('en')
      .to(['ko', 'de'])
      .withProviders({ offline: { vendor: 'mock', model: 'mock' } })
      .withGlossary({ Cart: 'Warenkorb' })
      .withRules(['- Keep brand names in English.'])
      .withCatalog({ ko })
      .trackChanges({ store })
      .secure()
      .withValidation()
      .onProgress((output) => {
        console.log(`  ${output.locale} ${output.key}: ${output.value}${output.cached ? ' (cached)' : ''}`);
      });

  console.log('First run:');
  const first = await job().translate(source);
  console.log(`✓ ${first.translatedCount} translations, ${first.tokenUsage.total} tokens`);
  for (const warning of first.warnings) {
    console.log(`  ! ${warning}`);
  }

  console.log('\nSecond run (unchanged source):');
  const second = await job().translate(source);
  console.log(`✓ ${second.translatedCount} translations, ${second.tokenUsage.total} tokens`);

  console.log('\nKorean catalog:');
  console.log(ko.stringify());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
