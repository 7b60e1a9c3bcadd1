import { PipelineStages } from '../core/pipeline-stages.js';
import type { TranslationContext } from '../core/translation-context.js';
import { catalogResolver, type CatalogResolver, type CatalogTransformer } from '../catalog/json-catalog.js';
import type { TranslationOutput } from '../types.js';
import { logger } from '../utils/logger.js';
import type { MiddlewarePlugin, Next } from './types.js';

export const CATALOG_OUTPUT_PLUGIN = 'catalog_output';

/**
 * Writes the run's translations into the target catalogs. Writing waits for
 * a successful run so restored and merged values are what lands on disk.
 */
export class CatalogOutputPlugin implements MiddlewarePlugin {
  readonly kind = 'middleware';
  readonly name = CATALOG_OUTPUT_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 0;
  readonly dependencies: readonly string[] = [];
  readonly stage = PipelineStages.OUTPUT;

  private readonly catalogs: CatalogResolver;
  private readonly log = logger.child({ plugin: CATALOG_OUTPUT_PLUGIN });

  constructor(catalogs: CatalogResolver | Readonly<Record<string, CatalogTransformer>>) {
    this.catalogs = catalogResolver(catalogs);
  }

  handle(context: TranslationContext, next: Next): AsyncIterable<TranslationOutput> {
    return next(context);
  }

  terminate(context: TranslationContext, failed: boolean): void {
    if (failed) return;

    for (const locale of context.request.targetLocales) {
      const catalog = this.catalogs(locale);
      if (!catalog) continue;

      let written = 0;
      for (const [key, value] of Object.entries(context.getTranslations(locale))) {
        if (!(key in context.request.texts)) continue;
        catalog.updateString(key, value);
        written++;
      }
      this.log.info({ locale, written }, 'Catalog updated');
    }
  }
}
