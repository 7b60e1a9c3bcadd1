import type { z } from 'zod';
import { resolveLayers } from '../config/schema.js';
import type { ReadonlyTranslationContext } from '../core/translation-context.js';
import { logger, type Logger } from '../utils/logger.js';

/**
 * Configuration and logging shared by the built-in plugins. The effective
 * configuration for a run is the constructor config overlaid with the
 * tenant and request overrides the pipeline put on the context.
 */
export class PluginSettings<T> {
  readonly defaults: T;
  readonly logger: Logger;

  constructor(
    private readonly pluginName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly input: Record<string, unknown> = {}
  ) {
    this.defaults = resolveLayers(schema, [input], `plugin '${pluginName}'`);
    this.logger = logger.child({ plugin: pluginName });
  }

  resolve(context: ReadonlyTranslationContext): T {
    const overlay = context.configOverlay(this.pluginName);
    if (!overlay || Object.keys(overlay).length === 0) {
      return this.defaults;
    }
    return resolveLayers(this.schema, [this.input, overlay], `plugin '${this.pluginName}'`);
  }
}
