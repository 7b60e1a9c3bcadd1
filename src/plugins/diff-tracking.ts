import { z } from 'zod';
import { catalogResolver, type CatalogResolver, type CatalogTransformer } from '../catalog/json-catalog.js';
import { PipelineStages } from '../core/pipeline-stages.js';
import type { TranslationContext } from '../core/translation-context.js';
import { textOf, type TranslationRequest } from '../core/translation-request.js';
import { MemoryStateStore, type StateStore, type TranslationState } from '../storage/state-store.js';
import type { TextEntry, TranslationOutput } from '../types.js';
import { ContentHasher } from '../utils/content-hash.js';
import { PluginSettings } from './plugin-settings.js';
import type { MiddlewarePlugin, Next } from './types.js';

export const DIFF_TRACKING_PLUGIN = 'diff_tracking';

export const diffTrackingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Reuse stored translations for unchanged texts instead of sending them again. */
  useCache: z.boolean().default(true),
  invalidateOnError: z.boolean().default(true),
  includeKeyInChecksum: z.boolean().default(true),
  normalizeWhitespace: z.boolean().default(true),
  trackTokens: z.boolean().default(true),
  stateVersion: z.string().default('1.0.0'),
});

export type DiffTrackingConfig = z.infer<typeof diffTrackingConfigSchema>;

export interface ChangeSet {
  added: string[];
  changed: string[];
  removed: string[];
  unchanged: string[];
}

export interface DiffTrackingOptions {
  config?: Record<string, unknown>;
  store?: StateStore;
  catalogs?: CatalogResolver | Readonly<Record<string, CatalogTransformer>>;
}

export function detectChanges(current: Record<string, string>, previous: Record<string, string>): ChangeSet {
  const changes: ChangeSet = { added: [], changed: [], removed: [], unchanged: [] };
  for (const [key, checksum] of Object.entries(current)) {
    const before = previous[key];
    if (before === undefined) changes.added.push(key);
    else if (before !== checksum) changes.changed.push(key);
    else changes.unchanged.push(key);
  }
  for (const key of Object.keys(previous)) {
    if (!(key in current)) changes.removed.push(key);
  }
  return changes;
}

export function stateKeyFor(request: TranslationRequest, locale: string): string {
  const parts = ['translation_state', request.sourceLocale, locale];
  if (request.tenantId) parts.push(request.tenantId);
  const domain = request.metadata.domain;
  if (typeof domain === 'string' && domain !== '') parts.push(domain);
  return parts.join(':');
}

interface LocalePlan {
  stateKey: string;
  previous?: TranslationState;
  changes: ChangeSet;
}

/**
 * Leaves out keys the target catalog already has and keys whose source text
 * has not changed since the last successful run.
 */
export class DiffTrackingPlugin implements MiddlewarePlugin {
  readonly kind = 'middleware';
  readonly name = DIFF_TRACKING_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 95;
  readonly dependencies: readonly string[] = [];
  readonly stage = PipelineStages.DIFF_DETECTION;

  readonly store: StateStore;
  private readonly settings: PluginSettings<DiffTrackingConfig>;
  private readonly catalogs?: CatalogResolver;

  constructor(options: DiffTrackingOptions = {}) {
    this.settings = new PluginSettings(DIFF_TRACKING_PLUGIN, diffTrackingConfigSchema, options.config);
    this.store = options.store ?? new MemoryStateStore();
    this.catalogs = options.catalogs ? catalogResolver(options.catalogs) : undefined;
  }

  async *handle(context: TranslationContext, next: Next): AsyncGenerator<TranslationOutput> {
    const config = this.settings.resolve(context);
    if (!config.enabled) {
      yield* next(context);
      return;
    }

    const { request } = context;
    const original = context.texts;
    // Checksums cover the request's own text, not what earlier stages made of it.
    const sourceTexts: Record<string, string> = {};
    for (const [key, entry] of Object.entries(original)) {
      sourceTexts[key] = textOf(request.texts[key] ?? entry);
    }
    const checksums = ContentHasher.checksums(sourceTexts, {
      includeKey: config.includeKeyInChecksum,
      normalizeWhitespace: config.normalizeWhitespace,
    });

    const plans = new Map<string, LocalePlan>();
    const needed = new Set<string>();
    const cached: TranslationOutput[] = [];

    for (const locale of request.targetLocales) {
      const stateKey = stateKeyFor(request, locale);
      const previous = await this.store.get(stateKey);
      const changes = detectChanges(checksums, previous?.checksums ?? {});
      const unchanged = new Set(changes.unchanged);
      const catalog = this.catalogs?.(locale);
      plans.set(locale, { stateKey, previous, changes });

      for (const key of Object.keys(sourceTexts)) {
        if (catalog?.isTranslated(key)) {
          context.skip(locale, key);
          continue;
        }
        const stored = previous?.translations[key];
        if (config.useCache && unchanged.has(key) && stored !== undefined) {
          context.setTranslation(locale, key, stored);
          context.skip(locale, key);
          cached.push({ key, locale, value: stored, cached: true, metadata: { source: DIFF_TRACKING_PLUGIN } });
          continue;
        }
        needed.add(key);
      }

      context.setPluginData(DIFF_TRACKING_PLUGIN, locale, {
        added: changes.added.length,
        changed: changes.changed.length,
        removed: changes.removed.length,
        unchanged: changes.unchanged.length,
      });
      this.settings.logger.info(
        {
          locale,
          total: Object.keys(sourceTexts).length,
          added: changes.added.length,
          changed: changes.changed.length,
          removed: changes.removed.length,
          unchanged: changes.unchanged.length,
        },
        'Diff detection complete'
      );
    }

    yield* cached;

    if (needed.size === 0) {
      this.settings.logger.info('Nothing left to translate, skipping the remaining stages');
      await this.saveStates(context, config, plans, sourceTexts, checksums);
      return;
    }

    const narrowed: Record<string, TextEntry> = {};
    for (const key of needed) {
      narrowed[key] = original[key];
    }
    context.texts = narrowed;
    try {
      yield* next(context);
    } finally {
      context.texts = original;
    }

    await this.saveStates(context, config, plans, sourceTexts, checksums);
  }

  async terminate(context: TranslationContext, failed: boolean): Promise<void> {
    const config = this.settings.resolve(context);
    if (!failed || !config.enabled || !config.invalidateOnError) return;

    for (const locale of context.request.targetLocales) {
      await this.store.delete(stateKeyFor(context.request, locale));
    }
    this.settings.logger.warn('Invalidated stored state after a failed run');
  }

  private async saveStates(
    context: TranslationContext,
    config: DiffTrackingConfig,
    plans: ReadonlyMap<string, LocalePlan>,
    sourceTexts: Record<string, string>,
    checksums: Record<string, string>
  ): Promise<void> {
    for (const [locale, plan] of plans) {
      const current = context.getTranslations(locale);
      const unchanged = new Set(plan.changes.unchanged);
      const translations: Record<string, string> = {};

      for (const key of Object.keys(sourceTexts)) {
        const value = current[key] ?? (unchanged.has(key) ? plan.previous?.translations[key] : undefined);
        if (value !== undefined) translations[key] = value;
      }

      const usage = context.tokenUsage;
      const state: TranslationState = {
        texts: sourceTexts,
        translations,
        checksums,
        timestamp: Date.now(),
        metadata: {
          sourceLocale: context.request.sourceLocale,
          targetLocale: locale,
          version: config.stateVersion,
        },
        ...(config.trackTokens ? { tokenUsage: { input: usage.input, output: usage.output, total: usage.total } } : {}),
      };
      await this.store.put(plan.stateKey, state);
    }
  }
}
