import { ConfigurationError } from '../errors.js';
import type { TextEntry } from '../types.js';

export interface TranslationRequestInput {
  sourceLocale: string;
  targetLocales: string | readonly string[];
  texts: Record<string, TextEntry>;
  metadata?: Record<string, unknown>;
  options?: Record<string, unknown>;
  tenantId?: string;
  /** Per-plugin configuration overrides for this request only. */
  pluginConfigs?: Record<string, Record<string, unknown>>;
}

export interface TranslationRequest {
  readonly sourceLocale: string;
  readonly targetLocales: readonly string[];
  readonly texts: Readonly<Record<string, TextEntry>>;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly options: Readonly<Record<string, unknown>>;
  readonly tenantId?: string;
  readonly pluginConfigs: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
}

function freezeEntry(entry: TextEntry): TextEntry {
  if (typeof entry === 'string') return entry;
  return Object.freeze({
    ...entry,
    ...(entry.references ? { references: Object.freeze({ ...entry.references }) } : {}),
  });
}

export function createTranslationRequest(input: TranslationRequestInput): TranslationRequest {
  const sourceLocale = input.sourceLocale.trim();
  if (!sourceLocale) {
    throw new ConfigurationError('Source locale is required');
  }

  const targets = typeof input.targetLocales === 'string' ? [input.targetLocales] : input.targetLocales;
  const targetLocales = [...new Set(targets.map((locale) => locale.trim()).filter((locale) => locale !== ''))];
  if (targetLocales.length === 0) {
    throw new ConfigurationError('Target locale(s) required');
  }

  const texts: Record<string, TextEntry> = {};
  for (const [key, entry] of Object.entries(input.texts)) {
    texts[key] = freezeEntry(entry);
  }

  const pluginConfigs: Record<string, Readonly<Record<string, unknown>>> = {};
  for (const [name, config] of Object.entries(input.pluginConfigs ?? {})) {
    pluginConfigs[name] = Object.freeze({ ...config });
  }

  return Object.freeze({
    sourceLocale,
    targetLocales: Object.freeze(targetLocales),
    texts: Object.freeze(texts),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
    options: Object.freeze({ ...(input.options ?? {}) }),
    ...(input.tenantId !== undefined ? { tenantId: input.tenantId } : {}),
    pluginConfigs: Object.freeze(pluginConfigs),
  });
}

export function textOf(entry: TextEntry): string {
  return typeof entry === 'string' ? entry : entry.text;
}

export function withText(entry: TextEntry, text: string): TextEntry {
  return typeof entry === 'string' ? text : { ...entry, text };
}

export function getOption(request: TranslationRequest, name: string): unknown {
  return request.options[name];
}

export function booleanOption(request: TranslationRequest, name: string, fallback = false): boolean {
  const value = request.options[name];
  return typeof value === 'boolean' ? value : fallback;
}

export function stringOption(request: TranslationRequest, name: string, fallback: string): string {
  const value = request.options[name];
  return typeof value === 'string' && value !== '' ? value : fallback;
}

/**
 * The prefix that keeps short keys from different source files apart:
 * `metadata.keyPrefix` when set, otherwise the file name without extension.
 */
export function keyPrefixOf(request: TranslationRequest): string | undefined {
  const explicit = request.metadata.keyPrefix;
  if (typeof explicit === 'string' && explicit !== '') return explicit;
  const filename = request.metadata.filename;
  if (typeof filename !== 'string' || filename === '') return undefined;
  const base = filename.split(/[\\/]/).pop() ?? filename;
  const dot = base.lastIndexOf('.');
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return stem === '' ? undefined : stem;
}
