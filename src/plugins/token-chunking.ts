import { z } from 'zod';
import { PipelineStages } from '../core/pipeline-stages.js';
import type { TranslationContext } from '../core/translation-context.js';
import { textOf } from '../core/translation-request.js';
import type { TextEntry, TranslationOutput } from '../types.js';
import { PluginSettings } from './plugin-settings.js';
import type { MiddlewarePlugin, Next } from './types.js';

export const TOKEN_CHUNKING_PLUGIN = 'token_chunking';

const PART_KEY = /^(.+)__part_(\d+)$/;

export const tokenChunkingConfigSchema = z.object({
  maxTokensPerChunk: z.number().int().positive().default(2000),
  bufferFactor: z.number().gt(0).max(1).default(0.9),
  multipliers: z
    .object({
      cjk: z.number().positive().default(1.5),
      arabic: z.number().positive().default(0.8),
      cyrillic: z.number().positive().default(0.7),
      latin: z.number().positive().default(0.25),
      devanagari: z.number().positive().default(1.0),
      thai: z.number().positive().default(1.2),
    })
    .default({}),
  /** Fixed per-text cost for the key and the surrounding markup. */
  overheadTokens: z.number().int().min(0).default(20),
});

export type TokenChunkingConfig = z.infer<typeof tokenChunkingConfigSchema>;

export type Script = keyof TokenChunkingConfig['multipliers'];

const SCRIPT_PATTERNS: ReadonlyArray<[Exclude<Script, 'latin'>, RegExp]> = [
  ['cjk', /[\u4E00-\u9FFF\u3040-\u309F\u30A0-\u30FF\uAC00-\uD7AF]/g],
  ['arabic', /[\u0600-\u06FF\u0750-\u077F]/g],
  ['cyrillic', /[\u0400-\u04FF]/g],
  ['devanagari', /[\u0900-\u097F]/g],
  ['thai', /[\u0E00-\u0E7F]/g],
];

/** The dominant non-Latin script when it makes up at least 30% of the text, else latin. */
export function detectScript(text: string): Script {
  const length = [...text].length;
  let best: Script = 'latin';
  let bestCount = 0;
  for (const [script, pattern] of SCRIPT_PATTERNS) {
    const count = text.match(pattern)?.length ?? 0;
    if (count > bestCount) {
      best = script;
      bestCount = count;
    }
  }
  return bestCount > 0 && bestCount >= length * 0.3 ? best : 'latin';
}

export function estimateTokens(text: string, config: TokenChunkingConfig): number {
  const multiplier = config.multipliers[detectScript(text)];
  return Math.floor([...text].length * multiplier) + config.overheadTokens;
}

export function splitSentences(text: string): string[] {
  const sentences = text.split(/(?<=[.!?])\s+/).filter((sentence) => sentence !== '');
  if (sentences.length > 1) return sentences;
  return text.split('\n').filter((line) => line !== '');
}

function partEntry(entry: TextEntry, text: string): TextEntry {
  if (typeof entry === 'string') return text;
  return entry.context ? { text, context: entry.context } : text;
}

/** Packs texts into chunks under the token budget; oversized texts become `key__part_N` entries. */
export function createChunks(texts: Record<string, TextEntry>, config: TokenChunkingConfig): Array<Record<string, TextEntry>> {
  const budget = Math.floor(config.maxTokensPerChunk * config.bufferFactor);
  const chunks: Array<Record<string, TextEntry>> = [];
  let current: Record<string, TextEntry> = {};
  let currentTokens = 0;

  const flush = (): void => {
    if (Object.keys(current).length > 0) chunks.push(current);
    current = {};
    currentTokens = 0;
  };

  for (const [key, entry] of Object.entries(texts)) {
    const text = textOf(entry);
    const tokens = estimateTokens(text, config);

    if (tokens > budget) {
      flush();
      let part: string[] = [];
      let partTokens = 0;
      let index = 0;
      for (const sentence of splitSentences(text)) {
        const sentenceTokens = estimateTokens(sentence, config);
        if (partTokens + sentenceTokens > budget && part.length > 0) {
          chunks.push({ [`${key}__part_${index}`]: partEntry(entry, part.join(' ')) });
          part = [];
          partTokens = 0;
          index++;
        }
        part.push(sentence);
        partTokens += sentenceTokens;
      }
      if (part.length > 0) {
        chunks.push({ [`${key}__part_${index}`]: partEntry(entry, part.join(' ')) });
      }
      continue;
    }

    if (currentTokens + tokens > budget) flush();
    current[key] = entry;
    currentTokens += tokens;
  }
  flush();
  return chunks;
}

/**
 * Runs the rest of the chain once per chunk. Parts of a split text are
 * held back and yielded as one output when every part has arrived.
 */
export class TokenChunkingPlugin implements MiddlewarePlugin {
  readonly kind = 'middleware';
  readonly name = TOKEN_CHUNKING_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 100;
  readonly dependencies: readonly string[] = [];
  readonly stage = PipelineStages.CHUNKING;

  private readonly settings: PluginSettings<TokenChunkingConfig>;

  constructor(config: Record<string, unknown> = {}) {
    this.settings = new PluginSettings(TOKEN_CHUNKING_PLUGIN, tokenChunkingConfigSchema, config);
  }

  async *handle(context: TranslationContext, next: Next): AsyncGenerator<TranslationOutput> {
    const config = this.settings.resolve(context);
    const original = context.texts;
    const chunks = createChunks(original, config);

    const partCounts = new Map<string, number>();
    for (const chunk of chunks) {
      for (const key of Object.keys(chunk)) {
        const match = PART_KEY.exec(key);
        if (match && !(key in original)) {
          partCounts.set(match[1], (partCounts.get(match[1]) ?? 0) + 1);
        }
      }
    }
    context.setPluginData(TOKEN_CHUNKING_PLUGIN, 'chunks', chunks.length);
    this.settings.logger.debug({ chunks: chunks.length, splitTexts: partCounts.size }, 'Texts chunked');

    // locale -> original key -> part index -> text
    const parts = new Map<string, Map<string, Map<number, string>>>();

    try {
      for (const [index, chunk] of chunks.entries()) {
        context.texts = chunk;
        this.settings.logger.debug({ chunk: index + 1, of: chunks.length, size: Object.keys(chunk).length }, 'Processing chunk');

        for await (const output of next(context)) {
          const match = PART_KEY.exec(output.key);
          const expected = match ? partCounts.get(match[1]) : undefined;
          if (!match || expected === undefined) {
            yield output;
            continue;
          }

          const [, key, partIndex] = match;
          let byKey = parts.get(output.locale);
          if (!byKey) {
            byKey = new Map();
            parts.set(output.locale, byKey);
          }
          const received = byKey.get(key) ?? new Map<number, string>();
          received.set(Number(partIndex), output.value);
          byKey.set(key, received);

          if (received.size === expected) {
            const value = [...received.entries()]
              .sort(([a], [b]) => a - b)
              .map(([, text]) => text)
              .join(' ')
              .trim();
            context.setTranslation(output.locale, key, value);
            byKey.delete(key);
            yield { ...output, key, value, metadata: { ...output.metadata, parts: expected } };
          }
        }
      }
    } finally {
      context.texts = original;
      this.dropPartTranslations(context, partCounts);
    }

    for (const [locale, byKey] of parts) {
      for (const [key, received] of byKey) {
        context.addWarning(
          `Incomplete split translation for '${key}' in locale '${locale}': ${received.size} of ${partCounts.get(key) ?? 0} parts`
        );
      }
    }
  }

  private dropPartTranslations(context: TranslationContext, partCounts: ReadonlyMap<string, number>): void {
    for (const locale of context.request.targetLocales) {
      for (const [key, count] of partCounts) {
        for (let index = 0; index < count; index++) {
          context.removeTranslation(locale, `${key}__part_${index}`);
        }
      }
    }
  }
}
