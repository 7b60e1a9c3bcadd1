import { describe, it, expect } from 'vitest';
import { PluginRegistry } from '../core/plugin-registry.js';
import type { TranslationContext } from '../core/translation-context.js';
import { TranslationPipeline } from '../core/translation-pipeline.js';
import { createTranslationRequest, textOf } from '../core/translation-request.js';
import {
  TokenChunkingPlugin,
  createChunks,
  detectScript,
  estimateTokens,
  splitSentences,
  tokenChunkingConfigSchema,
} from '../plugins/token-chunking.js';
import type { ProviderPlugin } from '../plugins/types.js';
import type { TranslationOutput } from '../types.js';
import { collect, echoTranslator } from './helpers/plugins.js';

const small = tokenChunkingConfigSchema.parse({ maxTokensPerChunk: 50, bufferFactor: 1 });

// Three 60-character sentences: 35 tokens each, 65 for the whole text.
const LONG = ['A'.repeat(59) + '.', 'B'.repeat(59) + '.', 'C'.repeat(59) + '.'].join(' ');

describe('estimateTokens', () => {
  it('should weight characters by script and add the per-text overhead', () => {
    const config = tokenChunkingConfigSchema.parse({});

    expect(estimateTokens('Hello', config)).toBe(21);
    expect(estimateTokens('안녕하세요', config)).toBe(27);
    expect(estimateTokens('Привет', config)).toBe(24);
  });
});

describe('detectScript', () => {
  it('should need at least 30% of the text in a script', () => {
    expect(detectScript('Hello Привет')).toBe('cyrillic');
    expect(detectScript('Hello world, Я')).toBe('latin');
    expect(detectScript('こんにちは')).toBe('cjk');
    expect(detectScript('')).toBe('latin');
  });
});

describe('splitSentences', () => {
  it('should split on sentence ends and fall back to lines', () => {
    expect(splitSentences('One. Two! Three?')).toEqual(['One.', 'Two!', 'Three?']);
    expect(splitSentences('first line\nsecond line')).toEqual(['first line', 'second line']);
  });
});

describe('createChunks', () => {
  it('should pack texts under the budget', () => {
    expect(createChunks({ a: 'Hi', b: 'Yo', c: 'Hey' }, small)).toEqual([{ a: 'Hi', b: 'Yo' }, { c: 'Hey' }]);
  });

  it('should split an oversized text into numbered parts', () => {
    const chunks = createChunks({ a: 'Hi', long: LONG, c: 'Hey' }, small);

    expect(chunks.map((chunk) => Object.keys(chunk))).toEqual([
      ['a'],
      ['long__part_0'],
      ['long__part_1'],
      ['long__part_2'],
      ['c'],
    ]);
    expect(chunks[2]).toEqual({ long__part_1: 'B'.repeat(59) + '.' });
  });

  it('should carry the context of a split text into its parts', () => {
    const chunks = createChunks({ long: { text: LONG, context: 'legal notice', references: { fr: 'x' } } }, small);

    expect(chunks[0]).toEqual({ long__part_0: { text: 'A'.repeat(59) + '.', context: 'legal notice' } });
  });
});

describe('TokenChunkingPlugin', () => {
  it('should run each chunk and merge split parts into one output', async () => {
    const seen: Array<Record<string, string>> = [];
    const registry = new PluginRegistry()
      .register(new TokenChunkingPlugin({ maxTokensPerChunk: 50, bufferFactor: 1 }))
      .register(echoTranslator(seen));
    const pipeline = new TranslationPipeline(registry);
    const context = pipeline.createContext(
      createTranslationRequest({ sourceLocale: 'en', targetLocales: ['de'], texts: { a: 'Hi', long: LONG, c: 'Hey' } })
    );

    const outputs = await collect(pipeline.execute(context));

    expect(seen).toHaveLength(5);
    const merged = ['de:' + 'A'.repeat(59) + '.', 'de:' + 'B'.repeat(59) + '.', 'de:' + 'C'.repeat(59) + '.'].join(' ');
    expect(outputs.map((output) => output.key)).toEqual(['a', 'long', 'c']);
    expect(outputs[1]).toMatchObject({ key: 'long', value: merged, metadata: { parts: 3 } });
    expect(context.getTranslations('de')).toEqual({ a: 'de:Hi', long: merged, c: 'de:Hey' });
    expect(context.texts).toEqual({ a: 'Hi', long: LONG, c: 'Hey' });
    expect(context.getPluginData('token_chunking', 'chunks')).toBe(5);
    expect(context.warnings).toEqual([]);
  });

  it('should warn when a split text comes back incomplete', async () => {
    const lossy: ProviderPlugin = {
      kind: 'provider',
      name: 'lossy',
      version: '1.0.0',
      priority: 0,
      dependencies: [],
      provides: ['translation.multi_provider'],
      when: [],
      async *execute(context: TranslationContext): AsyncGenerator<TranslationOutput> {
        for (const [key, entry] of Object.entries(context.texts)) {
          if (key.endsWith('__part_1')) continue;
          const value = `de:${textOf(entry)}`;
          context.setTranslation('de', key, value);
          yield { key, locale: 'de', value, cached: false, metadata: {} };
        }
      },
    };
    const registry = new PluginRegistry()
      .register(new TokenChunkingPlugin({ maxTokensPerChunk: 50, bufferFactor: 1 }))
      .register(lossy);
    const pipeline = new TranslationPipeline(registry);
    const context = pipeline.createContext(
      createTranslationRequest({ sourceLocale: 'en', targetLocales: ['de'], texts: { long: LONG } })
    );

    const outputs = await collect(pipeline.execute(context));

    expect(outputs).toEqual([]);
    expect(context.warnings).toEqual([
      "Unresolved translation for 'long__part_1' in locale 'de'",
      "Incomplete split translation for 'long' in locale 'de': 2 of 3 parts",
    ]);
    expect(context.getTranslations('de')).toEqual({});
  });
});
