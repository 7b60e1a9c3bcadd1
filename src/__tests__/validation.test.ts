import { describe, it, expect } from 'vitest';
import { PluginRegistry } from '../core/plugin-registry.js';
import { TranslationPipeline } from '../core/translation-pipeline.js';
import { createTranslationRequest } from '../core/translation-request.js';
import {
  ValidationPlugin,
  adjustRatio,
  enabledChecks,
  validateTranslation,
  validationConfigSchema,
  type ValidationConfig,
} from '../plugins/validation.js';
import { collect, echoTranslator } from './helpers/plugins.js';

function only(...checks: string[]): ValidationConfig {
  return validationConfigSchema.parse({ checks });
}

describe('validateTranslation', () => {
  const defaults = validationConfigSchema.parse({});

  it('should report dropped variables and a short translation', () => {
    const issues = validateTranslation('Hello :name', 'Hallo', 'de', defaults);

    expect(issues.map((issue) => issue.type)).toEqual(['colon_variables', 'length_too_short']);
    expect(issues[0].missing).toEqual([':name']);
  });

  it('should allow for languages that run shorter', () => {
    expect(validateTranslation('Hello', '[ko] Hello', 'ko', defaults)).toEqual([
      { type: 'length_too_long', message: 'Translation seems too long' },
    ]);
    expect(validateTranslation('Hello', '[de] Hello', 'de', defaults)).toEqual([]);
  });

  it('should compare HTML tags by name', () => {
    expect(validateTranslation('<b>Hi</b>', 'Hallo', 'de', only('html'))).toEqual([
      { type: 'html_tag_count', message: 'HTML tag count mismatch' },
      { type: 'html_tags_missing', message: 'Missing HTML tags', missing: ['b'] },
    ]);
    expect(validateTranslation('<a href="x">Hi</a>', '<A class="y">Hallo</A>', 'de', only('html'))).toEqual([]);
  });

  it('should count printf placeholders', () => {
    expect(validateTranslation('Hi %s', 'Hallo', 'de', only('placeholders'))).toEqual([
      { type: 'printf_placeholders', message: 'Printf placeholder count mismatch' },
    ]);
  });

  it('should treat decimal commas and points alike', () => {
    expect(validateTranslation('1,5 kg', '1.5 kg', 'de', only('numbers'))).toEqual([]);
    expect(validateTranslation('2 kg', '3 kg', 'de', only('numbers'))).toEqual([
      { type: 'numbers_mismatch', message: 'Number mismatch', missing: ['2'] },
    ]);
  });

  it('should accept full-width ending punctuation', () => {
    expect(validateTranslation('Done.', 'Fertig', 'de', only('punctuation'))).toEqual([
      { type: 'ending_punctuation', message: 'Missing ending punctuation' },
    ]);
    expect(validateTranslation('Done.', '完了。', 'ja', only('punctuation'))).toEqual([]);
  });

  it('should notice lost surrounding whitespace', () => {
    expect(validateTranslation(' Hi', 'Hallo', 'de', only('whitespace'))).toEqual([
      { type: 'whitespace', message: 'Leading or trailing whitespace not preserved' },
    ]);
  });
});

describe('adjustRatio', () => {
  it('should scale by the language of the locale', () => {
    expect(adjustRatio(2, 'ko-KR')).toBeCloseTo(1.8);
    expect(adjustRatio(2, 'xx')).toBe(2);
  });
});

describe('enabledChecks', () => {
  it('should keep the fixed check order', () => {
    expect(enabledChecks(only('urls', 'html'))).toEqual(['html', 'urls']);
    expect(enabledChecks(only('all'))).toHaveLength(9);
  });
});

describe('ValidationPlugin', () => {
  function run(pluginConfigs: Record<string, Record<string, unknown>> = {}) {
    const registry = new PluginRegistry().register(new ValidationPlugin()).register(echoTranslator());
    const pipeline = new TranslationPipeline(registry);
    const context = pipeline.createContext(
      createTranslationRequest({
        sourceLocale: 'en',
        targetLocales: ['ko'],
        texts: { short: 'Hi', greeting: 'Hello' },
        pluginConfigs,
      })
    );
    return { pipeline, context };
  }

  it('should warn about issues and keep the translations', async () => {
    const { pipeline, context } = run();

    const outputs = await collect(pipeline.execute(context));

    expect(outputs).toHaveLength(2);
    expect(context.warnings).toEqual(["Validation issues for 'short' in locale 'ko': length_too_long"]);
    expect(context.errors).toEqual([]);
    expect(context.getPluginData('validation', 'ko')).toEqual({
      short: [{ type: 'length_too_long', message: 'Translation seems too long' }],
    });
  });

  it('should report issues as errors in strict mode', async () => {
    const { pipeline, context } = run({ validation: { strictMode: true } });

    await collect(pipeline.execute(context));

    expect(context.errors).toEqual(["Validation issues for 'short' in locale 'ko': length_too_long"]);
    expect(context.warnings).toEqual([]);
  });
});
