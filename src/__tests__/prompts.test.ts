import { describe, it, expect } from 'vitest';
import {
  getJudgePrompt,
  getTranslationSystemPrompt,
  getTranslationUserPrompt,
  languageName,
  prefixedKey,
  type PromptInput,
} from '../prompts.js';

const input: PromptInput = {
  sourceLocale: 'en',
  targetLocale: 'de',
  strings: [{ key: 'greeting', text: 'Hello' }],
};

describe('getTranslationSystemPrompt', () => {
  it('should name both languages with their codes', () => {
    const prompt = getTranslationSystemPrompt(input);
    expect(prompt).toContain('from English (en) to German (de).');
  });

  it('should mention HTML tags and placeholder preservation', () => {
    const prompt = getTranslationSystemPrompt(input);
    expect(prompt).toContain('**HTML tags**');
    expect(prompt).toContain('%s, %d, %1$s');
    expect(prompt).toContain(':name, {{ name }}, {name}, $name');
  });

  it('should describe the item format', () => {
    const prompt = getTranslationSystemPrompt(input);
    expect(prompt).toContain('<trx><![CDATA[translated text]]></trx>');
  });

  it('should append rules and glossary terms', () => {
    const prompt = getTranslationSystemPrompt({
      ...input,
      rules: ['- Use the formal register.'],
      glossary: { cart: 'Warenkorb', checkout: 'Kasse' },
    });
    expect(prompt).toContain(
      "Additional rules:\n- Use the formal register.\n- Glossary terms: 'cart' => 'Warenkorb', 'checkout' => 'Kasse'"
    );
  });

  it('should leave out the rules section when there is nothing to add', () => {
    expect(getTranslationSystemPrompt(input)).not.toContain('Additional rules');
  });

  it('should list approved translations', () => {
    const prompt = getTranslationSystemPrompt({ ...input, approved: { farewell: 'Tschüss' } });
    expect(prompt).toContain('Already approved translations:\n- `farewell`: Tschüss');
  });

  it('should prefer configured locale names', () => {
    const prompt = getTranslationSystemPrompt({ ...input, localeNames: { de: 'Swiss German' } });
    expect(prompt).toContain('to Swiss German (de).');
  });
});

describe('getTranslationUserPrompt', () => {
  it('should list each string with its key', () => {
    expect(getTranslationUserPrompt(input)).toBe(
      'Translate the following strings to German:\n\n  - `greeting`: """Hello"""'
    );
  });

  it('should include context and references when provided', () => {
    const prompt = getTranslationUserPrompt({
      ...input,
      strings: [{ key: 'greeting', text: 'Hello', context: 'Home page title', references: { fr: 'Bonjour' } }],
    });
    expect(prompt).toContain(
      '  - `greeting`: """Hello"""\n    - Context: Home page title\n    - References:\n      - fr: """Bonjour"""'
    );
  });

  it('should not include context when not provided', () => {
    expect(getTranslationUserPrompt(input)).not.toContain('Context:');
  });

  it('should prefix keys and name the file', () => {
    const prompt = getTranslationUserPrompt({ ...input, keyPrefix: 'home', filename: 'home.json' });
    expect(prompt).toBe('File: home.json\n\nTranslate the following strings to German:\n\n  - `home.greeting`: """Hello"""');
  });
});

describe('getJudgePrompt', () => {
  it('should number the candidates from one', () => {
    const prompt = getJudgePrompt('Hello', 'de', [
      { provider: 'alpha', text: 'Hallo' },
      { provider: 'beta', text: 'Servus' },
    ]);
    expect(prompt).toContain('Original text: Hello\nTarget language: de\n\nCandidates:\n1. [alpha]: Hallo\n2. [beta]: Servus\n');
    expect(prompt).toContain('Respond with only the number.');
  });
});

describe('languageName', () => {
  it('should resolve codes to English names', () => {
    expect(languageName('de')).toBe('German');
    expect(languageName('ko')).toBe('Korean');
  });

  it('should fall back to the code for invalid tags', () => {
    expect(languageName('!!')).toBe('!!');
  });
});

describe('prefixedKey', () => {
  it('should join prefix and key with a dot', () => {
    expect(prefixedKey('title', 'home')).toBe('home.title');
    expect(prefixedKey('title')).toBe('title');
  });
});
