export interface PromptString {
  key: string;
  text: string;
  context?: string;
  references?: Record<string, string>;
}

export interface PromptInput {
  sourceLocale: string;
  targetLocale: string;
  strings: PromptString[];
  rules?: string[];
  glossary?: Record<string, string>;
  /** Prepended to every key as `<prefix>.` so short keys from different files stay distinct. */
  keyPrefix?: string;
  filename?: string;
  /** Approved translations shown to the model for consistency. */
  approved?: Record<string, string>;
  localeNames?: Record<string, string>;
}

export interface JudgeCandidate {
  provider: string;
  text: string;
}

const displayNames = new Intl.DisplayNames(['en'], { type: 'language' });

export function languageName(locale: string, overrides: Record<string, string> = {}): string {
  const override = overrides[locale];
  if (override) return override;
  try {
    return displayNames.of(locale.replace(/_/g, '-')) ?? locale;
  } catch (error) {
    if (error instanceof RangeError) return locale;
    throw error;
  }
}

export function prefixedKey(key: string, keyPrefix?: string): string {
  return keyPrefix ? `${keyPrefix}.${key}` : key;
}

export function getTranslationSystemPrompt(input: PromptInput): string {
  const source = languageName(input.sourceLocale, input.localeNames);
  const target = languageName(input.targetLocale, input.localeNames);

  let prompt = `You are a professional translator for software interfaces. Translate every string from ${source} (${input.sourceLocale}) to ${target} (${input.targetLocale}).

Preserve exactly as they appear:
1. **Variables**: :name, {{ name }}, {name}, $name
2. **Placeholders**: %s, %d, %1$s and similar printf markers
3. **HTML tags** and their attributes
4. **URLs, email addresses and numbers**

Guidelines:
- Translate naturally for the target language and culture
- Keep the tone and formality of the source
- Keep leading and trailing whitespace and line breaks
- Use the context and reference translations when they are given

Respond with one <item> per string, in this exact format:
<translations>
  <item>
    <key>the key exactly as given</key>
    <trx><![CDATA[translated text]]></trx>
    <comment><![CDATA[optional note for reviewers]]></comment>
  </item>
</translations>`;

  const rules = [...(input.rules ?? [])];
  const glossary = Object.entries(input.glossary ?? {});
  if (glossary.length > 0) {
    rules.push(
      `- Glossary terms: ${glossary.map(([term, translation]) => `'${term}' => '${translation}'`).join(', ')}`
    );
  }
  if (rules.length > 0) {
    prompt += `\n\nAdditional rules:\n${rules.join('\n')}`;
  }

  const approved = Object.entries(input.approved ?? {});
  if (approved.length > 0) {
    prompt += `\n\nAlready approved translations:\n${approved
      .map(([key, text]) => `- \`${key}\`: ${text}`)
      .join('\n')}`;
  }

  return prompt;
}

export function getTranslationUserPrompt(input: PromptInput): string {
  const lines = input.strings.map((entry) => {
    let line = `  - \`${prefixedKey(entry.key, input.keyPrefix)}\`: """${entry.text}"""`;
    if (entry.context) {
      line += `\n    - Context: ${entry.context}`;
    }
    const references = Object.entries(entry.references ?? {});
    if (references.length > 0) {
      line += `\n    - References:\n${references
        .map(([locale, text]) => `      - ${locale}: """${text}"""`)
        .join('\n')}`;
    }
    return line;
  });

  let prompt = `Translate the following strings to ${languageName(input.targetLocale, input.localeNames)}:\n\n${lines.join('\n')}`;
  if (input.filename) {
    prompt = `File: ${input.filename}\n\n${prompt}`;
  }
  return prompt;
}

export function getJudgeSystemPrompt(): string {
  return 'You are an expert translation reviewer. You compare candidate translations and answer with the number of the best one.';
}

export function getJudgePrompt(original: string, locale: string, candidates: readonly JudgeCandidate[]): string {
  let prompt = `Evaluate the following translations and select the best one.\n\nOriginal text: ${original}\nTarget language: ${locale}\n\nCandidates:\n`;
  candidates.forEach((candidate, index) => {
    prompt += `${index + 1}. [${candidate.provider}]: ${candidate.text}\n`;
  });
  prompt += '\nSelect the number of the best translation based on accuracy, fluency, and naturalness.\nRespond with only the number.';
  return prompt;
}
