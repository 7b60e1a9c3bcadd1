import { z } from 'zod';
import { isRecord } from '../config/schema.js';
import { PipelineStages } from '../core/pipeline-stages.js';
import type { TranslationContext } from '../core/translation-context.js';
import { textOf } from '../core/translation-request.js';
import type { TranslationOutput } from '../types.js';
import { PluginSettings } from './plugin-settings.js';
import type { MiddlewarePlugin, Next } from './types.js';

export const VALIDATION_PLUGIN = 'validation';

export const VALIDATION_CHECKS = [
  'html',
  'variables',
  'placeholders',
  'length',
  'urls',
  'emails',
  'numbers',
  'punctuation',
  'whitespace',
] as const;

export type ValidationCheck = (typeof VALIDATION_CHECKS)[number];

export const validationConfigSchema = z.object({
  /** Checks to run; `all` enables every check. */
  checks: z.array(z.enum(['all', ...VALIDATION_CHECKS] as const)).default(['all']),
  lengthRatio: z
    .object({
      min: z.number().positive().default(0.5),
      max: z.number().positive().default(2.0),
    })
    .default({}),
  /** Report issues as errors instead of warnings. */
  strictMode: z.boolean().default(false),
});

export type ValidationConfig = z.infer<typeof validationConfigSchema>;

export interface ValidationIssue {
  type: string;
  message: string;
  missing?: string[];
}

// Expected length of a translation relative to English-like sources.
const LENGTH_ADJUSTMENTS: Record<string, number> = {
  de: 1.3,
  fr: 1.2,
  es: 1.1,
  ru: 1.2,
  zh: 0.7,
  ja: 0.8,
  ko: 0.9,
};

function matchesOf(text: string, pattern: RegExp): string[] {
  return text.match(pattern) ?? [];
}

function missingFrom(original: string[], translation: string[]): string[] {
  const present = new Set(translation);
  return [...new Set(original.filter((item) => !present.has(item)))];
}

function missingCheck(
  type: string,
  message: string,
  pattern: RegExp,
  original: string,
  translation: string,
  normalize: (value: string) => string = (value) => value
): ValidationIssue[] {
  const missing = missingFrom(matchesOf(original, pattern).map(normalize), matchesOf(translation, pattern).map(normalize));
  return missing.length > 0 ? [{ type, message, missing }] : [];
}

export function adjustRatio(ratio: number, locale: string): number {
  return ratio * (LENGTH_ADJUSTMENTS[locale.slice(0, 2).toLowerCase()] ?? 1.0);
}

type CheckFn = (original: string, translation: string, locale: string, config: ValidationConfig) => ValidationIssue[];

const CHECKS: Record<ValidationCheck, CheckFn> = {
  html: (original, translation) => {
    const originalTags = matchesOf(original, /<[^>]+>/g);
    const translationTags = matchesOf(translation, /<[^>]+>/g);
    const issues: ValidationIssue[] = [];
    if (originalTags.length !== translationTags.length) {
      issues.push({ type: 'html_tag_count', message: 'HTML tag count mismatch' });
    }
    const tagName = (tag: string): string => /^<\/?\s*([A-Za-z][\w-]*)/.exec(tag)?.[1]?.toLowerCase() ?? tag;
    const missing = missingFrom(originalTags.map(tagName), translationTags.map(tagName));
    if (missing.length > 0) {
      issues.push({ type: 'html_tags_missing', message: 'Missing HTML tags', missing });
    }
    return issues;
  },
  variables: (original, translation) => [
    ...missingCheck('colon_variables', 'Missing :variables', /:\w+/g, original, translation),
    ...missingCheck('mustache_variables', 'Missing mustache variables', /\{\{[^}]+\}\}/g, original, translation),
    ...missingCheck('dollar_variables', 'Missing $variables', /\$\w+/g, original, translation),
  ],
  placeholders: (original, translation) => {
    const printf = /%(?:\d+\$)?[sdifFeEgGxXobBcpn]/g;
    const issues: ValidationIssue[] = [];
    if (matchesOf(original, printf).length !== matchesOf(translation, printf).length) {
      issues.push({ type: 'printf_placeholders', message: 'Printf placeholder count mismatch' });
    }
    issues.push(
      ...missingCheck('named_placeholders', 'Missing named placeholders', /[{[][\w\s]+[}\]]/g, original, translation)
    );
    return issues;
  },
  length: (original, translation, locale, config) => {
    const originalLength = [...original].length;
    if (originalLength === 0) return [];
    const ratio = [...translation].length / originalLength;
    if (ratio < adjustRatio(config.lengthRatio.min, locale)) {
      return [{ type: 'length_too_short', message: 'Translation seems too short' }];
    }
    if (ratio > adjustRatio(config.lengthRatio.max, locale)) {
      return [{ type: 'length_too_long', message: 'Translation seems too long' }];
    }
    return [];
  },
  urls: (original, translation) =>
    missingCheck('urls_missing', 'Missing URLs', /https?:\/\/[^\s<>"{}|\\^`[\]]+/gi, original, translation),
  emails: (original, translation) =>
    missingCheck(
      'emails_missing',
      'Missing email addresses',
      /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
      original,
      translation
    ),
  numbers: (original, translation) =>
    missingCheck('numbers_mismatch', 'Number mismatch', /\d+(?:[.,]\d+)?/g, original, translation, (value) =>
      value.replace(',', '.')
    ),
  punctuation: (original, translation) => {
    const endings = ['.', '!', '?', ':', ';', '。', '！', '？', '：', '；'];
    const originalEnd = [...original].pop() ?? '';
    const translationEnd = [...translation].pop() ?? '';
    return endings.includes(originalEnd) && !endings.includes(translationEnd)
      ? [{ type: 'ending_punctuation', message: 'Missing ending punctuation' }]
      : [];
  },
  whitespace: (original, translation) => {
    const issues: ValidationIssue[] = [];
    if (original.trim() !== original && translation.trim() === translation) {
      issues.push({ type: 'whitespace', message: 'Leading or trailing whitespace not preserved' });
    }
    if (original.includes('  ') && !translation.includes('  ')) {
      issues.push({ type: 'multiple_spaces', message: 'Consecutive spaces not preserved' });
    }
    return issues;
  },
};

export function enabledChecks(config: ValidationConfig): ValidationCheck[] {
  if (config.checks.includes('all')) return [...VALIDATION_CHECKS];
  return VALIDATION_CHECKS.filter((check) => config.checks.includes(check));
}

export function validateTranslation(
  original: string,
  translation: string,
  locale: string,
  config: ValidationConfig
): ValidationIssue[] {
  return enabledChecks(config).flatMap((check) => CHECKS[check](original, translation, locale, config));
}

/**
 * Heuristic checks on the translations of the current batch. Issues are
 * reported, never fixed, so outputs already yielded stay accurate.
 */
export class ValidationPlugin implements MiddlewarePlugin {
  readonly kind = 'middleware';
  readonly name = VALIDATION_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = -100;
  readonly dependencies: readonly string[] = [];
  readonly stage = PipelineStages.VALIDATION;

  private readonly settings: PluginSettings<ValidationConfig>;

  constructor(config: Record<string, unknown> = {}) {
    this.settings = new PluginSettings(VALIDATION_PLUGIN, validationConfigSchema, config);
  }

  async *handle(context: TranslationContext, next: Next): AsyncGenerator<TranslationOutput> {
    const config = this.settings.resolve(context);
    let issueCount = 0;

    for (const locale of context.request.targetLocales) {
      const report: Record<string, ValidationIssue[]> = {};
      for (const [key, entry] of Object.entries(context.texts)) {
        if (context.isSkipped(locale, key)) continue;
        const translation = context.getTranslation(locale, key);
        if (translation === undefined) continue;

        // Translations are compared with the unmasked source they were restored against.
        const issues = validateTranslation(textOf(context.request.texts[key] ?? entry), translation, locale, config);
        if (issues.length === 0) continue;

        report[key] = issues;
        issueCount += issues.length;
        const message = `Validation issues for '${key}' in locale '${locale}': ${issues.map((issue) => issue.type).join(', ')}`;
        if (config.strictMode) context.addError(message);
        else context.addWarning(message);
      }
      if (Object.keys(report).length > 0) {
        const previous = context.getPluginData(VALIDATION_PLUGIN, locale);
        context.setPluginData(VALIDATION_PLUGIN, locale, { ...(isRecord(previous) ? previous : {}), ...report });
      }
    }

    this.settings.logger.debug({ issues: issueCount }, 'Validation finished');
    yield* next(context);
  }
}

