import { z } from 'zod';
import { PipelineStages } from '../core/pipeline-stages.js';
import type { TranslationContext } from '../core/translation-context.js';
import { textOf, withText } from '../core/translation-request.js';
import type { TextEntry, TranslationOutput } from '../types.js';
import { PluginSettings } from './plugin-settings.js';
import type { MiddlewarePlugin, Next } from './types.js';

export const PII_MASKING_PLUGIN = 'pii_masking';

export const piiMaskingConfigSchema = z.object({
  maskEmails: z.boolean().default(true),
  maskPhones: z.boolean().default(true),
  maskCreditCards: z.boolean().default(true),
  maskSsn: z.boolean().default(true),
  maskIps: z.boolean().default(true),
  maskUrls: z.boolean().default(false),
  /** Regular expression source to token label; applied before the built-ins. */
  customPatterns: z.record(z.string()).default({}),
  tokenPrefix: z.string().default('__PII_'),
  tokenSuffix: z.string().default('__'),
});

export type PiiMaskingConfig = z.infer<typeof piiMaskingConfigSchema>;

interface MaskRule {
  pattern: RegExp;
  type: string;
  accept?: (match: string) => boolean;
}

/** Luhn checksum over the digits of a candidate card number. */
export function isValidCardNumber(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '');
  if (digits.length < 13 || digits.length > 19) return false;

  let sum = 0;
  let double = false;
  for (let index = digits.length - 1; index >= 0; index--) {
    let digit = Number(digits[index]);
    if (double) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    double = !double;
  }
  return sum % 10 === 0;
}

function rulesFor(config: PiiMaskingConfig): MaskRule[] {
  const rules: MaskRule[] = Object.entries(config.customPatterns).map(([source, type]) => ({
    pattern: new RegExp(source, 'g'),
    type,
  }));

  // Specific patterns go before the looser ones that would also match them.
  if (config.maskSsn) {
    rules.push({ pattern: /\b\d{3}-\d{2}-\d{4}\b/g, type: 'SSN' });
  }
  if (config.maskCreditCards) {
    rules.push({ pattern: /\b(?:\d[ -]*?){13,19}\b/g, type: 'CARD', accept: isValidCardNumber });
  }
  if (config.maskIps) {
    rules.push(
      {
        pattern: /\b(?:(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(?:25[0-5]|2[0-4]\d|[01]?\d\d?)\b/g,
        type: 'IP',
      },
      { pattern: /\b(?:[A-Fa-f0-9]{1,4}:){7}[A-Fa-f0-9]{1,4}\b/g, type: 'IP' }
    );
  }
  if (config.maskEmails) {
    rules.push({ pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, type: 'EMAIL' });
  }
  if (config.maskPhones) {
    rules.push(
      { pattern: /\(\d{3}\)\s*\d{3}-\d{4}/g, type: 'PHONE' },
      { pattern: /\+\d{1,3}[-.\s]?\d{1,4}[-.\s]?\d{1,4}[-.\s]?\d{1,9}/g, type: 'PHONE' },
      { pattern: /\b\d{3}[-.\s]\d{3}[-.\s]\d{4}\b/g, type: 'PHONE' }
    );
  }
  if (config.maskUrls) {
    rules.push({
      pattern: /https?:\/\/(?:www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b[-a-zA-Z0-9()@:%_+.~#?&/=]*/g,
      type: 'URL',
    });
  }
  return rules;
}

/**
 * Token table for one run. The same value always maps to the same token,
 * and tokens are numbered in the order values are first seen.
 */
export class PiiMasker {
  private readonly tokens = new Map<string, string>();
  private readonly values = new Map<string, string>();
  private readonly rules: MaskRule[];

  constructor(private readonly config: PiiMaskingConfig) {
    this.rules = rulesFor(config);
  }

  get size(): number {
    return this.tokens.size;
  }

  mask(text: string): string {
    let masked = text;
    for (const rule of this.rules) {
      masked = masked.replace(rule.pattern, (match) => {
        if (rule.accept && !rule.accept(match)) return match;
        return this.tokenFor(match, rule.type);
      });
    }
    return masked;
  }

  restore(text: string): string {
    let restored = text;
    for (const [token, value] of this.values) {
      restored = restored.split(token).join(value);
    }
    return restored;
  }

  private tokenFor(value: string, type: string): string {
    const existing = this.tokens.get(value);
    if (existing) return existing;
    const token = `${this.config.tokenPrefix}${type}_${this.tokens.size + 1}${this.config.tokenSuffix}`;
    this.tokens.set(value, token);
    this.values.set(token, value);
    return token;
  }
}

/** Replaces personal data with tokens before translation and puts it back afterwards. */
export class PiiMaskingPlugin implements MiddlewarePlugin {
  readonly kind = 'middleware';
  readonly name = PII_MASKING_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 200;
  readonly dependencies: readonly string[] = [];
  readonly stage = PipelineStages.PRE_PROCESS;

  private readonly settings: PluginSettings<PiiMaskingConfig>;

  constructor(config: Record<string, unknown> = {}) {
    this.settings = new PluginSettings(PII_MASKING_PLUGIN, piiMaskingConfigSchema, config);
  }

  async *handle(context: TranslationContext, next: Next): AsyncGenerator<TranslationOutput> {
    const masker = new PiiMasker(this.settings.resolve(context));
    const original = context.texts;

    const masked: Record<string, TextEntry> = {};
    for (const [key, entry] of Object.entries(original)) {
      masked[key] = withText(entry, masker.mask(textOf(entry)));
    }
    context.texts = masked;
    context.setPluginData(PII_MASKING_PLUGIN, 'maskCount', masker.size);
    this.settings.logger.info({ masks: masker.size, texts: Object.keys(masked).length }, 'PII masking applied');

    try {
      for await (const output of next(context)) {
        const value = masker.restore(output.value);
        if (value !== output.value) {
          context.setTranslation(output.locale, output.key, value);
        }
        yield { ...output, value };
      }
    } finally {
      context.texts = original;
      this.restoreTranslations(context, masker);
    }
  }

  private restoreTranslations(context: TranslationContext, masker: PiiMasker): void {
    if (masker.size === 0) return;
    for (const [locale, entries] of Object.entries(context.allTranslations())) {
      for (const [key, value] of Object.entries(entries)) {
        const restored = masker.restore(value);
        if (restored !== value) context.setTranslation(locale, key, restored);
      }
    }
  }
}
