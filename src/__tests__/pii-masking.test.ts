import { describe, it, expect } from 'vitest';
import { PluginRegistry } from '../core/plugin-registry.js';
import { TranslationPipeline } from '../core/translation-pipeline.js';
import { createTranslationRequest } from '../core/translation-request.js';
import { PiiMasker, PiiMaskingPlugin, isValidCardNumber, piiMaskingConfigSchema } from '../plugins/pii-masking.js';
import { collect, echoTranslator } from './helpers/plugins.js';

function masker(config: Record<string, unknown> = {}): PiiMasker {
  return new PiiMasker(piiMaskingConfigSchema.parse(config));
}

describe('PiiMasker', () => {
  it('should mask emails and phone numbers with numbered tokens', () => {
    const pii = masker();

    expect(pii.mask('Contact john@example.com or call (555) 123-4567')).toBe(
      'Contact __PII_EMAIL_1__ or call __PII_PHONE_2__'
    );
    expect(pii.size).toBe(2);
  });

  it('should reuse the token for a repeated value', () => {
    const pii = masker();

    expect(pii.mask('a@b.io and a@b.io')).toBe('__PII_EMAIL_1__ and __PII_EMAIL_1__');
    expect(pii.mask('again a@b.io')).toBe('again __PII_EMAIL_1__');
    expect(pii.size).toBe(1);
  });

  it('should mask SSNs, IP addresses and Luhn-valid card numbers', () => {
    const pii = masker();

    expect(pii.mask('SSN 123-45-6789')).toBe('SSN __PII_SSN_1__');
    expect(pii.mask('Server 192.168.1.10 down')).toBe('Server __PII_IP_2__ down');
    expect(pii.mask('Card 4111 1111 1111 1111 done')).toBe('Card __PII_CARD_3__ done');
  });

  it('should leave URLs alone unless enabled', () => {
    expect(masker().mask('See https://example.com/docs')).toBe('See https://example.com/docs');
    expect(masker({ maskUrls: true }).mask('See https://example.com/docs')).toBe('See __PII_URL_1__');
  });

  it('should apply custom patterns first with their own labels', () => {
    const pii = masker({ customPatterns: { 'ORD-\\d+': 'ORDER' } });

    expect(pii.mask('Order ORD-12345 shipped')).toBe('Order __PII_ORDER_1__ shipped');
  });

  it('should honour a custom token format', () => {
    const pii = masker({ tokenPrefix: '[[', tokenSuffix: ']]' });

    expect(pii.mask('mail a@b.io')).toBe('mail [[EMAIL_1]]');
  });

  it('should restore every token it handed out', () => {
    const pii = masker();
    const masked = pii.mask('Write to john@example.com');

    expect(pii.restore(`Schreiben Sie an ${masked.slice('Write to '.length)}`)).toBe(
      'Schreiben Sie an john@example.com'
    );
  });
});

describe('isValidCardNumber', () => {
  it('should check the Luhn digit', () => {
    expect(isValidCardNumber('4111 1111 1111 1111')).toBe(true);
    expect(isValidCardNumber('4111-1111-1111-1112')).toBe(false);
    expect(isValidCardNumber('1234')).toBe(false);
  });
});

describe('PiiMaskingPlugin', () => {
  it('should send masked texts and restore outputs, translations and texts', async () => {
    const seen: Array<Record<string, string>> = [];
    const registry = new PluginRegistry().register(new PiiMaskingPlugin()).register(echoTranslator(seen));
    const pipeline = new TranslationPipeline(registry);
    const context = pipeline.createContext(
      createTranslationRequest({
        sourceLocale: 'en',
        targetLocales: ['de'],
        texts: { contact: 'Mail john@example.com', plain: 'Hello' },
      })
    );

    const outputs = await collect(pipeline.execute(context));

    expect(seen).toEqual([{ contact: 'Mail __PII_EMAIL_1__', plain: 'Hello' }]);
    expect(outputs.map((output) => output.value)).toEqual(['de:Mail john@example.com', 'de:Hello']);
    expect(context.getTranslations('de')).toEqual({ contact: 'de:Mail john@example.com', plain: 'de:Hello' });
    expect(context.texts).toEqual({ contact: 'Mail john@example.com', plain: 'Hello' });
    expect(context.getPluginData('pii_masking', 'maskCount')).toBe(1);
  });
});
