import { describe, it, expect, vi } from 'vitest';
import { runTranslationUnit, type UnitOptions } from '../engine/translation-unit.js';
import { TokenUsageAccumulator } from '../engine/token-usage.js';
import { ProviderTimeoutError, RetryExhaustedError } from '../errors.js';
import type { PromptInput } from '../prompts.js';
import type { TokenUsage, TranslationCallbacks } from '../types.js';
import { HANG, ScriptedBackend, itemsReply, providerConfig } from './helpers/scripted-backend.js';

const prompt: PromptInput = {
  sourceLocale: 'en',
  targetLocale: 'de',
  strings: [
    { key: 'a', text: 'Apple' },
    { key: 'b', text: 'Banana' },
  ],
};

function options(callbacks: TranslationCallbacks = {}, overrides: Partial<UnitOptions> = {}): UnitOptions {
  return {
    attempts: 2,
    timeoutMs: 0,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    callbacks,
    ...overrides,
  };
}

describe('runTranslationUnit', () => {
  it('should discard a failed attempt and keep only the retry', async () => {
    const backend = new ScriptedBackend('alpha', ['garbage', itemsReply({ a: 'Apfel', b: 'Banane' })]);
    const onTranslated = vi.fn();

    const result = await runTranslationUnit(prompt, providerConfig('alpha'), backend, options({ onTranslated }));

    expect(result.items).toEqual([
      { key: 'a', translated: 'Apfel' },
      { key: 'b', translated: 'Banane' },
    ]);
    expect(result.attempts).toBe(2);
    expect(onTranslated).toHaveBeenCalledTimes(2);
    expect(onTranslated).toHaveBeenCalledWith({ key: 'a', translated: 'Apfel' }, 'de', 'alpha');
  });

  it('should report the final usage exactly once across attempts', async () => {
    const backend = new ScriptedBackend('alpha', ['garbage', itemsReply({ a: 'Apfel', b: 'Banane' })]);
    const usages: TokenUsage[] = [];
    const onUsage = vi.fn();

    const result = await runTranslationUnit(
      prompt,
      providerConfig('alpha'),
      backend,
      options({ onTokenUsage: (usage) => usages.push(usage) }, { onUsage })
    );

    const expected = { input: 20, output: 10, total: 30, cacheCreationInput: 0, cacheReadInput: 0, final: true };
    expect(usages.filter((usage) => usage.final)).toEqual([expected]);
    expect(usages[usages.length - 1]).toEqual(expected);
    expect(result.usage).toEqual(expected);
    expect(onUsage).toHaveBeenCalledTimes(1);
  });

  it('should generate the prompts once per unit', async () => {
    const backend = new ScriptedBackend('alpha', ['garbage', itemsReply({ a: 'Apfel', b: 'Banane' })]);
    const onPromptGenerated = vi.fn();

    await runTranslationUnit(prompt, providerConfig('alpha'), backend, options({ onPromptGenerated }));

    expect(onPromptGenerated.mock.calls.map(([kind]) => kind)).toEqual(['system', 'user']);
    expect(backend.requests).toHaveLength(2);
    expect(backend.requests[0].system).toBe(backend.requests[1].system);
  });

  it('should send prefixed keys and strip the prefix from results', async () => {
    const backend = new ScriptedBackend('alpha', [itemsReply({ 'messages.a': 'Apfel', 'messages.b': 'Banane' })]);
    const onTranslated = vi.fn();

    const result = await runTranslationUnit(
      { ...prompt, keyPrefix: 'messages' },
      providerConfig('alpha'),
      backend,
      options({ onTranslated })
    );

    expect(backend.requests[0].messages[0].content).toContain('- `messages.a`: """Apple"""');
    expect(result.items.map((item) => item.key)).toEqual(['a', 'b']);
    expect(onTranslated).toHaveBeenCalledWith({ key: 'b', translated: 'Banane' }, 'de', 'alpha');
  });

  it('should keep partial results as warnings', async () => {
    const backend = new ScriptedBackend('alpha', [itemsReply({ a: 'Apfel' })]);

    const result = await runTranslationUnit(prompt, providerConfig('alpha'), backend, options());

    expect(result.items).toEqual([{ key: 'a', translated: 'Apfel' }]);
    expect(result.warnings).toEqual(["[alpha/de] Missing translation for key 'b'"]);
  });

  it('should time out a hanging call and report the timeout', async () => {
    const backend = new ScriptedBackend('alpha', [HANG]);
    const onUsage = vi.fn();

    const error = await runTranslationUnit(
      prompt,
      providerConfig('alpha'),
      backend,
      options({}, { attempts: 1, timeoutMs: 20, onUsage })
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ lastError: expect.any(ProviderTimeoutError) });
    expect(onUsage).toHaveBeenCalledWith(expect.objectContaining({ total: 0, final: true }));
    expect(backend.requests[0].signal?.aborted).toBe(true);
  });

  it('should retry after a timeout', async () => {
    const backend = new ScriptedBackend('alpha', [HANG, itemsReply({ a: 'Apfel', b: 'Banane' })]);

    const result = await runTranslationUnit(
      prompt,
      providerConfig('alpha'),
      backend,
      options({}, { timeoutMs: 20 })
    );

    expect(result.attempts).toBe(2);
    expect(result.items).toHaveLength(2);
  });
});

describe('TokenUsageAccumulator', () => {
  it('should sum deltas and notify the listener until finalized', () => {
    const listener = vi.fn<(usage: TokenUsage) => void>();
    const usage = new TokenUsageAccumulator(listener);

    usage.record({ input: 100 });
    usage.record({ output: 40, cacheReadInput: 60 });
    const final = usage.finalize();
    usage.record({ output: 1 });
    usage.finalize();

    expect(final).toEqual({ input: 100, output: 40, total: 140, cacheCreationInput: 0, cacheReadInput: 60, final: true });
    expect(listener).toHaveBeenCalledTimes(3);
    expect(listener.mock.calls.filter(([snapshot]) => snapshot.final)).toHaveLength(1);
    expect(usage.snapshot().output).toBe(41);
  });

  it('should fold in totals from other units', () => {
    const usage = new TokenUsageAccumulator();
    usage.absorb({ input: 1, output: 2, total: 3, cacheCreationInput: 4, cacheReadInput: 5, final: true });
    usage.absorb({ input: 1, output: 2, total: 3, cacheCreationInput: 0, cacheReadInput: 0, final: true });

    expect(usage.snapshot()).toEqual({
      input: 2,
      output: 4,
      total: 6,
      cacheCreationInput: 4,
      cacheReadInput: 5,
      final: false,
    });
  });
});
