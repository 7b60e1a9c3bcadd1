import { describe, it, expect, vi } from 'vitest';
import {
  ConsensusEngine,
  LocaleState,
  applyParameterOverrides,
  longestCandidate,
  parseJudgeSelection,
  type ConsensusSettings,
} from '../engine/consensus.js';
import { ConfigurationError, JudgeParseFailure, LocaleFailedError } from '../errors.js';
import type { PromptInput } from '../prompts.js';
import type { BackendFactory, TokenUsage } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { ScriptedBackend, itemsReply, providerConfig, scriptedFactory } from './helpers/scripted-backend.js';

const prompt: PromptInput = {
  sourceLocale: 'en',
  targetLocale: 'de',
  strings: [{ key: 'greeting', text: 'Hello' }],
};

function settings(overrides: Partial<ConsensusSettings> = {}): ConsensusSettings {
  return {
    providers: [providerConfig('alpha'), providerConfig('beta')],
    judge: providerConfig('judge'),
    executionMode: 'parallel',
    consensusThreshold: 2,
    fallbackOnFailure: true,
    retryAttempts: 1,
    timeoutMs: 0,
    retryBaseDelayMs: 0,
    retryMaxDelayMs: 0,
    temperatureOverrides: {},
    ...overrides,
  };
}

function engine(config: ConsensusSettings, backendFactory: BackendFactory): ConsensusEngine {
  return new ConsensusEngine(config, { backendFactory, logger: createLogger('test') });
}

describe('ConsensusEngine', () => {
  it('should pick the candidate the judge names', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Servus' })]);
    const judge = new ScriptedBackend('judge', ['2']);

    const resolution = await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: {},
    });

    expect(resolution.translations).toEqual([
      { key: 'greeting', value: 'Servus', provider: 'beta', method: 'judge', candidates: 2 },
    ]);
    expect(resolution.states).toEqual([
      LocaleState.Pending,
      LocaleState.Running,
      LocaleState.Consensus,
      LocaleState.Resolved,
    ]);
    expect(resolution.warnings).toEqual([]);
    expect(judge.requests[0].messages[0].content).toContain('1. [alpha]: Hallo\n2. [beta]: Servus\n');
  });

  it('should fall back to the longest candidate when the judge reply has no number', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Guten Tag' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Hallo' })]);
    const judge = new ScriptedBackend('judge', ['I like both']);

    const resolution = await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: {},
    });

    expect(resolution.translations).toEqual([
      { key: 'greeting', value: 'Guten Tag', provider: 'alpha', method: 'fallback', candidates: 2 },
    ]);
    expect(resolution.warnings).toEqual([
      "Could not parse a candidate number from judge reply 'I like both'; using fallback selection for 'greeting' in locale 'de'",
    ]);
  });

  it('should fall back when the judge call fails', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Guten Tag' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Hallo' })]);
    const judge = new ScriptedBackend('judge', [new Error('judge down')]);

    const resolution = await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: {},
    });

    expect(resolution.translations[0].method).toBe('fallback');
    expect(resolution.warnings).toEqual([
      "Judge failed: judge down; using fallback selection for 'greeting' in locale 'de'",
    ]);
  });

  it('should use a custom fallback selector', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Guten Tag' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Hallo' })]);
    const judge = new ScriptedBackend('judge', ['?']);
    const shortest = new ConsensusEngine(settings(), {
      backendFactory: scriptedFactory(alpha, beta, judge),
      fallbackSelector: (candidates) => candidates[candidates.length - 1],
      logger: createLogger('test'),
    });

    const resolution = await shortest.translateLocale({ prompt, callbacks: {} });

    expect(resolution.translations[0]).toMatchObject({ value: 'Hallo', provider: 'beta', method: 'fallback' });
  });

  it('should skip the judge when every provider agrees', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Hallo' })]);
    const judge = new ScriptedBackend('judge', ['1']);

    const resolution = await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: {},
    });

    expect(resolution.translations).toEqual([
      { key: 'greeting', value: 'Hallo', provider: 'alpha', method: 'unanimous', candidates: 2 },
    ]);
    expect(judge.requests).toHaveLength(0);
  });

  it('should turn a failed provider into a warning and use the other one', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [new Error('boom')]);
    const judge = new ScriptedBackend('judge', ['1']);

    const resolution = await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: {},
    });

    expect(resolution.translations).toEqual([
      { key: 'greeting', value: 'Hallo', provider: 'alpha', method: 'direct', candidates: 1 },
    ]);
    expect(resolution.states).toEqual([
      LocaleState.Pending,
      LocaleState.Running,
      LocaleState.Direct,
      LocaleState.Resolved,
    ]);
    expect(resolution.warnings).toEqual(["Provider 'beta' failed for locale 'de': Failed after 1 attempt(s): boom"]);
  });

  it('should fail the locale when no provider succeeds', async () => {
    const alpha = new ScriptedBackend('alpha', [new Error('boom')]);
    const beta = new ScriptedBackend('beta', [new Error('boom')]);
    const judge = new ScriptedBackend('judge', ['1']);

    const attempt = engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({ prompt, callbacks: {} });

    await expect(attempt).rejects.toThrow(LocaleFailedError);
    await expect(attempt).rejects.toThrow(
      "Translation failed for locale 'de': no provider produced a usable translation"
    );
  });

  it('should fail the locale on any provider failure when fallback is off', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [new Error('boom')]);
    const judge = new ScriptedBackend('judge', ['1']);

    const attempt = engine(settings({ fallbackOnFailure: false }), scriptedFactory(alpha, beta, judge)).translateLocale(
      { prompt, callbacks: {} }
    );

    await expect(attempt).rejects.toThrow(
      "Translation failed for locale 'de': Provider 'beta' failed for locale 'de': Failed after 1 attempt(s): boom"
    );
  });

  it('should stop after the first success in sequential mode below the consensus threshold', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Servus' })]);
    const judge = new ScriptedBackend('judge', ['2']);

    const resolution = await engine(
      settings({ executionMode: 'sequential', consensusThreshold: 3 }),
      scriptedFactory(alpha, beta, judge)
    ).translateLocale({ prompt, callbacks: {} });

    expect(resolution.translations[0]).toMatchObject({ value: 'Hallo', method: 'direct' });
    expect(beta.requests).toHaveLength(0);
  });

  it('should run every provider in sequential mode at the consensus threshold', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Servus' })]);
    const judge = new ScriptedBackend('judge', ['2']);

    const resolution = await engine(settings({ executionMode: 'sequential' }), scriptedFactory(alpha, beta, judge))
      .translateLocale({ prompt, callbacks: {} });

    expect(resolution.translations[0]).toMatchObject({ value: 'Servus', method: 'judge' });
  });

  it('should apply temperature overrides to provider requests', async () => {
    const backend = new ScriptedBackend('gpt-5-mini', [itemsReply({ greeting: 'Hallo' })]);

    await engine(
      settings({ providers: [providerConfig('fast', 'gpt-5-mini')], temperatureOverrides: { 'gpt-5': 1 } }),
      scriptedFactory(backend)
    ).translateLocale({ prompt, callbacks: {} });

    expect(backend.requests[0].temperature).toBe(1);
  });

  it('should reject configuration errors before calling any backend', async () => {
    const factory: BackendFactory = () => {
      throw new ConfigurationError('OPENAI_API_KEY is required for the openai provider');
    };

    await expect(engine(settings(), factory).translateLocale({ prompt, callbacks: {} })).rejects.toThrow(
      ConfigurationError
    );
  });

  it('should report one final usage per unit, judge included', async () => {
    const alpha = new ScriptedBackend('alpha', [itemsReply({ greeting: 'Hallo' })]);
    const beta = new ScriptedBackend('beta', [itemsReply({ greeting: 'Servus' })]);
    const judge = new ScriptedBackend('judge', ['1']);
    const finals: TokenUsage[] = [];
    const onTokenUsage = vi.fn((usage: TokenUsage) => {
      if (usage.final) finals.push(usage);
    });
    const onUsage = vi.fn();

    await engine(settings(), scriptedFactory(alpha, beta, judge)).translateLocale({
      prompt,
      callbacks: { onTokenUsage },
      onUsage,
    });

    expect(finals).toHaveLength(3);
    expect(onUsage).toHaveBeenCalledTimes(3);
    expect(onUsage).toHaveBeenCalledWith({
      input: 10,
      output: 5,
      total: 15,
      cacheCreationInput: 0,
      cacheReadInput: 0,
      final: true,
    });
  });

  it('should need at least one provider', () => {
    expect(() => engine(settings({ providers: [] }), scriptedFactory())).toThrow('At least one provider is required');
  });
});

describe('parseJudgeSelection', () => {
  it('should read the first number as a 1-based index', () => {
    expect(parseJudgeSelection('Candidate 2 is best', 3)).toBe(1);
    expect(parseJudgeSelection(' 1\n', 2)).toBe(0);
  });

  it('should reject numbers out of range', () => {
    expect(() => parseJudgeSelection('0', 2)).toThrow(JudgeParseFailure);
    expect(() => parseJudgeSelection('5', 2)).toThrow(JudgeParseFailure);
  });
});

describe('longestCandidate', () => {
  it('should count code points and keep the earlier candidate on a tie', () => {
    expect(longestCandidate([
      { provider: 'a', text: '\u{1F600}\u{1F600}' },
      { provider: 'b', text: 'abc' },
    ]).provider).toBe('b');
    expect(longestCandidate([
      { provider: 'a', text: 'abc' },
      { provider: 'b', text: 'xyz' },
    ]).provider).toBe('a');
  });
});

describe('applyParameterOverrides', () => {
  const logger = createLogger('test');

  it('should fix the temperature for matching model families', () => {
    expect(applyParameterOverrides(providerConfig('x', 'gpt-5'), { 'gpt-5': 1 }, logger).temperature).toBe(1);
    expect(applyParameterOverrides(providerConfig('x', 'gpt-5-nano'), { 'gpt-5': 1 }, logger).temperature).toBe(1);
  });

  it('should leave other models untouched', () => {
    const config = providerConfig('x', 'gpt-4o');
    expect(applyParameterOverrides(config, { 'gpt-5': 1 }, logger)).toBe(config);
  });
});
