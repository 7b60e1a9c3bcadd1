import {
  ConfigurationError,
  JudgeParseFailure,
  LocaleFailedError,
  errorMessage,
  isConfigurationError,
} from '../errors.js';
import { getJudgePrompt, getJudgeSystemPrompt, type PromptInput } from '../prompts.js';
import type {
  BackendClient,
  BackendFactory,
  NamedProviderConfig,
  ProviderConfig,
  TokenUsage,
  TranslationCallbacks,
} from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { TokenUsageAccumulator } from './token-usage.js';
import { runTranslationUnit, type UnitResult } from './translation-unit.js';

export const LocaleState = {
  Pending: 'pending',
  Running: 'running',
  Consensus: 'consensus',
  Direct: 'direct',
  Resolved: 'resolved',
  Failed: 'failed',
} as const;

export type LocaleState = (typeof LocaleState)[keyof typeof LocaleState];

export type ExecutionMode = 'parallel' | 'sequential';

export interface ConsensusSettings {
  providers: NamedProviderConfig[];
  /** Defaults to the first provider. */
  judge?: ProviderConfig;
  executionMode: ExecutionMode;
  /** Provider count at which agreement is sought. */
  consensusThreshold: number;
  fallbackOnFailure: boolean;
  retryAttempts: number;
  timeoutMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Fixed temperatures for models that reject other values, by model prefix. */
  temperatureOverrides: Record<string, number>;
}

export interface Candidate {
  provider: string;
  text: string;
}

/** Picks a candidate when the judge cannot. Must be deterministic. */
export type FallbackSelector = (candidates: readonly Candidate[]) => Candidate;

export type SelectionMethod = 'direct' | 'unanimous' | 'judge' | 'fallback';

export interface ResolvedTranslation {
  key: string;
  value: string;
  provider: string;
  method: SelectionMethod;
  candidates: number;
}

export interface LocaleJob {
  prompt: PromptInput;
  callbacks: TranslationCallbacks;
  onUsage?: (usage: TokenUsage) => void;
  signal?: AbortSignal;
}

export interface LocaleResolution {
  locale: string;
  state: LocaleState;
  states: LocaleState[];
  translations: ResolvedTranslation[];
  warnings: string[];
}

export interface ConsensusDependencies {
  backendFactory: BackendFactory;
  fallbackSelector?: FallbackSelector;
  logger?: Logger;
}

/** Longest text wins, by code points; the earlier candidate wins a tie. */
export const longestCandidate: FallbackSelector = (candidates) => {
  let best = candidates[0];
  for (const candidate of candidates.slice(1)) {
    if ([...candidate.text].length > [...best.text].length) {
      best = candidate;
    }
  }
  return best;
};

/** Reads the first integer of a judge reply as a 1-based candidate number. */
export function parseJudgeSelection(reply: string, candidateCount: number): number {
  const match = /\d+/.exec(reply);
  const selected = match ? parseInt(match[0], 10) : NaN;
  if (!Number.isInteger(selected) || selected < 1 || selected > candidateCount) {
    throw new JudgeParseFailure(reply);
  }
  return selected - 1;
}

export function applyParameterOverrides<T extends ProviderConfig>(
  config: T,
  overrides: Record<string, number>,
  logger: Logger
): T {
  for (const [model, temperature] of Object.entries(overrides)) {
    if (config.model !== model && !config.model.startsWith(`${model}-`)) continue;
    if (config.temperature === temperature) return config;
    logger.warn({ model: config.model, from: config.temperature, to: temperature }, `Fixed temperature to ${temperature} for ${model} model`);
    return { ...config, temperature };
  }
  return config;
}

interface ProviderSuccess {
  provider: NamedProviderConfig;
  result: UnitResult;
}

/**
 * Runs the configured providers for one locale and settles on one text per
 * key. Results are merged only here, after each provider's unit completes.
 */
export class ConsensusEngine {
  private readonly logger: Logger;
  private readonly fallbackSelector: FallbackSelector;
  private readonly providers: NamedProviderConfig[];
  private readonly judgeConfig: ProviderConfig;

  constructor(
    private readonly settings: ConsensusSettings,
    private readonly deps: ConsensusDependencies
  ) {
    if (settings.providers.length === 0) {
      throw new ConfigurationError('At least one provider is required');
    }
    this.logger = deps.logger ?? createLogger('consensus');
    this.fallbackSelector = deps.fallbackSelector ?? longestCandidate;
    this.providers = settings.providers.map((provider) =>
      applyParameterOverrides(provider, settings.temperatureOverrides, this.logger)
    );
    this.judgeConfig = applyParameterOverrides(
      settings.judge ?? settings.providers[0],
      settings.temperatureOverrides,
      this.logger
    );
  }

  get needsConsensus(): boolean {
    return this.providers.length >= this.settings.consensusThreshold;
  }

  async translateLocale(job: LocaleJob): Promise<LocaleResolution> {
    const locale = job.prompt.targetLocale;
    const states: LocaleState[] = [LocaleState.Pending];
    const warnings: string[] = [];

    // Building every client first surfaces configuration errors before any call.
    const backends = new Map<string, BackendClient>();
    for (const provider of this.providers) {
      backends.set(provider.name, this.deps.backendFactory(provider));
    }
    const judgeBackend = this.providers.length > 1 ? this.deps.backendFactory(this.judgeConfig) : undefined;

    states.push(LocaleState.Running);
    const fail = (reason: string): never => {
      states.push(LocaleState.Failed);
      throw new LocaleFailedError(locale, reason);
    };

    const successes: ProviderSuccess[] = [];
    const failures: string[] = [];
    const run = async (provider: NamedProviderConfig): Promise<ProviderSuccess> => {
      const backend = backends.get(provider.name);
      if (!backend) {
        throw new ConfigurationError(`No backend for provider '${provider.name}'`);
      }
      const result = await runTranslationUnit(job.prompt, provider, backend, {
        attempts: this.settings.retryAttempts,
        timeoutMs: this.settings.timeoutMs,
        retryBaseDelayMs: this.settings.retryBaseDelayMs,
        retryMaxDelayMs: this.settings.retryMaxDelayMs,
        callbacks: job.callbacks,
        onUsage: job.onUsage,
        signal: job.signal,
      });
      job.callbacks.onProviderCompleted?.(locale, provider.name, result.items.length);
      return { provider, result };
    };
    const recordFailure = (provider: NamedProviderConfig, error: unknown): void => {
      if (isConfigurationError(error)) throw error;
      const message = `Provider '${provider.name}' failed for locale '${locale}': ${errorMessage(error)}`;
      this.logger.warn({ provider: provider.name, locale }, message);
      failures.push(message);
    };

    if (this.settings.executionMode === 'parallel') {
      const settled = await Promise.allSettled(this.providers.map((provider) => run(provider)));
      settled.forEach((outcome, index) => {
        if (outcome.status === 'fulfilled') {
          successes.push(outcome.value);
        } else {
          recordFailure(this.providers[index], outcome.reason);
        }
      });
    } else {
      for (const provider of this.providers) {
        if (job.signal?.aborted) break;
        try {
          successes.push(await run(provider));
        } catch (error) {
          recordFailure(provider, error);
          if (!this.settings.fallbackOnFailure) break;
          continue;
        }
        if (this.providers.length === 1 || !this.needsConsensus) break;
      }
    }

    if (failures.length > 0 && !this.settings.fallbackOnFailure) {
      fail(failures.join('; '));
    }
    warnings.push(...failures);
    if (successes.length === 0) {
      fail('no provider produced a usable translation');
    }

    for (const { result } of successes) {
      warnings.push(...result.warnings);
    }

    let translations: ResolvedTranslation[];
    if (successes.length === 1) {
      states.push(LocaleState.Direct);
      const [only] = successes;
      translations = only.result.items.map((item): ResolvedTranslation => ({
        key: item.key,
        value: item.translated,
        provider: only.provider.name,
        method: 'direct',
        candidates: 1,
      }));
    } else {
      states.push(LocaleState.Consensus);
      translations = await this.reconcile(job, successes, judgeBackend, warnings);
    }

    states.push(LocaleState.Resolved);
    return { locale, state: LocaleState.Resolved, states, translations, warnings };
  }

  private async reconcile(
    job: LocaleJob,
    successes: readonly ProviderSuccess[],
    judgeBackend: BackendClient | undefined,
    warnings: string[]
  ): Promise<ResolvedTranslation[]> {
    const resolved: ResolvedTranslation[] = [];

    for (const entry of job.prompt.strings) {
      const candidates: Candidate[] = [];
      for (const { provider, result } of successes) {
        const item = result.items.find((candidate) => candidate.key === entry.key);
        if (item) candidates.push({ provider: provider.name, text: item.translated });
      }
      if (candidates.length === 0) continue;

      if (candidates.length === 1) {
        resolved.push(this.resolvedFrom(entry.key, candidates[0], 'direct', 1));
        continue;
      }
      if (candidates.every((candidate) => candidate.text === candidates[0].text)) {
        resolved.push(this.resolvedFrom(entry.key, candidates[0], 'unanimous', candidates.length));
        continue;
      }

      const { candidate, method, warning } = await this.judge(job, entry.key, entry.text, candidates, judgeBackend);
      if (warning) warnings.push(warning);
      resolved.push(this.resolvedFrom(entry.key, candidate, method, candidates.length));
    }

    return resolved;
  }

  private async judge(
    job: LocaleJob,
    key: string,
    original: string,
    candidates: readonly Candidate[],
    backend: BackendClient | undefined
  ): Promise<{ candidate: Candidate; method: SelectionMethod; warning?: string }> {
    const locale = job.prompt.targetLocale;
    const fallback = (reason: string) => {
      const warning = `${reason}; using fallback selection for '${key}' in locale '${locale}'`;
      this.logger.warn({ key, locale }, warning);
      return { candidate: this.fallbackSelector(candidates), method: 'fallback' as const, warning };
    };

    if (!backend) {
      return fallback('No judge available');
    }

    const prompt = getJudgePrompt(original, locale, candidates);
    job.callbacks.onPromptGenerated?.('judge', prompt);
    const usage = new TokenUsageAccumulator(job.callbacks.onTokenUsage);

    try {
      const response = await withTimeout('judge', this.settings.timeoutMs, (signal) =>
        backend.complete({
          model: this.judgeConfig.model,
          system: getJudgeSystemPrompt(),
          messages: [{ role: 'user', content: prompt }],
          temperature: this.judgeConfig.temperature,
          maxTokens: this.judgeConfig.maxTokens,
          extendedThinking: this.judgeConfig.extendedThinking,
          signal,
        }),
        job.signal
      );
      usage.record(response.usage);
      const index = parseJudgeSelection(response.text, candidates.length);
      return { candidate: candidates[index], method: 'judge' };
    } catch (error) {
      if (isConfigurationError(error)) throw error;
      if (error instanceof JudgeParseFailure) {
        return fallback(error.message);
      }
      return fallback(`Judge failed: ${errorMessage(error)}`);
    } finally {
      job.onUsage?.(usage.finalize());
    }
  }

  private resolvedFrom(key: string, candidate: Candidate, method: SelectionMethod, count: number): ResolvedTranslation {
    return { key, value: candidate.text, provider: candidate.provider, method, candidates: count };
  }
}
