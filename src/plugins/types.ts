import type { ReadonlyTranslationContext, TranslationContext } from '../core/translation-context.js';
import type { TranslationOutput } from '../types.js';

/** The rest of the chain, as seen from a middleware plugin. */
export type Next = (context: TranslationContext) => AsyncIterable<TranslationOutput>;

export interface PipelineEvent {
  name: string;
  stage?: string;
  error?: unknown;
  timestamp: number;
}

interface PluginCommon {
  readonly name: string;
  readonly version: string;
  /** Higher runs first within a stage. */
  readonly priority: number;
  /** Plugins that must boot before this one. */
  readonly dependencies: readonly string[];
  /** Runs once per pipeline run, in dependency order. */
  boot?(context: TranslationContext): void | Promise<void>;
}

/**
 * Wraps everything from its stage onwards. It may act before or after
 * calling `next`, rewrite the outputs flowing back, or not call it at all.
 */
export interface MiddlewarePlugin extends PluginCommon {
  readonly kind: 'middleware';
  readonly stage: string;
  handle(context: TranslationContext, next: Next): AsyncIterable<TranslationOutput>;
  /** Always runs after the pipeline run, whether it failed or not. */
  terminate?(context: TranslationContext, failed: boolean): void | Promise<void>;
}

/** Supplies named services, and optionally runs as a handler of some stages. */
export interface ProviderPlugin extends PluginCommon {
  readonly kind: 'provider';
  readonly provides: readonly string[];
  readonly when: readonly string[];
  /** `trigger` is the service name or the stage name that caused the call. */
  execute(context: TranslationContext, trigger: string): AsyncIterable<TranslationOutput>;
}

export interface ObserverPlugin extends PluginCommon {
  readonly kind: 'observer';
  /** Event names; `*` matches one dotted segment, a lone `*` matches everything. */
  readonly events: readonly string[];
  observe(event: PipelineEvent, context: ReadonlyTranslationContext): void;
}

export type TranslationPlugin = MiddlewarePlugin | ProviderPlugin | ObserverPlugin;

export type PluginKind = TranslationPlugin['kind'];
