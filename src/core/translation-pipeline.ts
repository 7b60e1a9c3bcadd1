import { ConfigurationError, ServiceNotFoundError, errorMessage } from '../errors.js';
import type {
  MiddlewarePlugin,
  Next,
  ObserverPlugin,
  PipelineEvent,
  TranslationPlugin,
} from '../plugins/types.js';
import type { TranslationCallbacks, TranslationOutput } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { PluginRegistry } from './plugin-registry.js';
import { DEFAULT_STAGE_ORDER, PipelineStages, validateStageOrder } from './pipeline-stages.js';
import { TranslationContext, type ReadonlyTranslationContext } from './translation-context.js';
import { booleanOption, stringOption, type TranslationRequest } from './translation-request.js';

export type StageHandler = (context: TranslationContext) => AsyncIterable<TranslationOutput>;

export type ServiceHandler = (context: TranslationContext) => AsyncIterable<TranslationOutput>;

export type PipelineListener = (event: PipelineEvent, context: ReadonlyTranslationContext) => void;

type Link = (context: TranslationContext, next: Next) => AsyncIterable<TranslationOutput>;

interface RegisteredHandler {
  handler: StageHandler;
  priority: number;
  sequence: number;
}

export interface PipelineOptions {
  stages?: readonly string[];
}

export const DEFAULT_TRANSLATION_SERVICE = 'translation.multi_provider';

const log = createLogger('pipeline');

async function* nothing(): AsyncGenerator<TranslationOutput> {}

function matchesEvent(pattern: string, name: string): boolean {
  if (pattern === '*' || pattern === name) return true;
  if (!pattern.includes('*')) return false;
  const expression = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^.]+');
  return new RegExp(`^${expression}$`).test(name);
}

/**
 * Runs a request through the stages in order. Each stage contributes its
 * middleware plugins, highest priority outermost, followed by the stage's own
 * handlers; the chain is a flat list walked with an index-based `next`.
 */
export class TranslationPipeline {
  readonly stages: readonly string[];
  private readonly order: readonly TranslationPlugin[];
  private readonly stageHandlers = new Map<string, RegisteredHandler[]>();
  private readonly services = new Map<string, ServiceHandler>();
  private readonly listeners = new Map<string, PipelineListener[]>();
  private readonly observers: ObserverPlugin[] = [];
  private links: Link[] = [];
  private handlerSequence = 0;

  constructor(
    readonly registry: PluginRegistry = new PluginRegistry(),
    options: PipelineOptions = {}
  ) {
    this.stages = validateStageOrder(options.stages ?? DEFAULT_STAGE_ORDER);
    this.order = registry.resolveOrder();

    this.registerStage(PipelineStages.TRANSLATION, (context) => this.runTranslationService(context), 0);
    this.registerStage(PipelineStages.OUTPUT, (context) => this.recordUnresolved(context), -1000);

    for (const plugin of this.order) {
      this.wirePlugin(plugin);
    }
    this.links = this.buildChain();
  }

  registerStage(stage: string, handler: StageHandler, priority = 0): this {
    if (!this.stages.includes(stage)) {
      throw new ConfigurationError(`Unknown stage '${stage}'. Known stages: ${this.stages.join(', ')}`);
    }
    const handlers = this.stageHandlers.get(stage) ?? [];
    handlers.push({ handler, priority, sequence: this.handlerSequence++ });
    handlers.sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);
    this.stageHandlers.set(stage, handlers);
    return this;
  }

  registerService(name: string, handler: ServiceHandler): this {
    if (this.services.has(name)) {
      throw new ConfigurationError(`Service '${name}' is already registered`);
    }
    this.services.set(name, handler);
    return this;
  }

  hasService(name: string): boolean {
    return this.services.has(name);
  }

  executeService(name: string, context: TranslationContext): AsyncIterable<TranslationOutput> {
    const handler = this.services.get(name);
    if (!handler) {
      throw new ServiceNotFoundError(name);
    }
    return handler(context);
  }

  on(event: string, listener: PipelineListener): this {
    const listeners = this.listeners.get(event) ?? [];
    listeners.push(listener);
    this.listeners.set(event, listeners);
    return this;
  }

  /** Drops ad-hoc listeners. Plugin wiring stays. */
  clear(): void {
    this.listeners.clear();
  }

  createContext(request: TranslationRequest, callbacks: TranslationCallbacks = {}): TranslationContext {
    const overlays = new Map<string, Record<string, unknown>>();
    for (const plugin of this.order) {
      const tenant = this.registry.overridesFor(plugin.name, request.tenantId);
      const perRequest = request.pluginConfigs[plugin.name];
      if (tenant || perRequest) {
        overlays.set(plugin.name, { ...tenant, ...perRequest });
      }
    }
    return new TranslationContext(request, { callbacks, overlays });
  }

  process(request: TranslationRequest, callbacks: TranslationCallbacks = {}): AsyncGenerator<TranslationOutput> {
    return this.execute(this.createContext(request, callbacks));
  }

  /** Single pass over one context; outputs arrive in completion order. */
  async *execute(context: TranslationContext): AsyncGenerator<TranslationOutput> {
    let failed = false;
    try {
      for (const plugin of this.order) {
        if (plugin.boot && this.isActive(plugin, context)) {
          await plugin.boot(context);
        }
      }
      this.emit('translation.started', context);

      for await (const output of this.dispatch(0)(context)) {
        context.callbacks.onProgress?.(output);
        yield output;
      }

      context.complete();
      this.emit('translation.completed', context);
    } catch (error) {
      failed = true;
      context.complete();
      context.addError(errorMessage(error));
      this.emit('translation.failed', context, { error });
      throw error;
    } finally {
      await this.terminate(context, failed);
    }
  }

  isActive(plugin: TranslationPlugin, context: ReadonlyTranslationContext): boolean {
    const { request } = context;
    if (!this.registry.isEnabledFor(plugin.name, request.tenantId)) return false;
    if (plugin.kind === 'middleware' && booleanOption(request, `skip_${plugin.name}`)) return false;
    if (plugin.kind === 'observer' && booleanOption(request, `disable_${plugin.name}`)) return false;
    return true;
  }

  private wirePlugin(plugin: TranslationPlugin): void {
    switch (plugin.kind) {
      case 'middleware':
        if (!this.stages.includes(plugin.stage)) {
          throw new ConfigurationError(`Plugin '${plugin.name}' is bound to unknown stage '${plugin.stage}'`);
        }
        break;
      case 'provider':
        for (const service of plugin.provides) {
          this.registerService(service, (context) =>
            this.isActive(plugin, context) ? plugin.execute(context, service) : nothing()
          );
        }
        for (const stage of plugin.when) {
          this.registerStage(
            stage,
            (context) => (this.isActive(plugin, context) ? plugin.execute(context, stage) : nothing()),
            plugin.priority
          );
        }
        break;
      case 'observer':
        this.observers.push(plugin);
        break;
    }
  }

  private middlewareFor(stage: string): MiddlewarePlugin[] {
    const rank = new Map(this.order.map((plugin, index) => [plugin.name, index]));
    return this.order
      .filter((plugin): plugin is MiddlewarePlugin => plugin.kind === 'middleware' && plugin.stage === stage)
      .sort((a, b) => b.priority - a.priority || (rank.get(a.name) ?? 0) - (rank.get(b.name) ?? 0));
  }

  private buildChain(): Link[] {
    const links: Link[] = [];
    for (const stage of this.stages) {
      for (const plugin of this.middlewareFor(stage)) {
        links.push((context, next) => {
          if (!this.isActive(plugin, context)) return next(context);
          context.currentStage = stage;
          return plugin.handle(context, next);
        });
      }
      links.push((context, next) => this.runStage(stage, context, next));
    }
    return links;
  }

  private dispatch(index: number): Next {
    return (context) => {
      const link = this.links[index];
      return link ? link(context, this.dispatch(index + 1)) : nothing();
    };
  }

  private async *runStage(stage: string, context: TranslationContext, next: Next): AsyncGenerator<TranslationOutput> {
    context.currentStage = stage;
    const startedAt = Date.now();
    this.emit(`stage.${stage}.started`, context, { stage });
    log.debug({ stage }, 'Stage started');

    for (const { handler } of this.stageHandlers.get(stage) ?? []) {
      yield* handler(context);
    }

    context.recordStageTiming(stage, Date.now() - startedAt);
    this.emit(`stage.${stage}.completed`, context, { stage });
    yield* next(context);
  }

  private async *runTranslationService(context: TranslationContext): AsyncGenerator<TranslationOutput> {
    const service = stringOption(context.request, 'translation_service', DEFAULT_TRANSLATION_SERVICE);
    yield* this.executeService(service, context);
  }

  private async *recordUnresolved(context: TranslationContext): AsyncGenerator<TranslationOutput> {
    for (const locale of context.request.targetLocales) {
      for (const key of context.pendingKeys(locale)) {
        if (!context.hasTranslation(locale, key)) {
          context.addWarning(`Unresolved translation for '${key}' in locale '${locale}'`);
        }
      }
    }
  }

  private emit(name: string, context: TranslationContext, extra: Omit<PipelineEvent, 'name' | 'timestamp'> = {}): void {
    const event: PipelineEvent = { name, timestamp: Date.now(), ...extra };

    for (const observer of this.observers) {
      if (!observer.events.some((pattern) => matchesEvent(pattern, name))) continue;
      if (!this.isActive(observer, context)) continue;
      this.notify(`Observer '${observer.name}'`, context, () => observer.observe(event, context));
    }
    for (const [pattern, listeners] of this.listeners) {
      if (!matchesEvent(pattern, name)) continue;
      for (const listener of listeners) {
        this.notify(`Listener for '${pattern}'`, context, () => listener(event, context));
      }
    }
  }

  // A broken observer is reported but does not abort the run.
  private notify(label: string, context: TranslationContext, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      log.error({ err: error }, `${label} failed`);
      context.addWarning(`${label} failed: ${errorMessage(error)}`);
    }
  }

  private async terminate(context: TranslationContext, failed: boolean): Promise<void> {
    for (const plugin of this.order) {
      if (plugin.kind === 'middleware' && plugin.terminate && this.isActive(plugin, context)) {
        await plugin.terminate(context, failed);
      }
    }
  }
}
