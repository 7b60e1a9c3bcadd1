import type { ReadonlyTranslationContext } from '../core/translation-context.js';
import { logger } from '../utils/logger.js';
import type { ObserverPlugin, PipelineEvent } from './types.js';

export const PROGRESS_PLUGIN = 'progress';

/** Forwards run start to `onStart` and logs stage timings and the run summary. */
export class ProgressObserver implements ObserverPlugin {
  readonly kind = 'observer';
  readonly name = PROGRESS_PLUGIN;
  readonly version = '1.0.0';
  readonly priority = 0;
  readonly dependencies: readonly string[] = [];
  readonly events = ['translation.started', 'stage.*.completed', 'translation.completed', 'translation.failed'];

  private readonly log = logger.child({ plugin: PROGRESS_PLUGIN });

  observe(event: PipelineEvent, context: ReadonlyTranslationContext): void {
    switch (event.name) {
      case 'translation.started':
        context.callbacks.onStart?.([...context.request.targetLocales], Object.keys(context.texts).length);
        break;
      case 'translation.completed':
      case 'translation.failed': {
        const usage = context.tokenUsage;
        this.log.info(
          {
            status: event.name === 'translation.completed' ? 'completed' : 'failed',
            durationMs: context.durationMs,
            inputTokens: usage.input,
            outputTokens: usage.output,
            warnings: context.warnings.length,
            errors: context.errors.length,
          },
          'Translation run finished'
        );
        break;
      }
      default:
        if (event.stage) {
          this.log.debug({ stage: event.stage, elapsedMs: context.stageTiming(event.stage) }, 'Stage completed');
        }
    }
  }
}
