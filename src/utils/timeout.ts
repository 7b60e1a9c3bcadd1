import { ProviderTimeoutError } from '../errors.js';

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs` or when `parent`
 * aborts. The returned promise rejects at that point, with
 * ProviderTimeoutError or the parent's reason, whether or not the callee
 * honours the signal.
 */
export async function withTimeout<T>(
  provider: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const cutoff = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => controller.abort(new ProviderTimeoutError(provider, timeoutMs)), timeoutMs);
    }
  });

  try {
    return await Promise.race([fn(controller.signal), cutoff]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
