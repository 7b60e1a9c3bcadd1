import { ConfigurationError, VerificationFailedError, isConfigurationError } from '../errors.js';
import type { LocalizedItem } from '../types.js';
import { withRetry } from '../utils/retry.js';

export interface VerifiedItems {
  /** Usable items, keys stripped of the request prefix and limited to the source keys. */
  items: LocalizedItem[];
  missingKeys: string[];
  extraKeys: string[];
  warnings: string[];
}

export interface VerifiedResult extends VerifiedItems {
  /** Attempts consumed, including the successful one. */
  attempts: number;
}

export interface VerificationLoopOptions {
  attempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  keyPrefix?: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export function stripKeyPrefix(key: string, keyPrefix?: string): string {
  if (!keyPrefix) return key;
  const prefix = `${keyPrefix}.`;
  return key.startsWith(prefix) ? key.slice(prefix.length) : key;
}

function hasText(value: string): boolean {
  return value.trim() !== '';
}

/**
 * Checks a decoded reply against the keys that were sent. Missing and
 * unexpected keys become warnings; a reply with nothing usable fails.
 */
export function verifyItems(
  items: readonly LocalizedItem[],
  sourceKeys: readonly string[],
  keyPrefix?: string
): VerifiedItems {
  const receivedKeys = items.map((item) => stripKeyPrefix(item.key, keyPrefix));
  const fail = (message: string): never => {
    throw new VerificationFailedError(message, { sourceKeys: [...sourceKeys], receivedKeys });
  };

  // A lone string may come back under any key the backend picked.
  if (sourceKeys.length === 1 && items.length === 1) {
    const [item] = items;
    if (!hasText(item.key) || !hasText(item.translated)) {
      fail('No valid translations found in response');
    }
    return { items: [{ ...item, key: sourceKeys[0] }], missingKeys: [], extraKeys: [], warnings: [] };
  }

  const source = new Set(sourceKeys);
  const warnings: string[] = [];
  const usable: LocalizedItem[] = [];
  const extraKeys: string[] = [];
  const seen = new Set<string>();

  for (const item of items) {
    const key = stripKeyPrefix(item.key, keyPrefix);
    if (!hasText(key)) continue;
    seen.add(key);
    if (!source.has(key)) {
      extraKeys.push(key);
      warnings.push(`Unexpected key '${key}' in response`);
      continue;
    }
    if (!hasText(item.translated)) {
      warnings.push(`Empty translation for key '${key}'`);
      continue;
    }
    usable.push({ ...item, key });
  }

  if (usable.length === 0) {
    fail('No valid translations found in response');
  }

  const translatedKeys = new Set(usable.map((item) => item.key));
  const missingKeys = sourceKeys.filter((key) => !translatedKeys.has(key));
  for (const key of missingKeys) {
    if (!seen.has(key)) {
      warnings.push(`Missing translation for key '${key}'`);
    }
  }

  return { items: usable, missingKeys, extraKeys, warnings };
}

/** Configuration problems abort immediately; everything else is worth another attempt. */
export function isRetryableTranslationFailure(error: unknown): boolean {
  return !isConfigurationError(error);
}

/**
 * Calls the backend until a reply passes verification or the attempt
 * budget is spent. Throws RetryExhaustedError carrying the attempt count.
 */
export async function runWithVerification(
  invoke: (attempt: number) => Promise<readonly LocalizedItem[]>,
  sourceKeys: readonly string[],
  options: VerificationLoopOptions
): Promise<VerifiedResult> {
  if (!Number.isInteger(options.attempts) || options.attempts < 1) {
    throw new ConfigurationError(`Retry attempts must be a positive integer, got ${options.attempts}`);
  }

  let attempts = 0;
  const verified = await withRetry(
    async (attempt) => {
      attempts = attempt;
      const items = await invoke(attempt);
      return verifyItems(items, sourceKeys, options.keyPrefix);
    },
    {
      maxAttempts: options.attempts,
      baseDelayMs: options.baseDelayMs ?? 1000,
      maxDelayMs: options.maxDelayMs ?? 10000,
      shouldRetry: isRetryableTranslationFailure,
      onRetry: options.onRetry,
      signal: options.signal,
    }
  );

  return { ...verified, attempts };
}
