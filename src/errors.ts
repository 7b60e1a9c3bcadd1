export class TranslationError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

export class ProviderError extends TranslationError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    retryable: boolean = true
  ) {
    super(message, retryable);
    this.name = 'ProviderError';
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    provider: string,
    public readonly retryAfterMs: number
  ) {
    super(`Rate limit exceeded for ${provider}`, provider, 429, true);
    this.name = 'RateLimitError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(
    provider: string,
    public readonly timeoutMs: number
  ) {
    super(`Provider '${provider}' timed out after ${timeoutMs}ms`, provider, undefined, true);
    this.name = 'ProviderTimeoutError';
  }
}

export interface VerificationDetails {
  sourceKeys: string[];
  receivedKeys: string[];
}

export class VerificationFailedError extends TranslationError {
  constructor(
    message: string,
    public readonly details: VerificationDetails
  ) {
    super(message, true);
    this.name = 'VerificationFailedError';
  }
}

export class RetryExhaustedError extends TranslationError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Failed after ${attempts} attempt(s): ${reason}`, false);
    this.name = 'RetryExhaustedError';
    this.cause = lastError;
  }
}

export class CircularDependencyError extends TranslationError {
  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, false);
    this.name = 'CircularDependencyError';
  }
}

export class MissingDependencyError extends TranslationError {
  constructor(
    public readonly plugin: string,
    public readonly dependency: string
  ) {
    super(`Plugin '${plugin}' depends on '${dependency}' which is not registered`, false);
    this.name = 'MissingDependencyError';
  }
}

export class UnconfiguredProviderError extends TranslationError {
  constructor(
    public readonly vendor: string,
    public readonly model?: string
  ) {
    super(
      model === undefined
        ? `Provider '${vendor}' is not configured`
        : `Provider '${vendor}' with model '${model}' is not configured`,
      false
    );
    this.name = 'UnconfiguredProviderError';
  }
}

export class ConfigurationError extends TranslationError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, false);
    this.name = 'ConfigurationError';
  }
}

export class JudgeParseFailure extends TranslationError {
  constructor(public readonly reply: string) {
    super(`Could not parse a candidate number from judge reply '${reply.trim().slice(0, 80)}'`, false);
    this.name = 'JudgeParseFailure';
  }
}

export class ServiceNotFoundError extends TranslationError {
  constructor(public readonly service: string) {
    super(`Service '${service}' not found`, false);
    this.name = 'ServiceNotFoundError';
  }
}

export class LocaleFailedError extends TranslationError {
  constructor(
    public readonly locale: string,
    reason: string
  ) {
    super(`Translation failed for locale '${locale}': ${reason}`, false);
    this.name = 'LocaleFailedError';
  }
}

export class TranslationFailedError extends TranslationError {
  constructor(public readonly errors: string[]) {
    super(
      errors.length > 0
        ? `No usable translations were produced. Errors: ${errors.join('; ')}`
        : 'No usable translations were produced',
      false
    );
    this.name = 'TranslationFailedError';
  }
}

export function isConfigurationError(error: unknown): boolean {
  return (
    error instanceof ConfigurationError ||
    error instanceof UnconfiguredProviderError ||
    error instanceof CircularDependencyError ||
    error instanceof MissingDependencyError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
