import { z } from 'zod';
import { ConfigurationError, UnconfiguredProviderError } from '../errors.js';
import { VENDORS, type NamedProviderConfig, type ProviderConfig, type Vendor } from '../types.js';

export const DEFAULT_THINKING_BUDGET = 10000;

export const rateLimitSchema = z.object({
  tokensPerMinute: z.number().positive(),
  requestsPerMinute: z.number().positive(),
});

export const providerConfigSchema = z.object({
  vendor: z.enum(VENDORS),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(4096),
  extendedThinking: z
    .object({ budgetTokens: z.number().int().positive().default(DEFAULT_THINKING_BUDGET) })
    .optional(),
  rateLimit: rateLimitSchema.optional(),
  extras: z.record(z.unknown()).default({}),
});

export type ProviderConfigInput = z.input<typeof providerConfigSchema>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isVendor(value: string): value is Vendor {
  return VENDORS.some((vendor) => vendor === value);
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/** Validates one backend selection. Vendor problems surface before schema problems. */
export function parseProviderConfig(input: unknown): ProviderConfig {
  if (isRecord(input)) {
    const { vendor, model } = input;
    if (typeof vendor === 'string' && !isVendor(vendor)) {
      throw new UnconfiguredProviderError(vendor, typeof model === 'string' ? model : undefined);
    }
    if (typeof vendor === 'string' && (typeof model !== 'string' || model.trim() === '')) {
      throw new UnconfiguredProviderError(vendor);
    }
  }

  const result = providerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid provider configuration', formatIssues(result.error));
  }

  const config = result.data;
  if (config.extendedThinking && config.maxTokens <= config.extendedThinking.budgetTokens) {
    throw new ConfigurationError(
      `maxTokens (${config.maxTokens}) must be greater than the extended thinking budget (${config.extendedThinking.budgetTokens})`
    );
  }
  return config;
}

export function parseProviderMap(providers: Record<string, unknown>): NamedProviderConfig[] {
  return Object.entries(providers).map(([name, input]) => ({ ...parseProviderConfig(input), name }));
}

/**
 * Merges configuration layers and validates the result. Later layers win;
 * the merge is shallow.
 */
export function resolveLayers<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  layers: ReadonlyArray<Record<string, unknown> | undefined>,
  label: string
): T {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (layer) Object.assign(merged, layer);
  }
  const result = schema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration for ${label}`, formatIssues(result.error));
  }
  return result.data;
}
