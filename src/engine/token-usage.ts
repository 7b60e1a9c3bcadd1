import type { TokenUsage, TokenUsageDelta } from '../types.js';

export type TokenUsageListener = (usage: TokenUsage) => void;

export function emptyUsage(): TokenUsage {
  return { input: 0, output: 0, total: 0, cacheCreationInput: 0, cacheReadInput: 0, final: false };
}

/**
 * Running token totals for one unit of work. Updates are plain sums, so
 * partial deltas from concurrent units can be folded in any order.
 */
export class TokenUsageAccumulator {
  private input = 0;
  private output = 0;
  private cacheCreationInput = 0;
  private cacheReadInput = 0;
  private finalized = false;

  constructor(private readonly listener?: TokenUsageListener) {}

  record(delta: TokenUsageDelta): void {
    this.input += delta.input ?? 0;
    this.output += delta.output ?? 0;
    this.cacheCreationInput += delta.cacheCreationInput ?? 0;
    this.cacheReadInput += delta.cacheReadInput ?? 0;
    if (!this.finalized) {
      this.listener?.(this.snapshot());
    }
  }

  absorb(usage: TokenUsage): void {
    this.input += usage.input;
    this.output += usage.output;
    this.cacheCreationInput += usage.cacheCreationInput;
    this.cacheReadInput += usage.cacheReadInput;
  }

  snapshot(): TokenUsage {
    return {
      input: this.input,
      output: this.output,
      total: this.input + this.output,
      cacheCreationInput: this.cacheCreationInput,
      cacheReadInput: this.cacheReadInput,
      final: this.finalized,
    };
  }

  /** Marks the totals authoritative. The listener hears about it once. */
  finalize(): TokenUsage {
    if (this.finalized) {
      return this.snapshot();
    }
    this.finalized = true;
    const usage = this.snapshot();
    this.listener?.(usage);
    return usage;
  }

  get isFinal(): boolean {
    return this.finalized;
  }
}
