import type { BackendRequest, BackendResponse, BackendStreamEvent } from '../types.js';
import { BaseBackend, type CostConfig } from './base.js';

const STRING_LINE = /- `([^`]+)`: """([\s\S]*?)"""/g;
const TARGET_LOCALE = / to [^(\n]*\(([^)\n]+)\)\./;

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Offline backend. Translates every string to `[<locale>] <text>` and answers
 * judge prompts with "1". Replies arrive in small chunks like a real stream.
 */
export class MockBackend extends BaseBackend {
  readonly vendor = 'mock';
  protected readonly costConfig: CostConfig = { inputTokenCostPer1k: 0, outputTokenCostPer1k: 0 };

  constructor(
    model = 'mock',
    private readonly chunkSize = 16
  ) {
    super(model);
  }

  protected async executeStream(
    request: BackendRequest,
    onEvent: (event: BackendStreamEvent) => void
  ): Promise<BackendResponse> {
    const user = request.messages.map((message) => message.content).join('\n');
    const text = user.includes('\nCandidates:\n') ? '1' : this.translate(request.system, user);

    const input = this.estimateInputTokens(request.system + user);
    onEvent({ type: 'usage', delta: { input } });
    for (let offset = 0; offset < text.length; offset += this.chunkSize) {
      onEvent({ type: 'text', text: text.slice(offset, offset + this.chunkSize) });
    }
    const output = Math.ceil(text.length / 4);
    onEvent({ type: 'usage', delta: { output } });

    return { text, usage: { input, output }, stopReason: 'end_turn' };
  }

  private translate(system: string, user: string): string {
    const locale = TARGET_LOCALE.exec(system)?.[1] ?? 'xx';
    const items = [...user.matchAll(STRING_LINE)].map(
      ([, key, text]) => `  <item>\n    <key>${key}</key>\n    <trx>${escapeText(`[${locale}] ${text}`)}</trx>\n  </item>`
    );
    return `<translations>\n${items.join('\n')}\n</translations>`;
  }
}
