import type { LocalizedItem } from '../types.js';

export const DecoderState = {
  Scanning: 'scanning',
  InReasoningBlock: 'in_reasoning_block',
  InItem: 'in_item',
  AwaitingClose: 'awaiting_close',
} as const;

export type DecoderState = (typeof DecoderState)[keyof typeof DecoderState];

export interface DecoderCallbacks {
  onItem?: (item: LocalizedItem) => void;
  onReasoningStart?: () => void;
  onReasoningDelta?: (text: string) => void;
  onReasoningEnd?: (fullText: string) => void;
}

interface Segment {
  text: string;
  quoted: boolean;
}

const ITEM_OPEN = '<item>';
const ITEM_CLOSE = '</item>';
const CDATA_OPEN = '<![CDATA[';
const CDATA_CLOSE = ']]>';
const REASONING_TAGS = ['thinking', 'reasoning'];
const SCAN_MARKERS = [ITEM_OPEN, CDATA_OPEN, ...REASONING_TAGS.map((tag) => `<${tag}>`)];

const FIELD_OPEN = /^<([A-Za-z_][\w.-]*)>/;
const PARTIAL_TAG = /^<\/?[A-Za-z_]?[\w.-]*$/;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#')) {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const codePoint = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function isPartialMarker(buffer: string, markers: readonly string[]): boolean {
  return markers.some((marker) => buffer.length < marker.length && marker.startsWith(buffer));
}

/** Length of the longest suffix of `text` that could be the start of `marker`. */
function partialSuffixLength(text: string, marker: string): number {
  for (let length = Math.min(text.length, marker.length - 1); length > 0; length--) {
    if (text.endsWith(marker.slice(0, length))) {
      return length;
    }
  }
  return 0;
}

function renderSegments(segments: readonly Segment[]): string {
  let result = '';
  let plain = '';
  for (const segment of segments) {
    if (segment.quoted) {
      result += decodeEntities(plain) + segment.text;
      plain = '';
    } else {
      plain += segment.text;
    }
  }
  return (result + decodeEntities(plain)).trim();
}

/**
 * Incremental tokenizer for the `<item><key/><trx/><comment/></item>` reply
 * format. Chunks can be split anywhere; each item is emitted once, as soon
 * as its closing marker has been read. CDATA sections are opaque.
 */
export class StreamingResponseDecoder {
  private buffer = '';
  private currentState: DecoderState = DecoderState.Scanning;
  private reasoningTag = '';
  private reasoningText = '';
  private field: string | null = null;
  private quoted = false;
  private segments: Segment[] = [];
  private fields = new Map<string, string>();
  private muted = false;
  private readonly emittedKeys = new Set<string>();
  private readonly items: LocalizedItem[] = [];

  constructor(private readonly callbacks: DecoderCallbacks = {}) {}

  get state(): DecoderState {
    return this.currentState;
  }

  get emitted(): readonly LocalizedItem[] {
    return this.items;
  }

  feed(chunk: string): void {
    if (chunk === '') return;
    this.buffer += chunk;
    let progressed = true;
    while (progressed) {
      progressed = this.step();
    }
  }

  /**
   * Ends the stream. An unfinished item is dropped. With `fullText`, the
   * whole reply is tokenized again and only keys not seen yet are emitted.
   */
  finish(fullText?: string): LocalizedItem[] {
    this.resetTokenizer();
    if (fullText !== undefined) {
      this.muted = true;
      try {
        this.feed(fullText);
      } finally {
        this.muted = false;
        this.resetTokenizer();
      }
    }
    return [...this.items];
  }

  private step(): boolean {
    switch (this.currentState) {
      case DecoderState.Scanning:
        return this.scan();
      case DecoderState.InReasoningBlock:
        return this.readReasoning();
      case DecoderState.InItem:
        return this.field === null ? this.readItemMarkup() : this.readField();
      case DecoderState.AwaitingClose:
        return this.resolveClose();
    }
  }

  private scan(): boolean {
    if (this.quoted) return this.skipQuoted();
    if (!this.skipToMarkup()) return false;

    if (this.buffer.startsWith(CDATA_OPEN)) {
      this.consume(CDATA_OPEN.length);
      this.quoted = true;
      return true;
    }

    if (this.buffer.startsWith(ITEM_OPEN)) {
      this.consume(ITEM_OPEN.length);
      this.beginItem();
      return true;
    }

    for (const tag of REASONING_TAGS) {
      const open = `<${tag}>`;
      if (this.buffer.startsWith(open)) {
        this.consume(open.length);
        this.reasoningTag = tag;
        this.reasoningText = '';
        this.currentState = DecoderState.InReasoningBlock;
        if (!this.muted) this.callbacks.onReasoningStart?.();
        return true;
      }
    }

    if (isPartialMarker(this.buffer, SCAN_MARKERS)) return false;

    this.consume(1);
    return true;
  }

  // CDATA outside an item is dropped without looking for markers in it.
  private skipQuoted(): boolean {
    const end = this.buffer.indexOf(CDATA_CLOSE);
    if (end !== -1) {
      this.consume(end + CDATA_CLOSE.length);
      this.quoted = false;
      return true;
    }
    this.buffer = this.buffer.slice(this.buffer.length - partialSuffixLength(this.buffer, CDATA_CLOSE));
    return false;
  }

  private readReasoning(): boolean {
    const close = `</${this.reasoningTag}>`;
    const end = this.buffer.indexOf(close);
    if (end !== -1) {
      this.appendReasoning(this.buffer.slice(0, end));
      this.consume(end + close.length);
      this.currentState = DecoderState.Scanning;
      if (!this.muted) this.callbacks.onReasoningEnd?.(this.reasoningText);
      this.reasoningText = '';
      return true;
    }

    const keep = partialSuffixLength(this.buffer, close);
    this.appendReasoning(this.buffer.slice(0, this.buffer.length - keep));
    this.buffer = this.buffer.slice(this.buffer.length - keep);
    return false;
  }

  private readItemMarkup(): boolean {
    if (!this.skipToMarkup()) return false;

    if (this.buffer.startsWith(ITEM_CLOSE)) {
      this.consume(ITEM_CLOSE.length);
      this.completeItem();
      return true;
    }
    if (isPartialMarker(this.buffer, [ITEM_CLOSE])) {
      this.currentState = DecoderState.AwaitingClose;
      return false;
    }
    // An item that was never closed is abandoned when the next one opens.
    if (this.buffer.startsWith(ITEM_OPEN)) {
      this.consume(ITEM_OPEN.length);
      this.beginItem();
      return true;
    }

    const open = FIELD_OPEN.exec(this.buffer);
    if (open) {
      this.consume(open[0].length);
      this.field = open[1];
      this.quoted = false;
      this.segments = [];
      return true;
    }
    if (PARTIAL_TAG.test(this.buffer)) return false;

    const end = this.buffer.indexOf('>');
    if (end === -1) return false;
    this.consume(end + 1);
    return true;
  }

  private resolveClose(): boolean {
    if (this.buffer.startsWith(ITEM_CLOSE)) {
      this.consume(ITEM_CLOSE.length);
      this.completeItem();
      return true;
    }
    if (isPartialMarker(this.buffer, [ITEM_CLOSE])) return false;
    this.currentState = DecoderState.InItem;
    return true;
  }

  private readField(): boolean {
    if (this.quoted) {
      const end = this.buffer.indexOf(CDATA_CLOSE);
      if (end !== -1) {
        this.segments.push({ text: this.buffer.slice(0, end), quoted: true });
        this.consume(end + CDATA_CLOSE.length);
        this.quoted = false;
        return true;
      }
      const keep = partialSuffixLength(this.buffer, CDATA_CLOSE);
      const text = this.buffer.slice(0, this.buffer.length - keep);
      if (text) this.segments.push({ text, quoted: true });
      this.buffer = this.buffer.slice(this.buffer.length - keep);
      return false;
    }

    const close = `</${this.field}>`;
    const start = this.buffer.indexOf('<');
    if (start === -1) {
      this.segments.push({ text: this.buffer, quoted: false });
      this.buffer = '';
      return false;
    }
    if (start > 0) {
      this.segments.push({ text: this.buffer.slice(0, start), quoted: false });
      this.buffer = this.buffer.slice(start);
    }

    if (this.buffer.startsWith(CDATA_OPEN)) {
      this.consume(CDATA_OPEN.length);
      this.quoted = true;
      return true;
    }
    if (this.buffer.startsWith(close)) {
      this.consume(close.length);
      this.finishField();
      return true;
    }
    // Unterminated field: the item close is handled by the item markup reader.
    if (this.buffer.startsWith(ITEM_CLOSE)) {
      this.finishField();
      return true;
    }
    if (isPartialMarker(this.buffer, [CDATA_OPEN, close, ITEM_CLOSE])) return false;

    this.segments.push({ text: '<', quoted: false });
    this.consume(1);
    return true;
  }

  /** Drops text up to the next `<`. Returns false when there is none. */
  private skipToMarkup(): boolean {
    const start = this.buffer.indexOf('<');
    if (start === -1) {
      this.buffer = '';
      return false;
    }
    if (start > 0) {
      this.buffer = this.buffer.slice(start);
    }
    return true;
  }

  private beginItem(): void {
    this.currentState = DecoderState.InItem;
    this.fields = new Map();
    this.field = null;
    this.segments = [];
    this.quoted = false;
  }

  private finishField(): void {
    if (this.field !== null && !this.fields.has(this.field)) {
      this.fields.set(this.field, renderSegments(this.segments));
    }
    this.field = null;
    this.segments = [];
    this.quoted = false;
  }

  private completeItem(): void {
    const key = this.fields.get('key') ?? '';
    const translated = this.fields.get('trx') ?? '';
    const comment = this.fields.get('comment');
    this.currentState = DecoderState.Scanning;
    this.fields = new Map();

    if (key === '' || this.emittedKeys.has(key)) return;

    const item: LocalizedItem = comment ? { key, translated, comment } : { key, translated };
    this.emittedKeys.add(key);
    this.items.push(item);
    this.callbacks.onItem?.(item);
  }

  private appendReasoning(text: string): void {
    if (text === '') return;
    this.reasoningText += text;
    if (!this.muted) this.callbacks.onReasoningDelta?.(text);
  }

  private consume(length: number): void {
    this.buffer = this.buffer.slice(length);
  }

  private resetTokenizer(): void {
    this.buffer = '';
    this.currentState = DecoderState.Scanning;
    this.reasoningTag = '';
    this.reasoningText = '';
    this.field = null;
    this.quoted = false;
    this.segments = [];
    this.fields = new Map();
  }
}

/** One-shot decoding of a complete reply. */
export function decodeResponse(text: string): LocalizedItem[] {
  return new StreamingResponseDecoder().finish(text);
}
