import { createHash } from 'node:crypto';

export interface ChecksumOptions {
  /** Prefix the key so a text moved to another key counts as changed. */
  includeKey?: boolean;
  normalizeWhitespace?: boolean;
}

/** SHA-256 checksums used to detect source changes between runs. */
export class ContentHasher {
  static hash(key: string, text: string, options: ChecksumOptions = {}): string {
    const { includeKey = true, normalizeWhitespace = true } = options;
    let content = normalizeWhitespace ? text.trim().replace(/\s+/g, ' ') : text;
    if (includeKey) {
      content = `${key}:${content}`;
    }
    return createHash('sha256').update(content, 'utf8').digest('hex');
  }

  static checksums(texts: Record<string, string>, options: ChecksumOptions = {}): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, text] of Object.entries(texts)) {
      result[key] = this.hash(key, text, options);
    }
    return result;
  }
}
