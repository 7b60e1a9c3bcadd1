import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { ContentHasher } from '../utils/content-hash.js';

describe('ContentHasher', () => {
  it('should hash the key and text as SHA-256 hex', () => {
    const expected = createHash('sha256').update('greeting:Hello', 'utf8').digest('hex');

    expect(ContentHasher.hash('greeting', 'Hello')).toBe(expected);
    expect(ContentHasher.hash('greeting', 'Hello')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should ignore whitespace differences unless told otherwise', () => {
    expect(ContentHasher.hash('k', '  Hello   world ')).toBe(ContentHasher.hash('k', 'Hello world'));
    expect(ContentHasher.hash('k', 'Hello  world', { normalizeWhitespace: false })).not.toBe(
      ContentHasher.hash('k', 'Hello world', { normalizeWhitespace: false })
    );
  });

  it('should treat a text moved to another key as changed only when the key is included', () => {
    expect(ContentHasher.hash('a', 'Hello')).not.toBe(ContentHasher.hash('b', 'Hello'));
    expect(ContentHasher.hash('a', 'Hello', { includeKey: false })).toBe(
      ContentHasher.hash('b', 'Hello', { includeKey: false })
    );
  });

  it('should checksum every entry of a record', () => {
    const checksums = ContentHasher.checksums({ a: 'One', b: 'Two' });

    expect(Object.keys(checksums)).toEqual(['a', 'b']);
    expect(checksums.a).toBe(ContentHasher.hash('a', 'One'));
  });
});
