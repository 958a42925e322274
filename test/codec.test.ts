/**
 * test/codec.test.ts
 *
 * Content <-> token transformation, including hostile tokens.
 */

import { deflate } from 'pako';
import { describe, expect, it } from 'vitest';
import {
  base64UrlToBytes,
  bytesToBase64Url,
  DEFAULT_MAX_CONTENT_BYTES,
  decodeToken,
  encodeContent,
  INFLATE_CHUNK_SIZE,
} from '../shared/codec.js';
import { CodecError } from '../shared/errors.js';

function codecErrorOf(fn: () => unknown): CodecError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CodecError) return e;
    throw e;
  }
  throw new Error('Expected a CodecError');
}

describe('encodeContent / decodeToken', () => {
  it('round-trips simple HTML', () => {
    const html = '<!DOCTYPE html><h1>Hello</h1><script>alert(1)</script>';
    expect(decodeToken(encodeContent(html))).toBe(html);
  });

  it('encodes the empty string to the zlib stream of zero bytes', () => {
    expect(encodeContent('')).toBe('eNoDAAAAAAE');
    expect(decodeToken('eNoDAAAAAAE')).toBe('');
  });

  it('round-trips multi-byte Unicode', () => {
    const text = 'Привет, мир! 你好 🚀 emoji 👩‍👩‍👧 and ñ';
    expect(decodeToken(encodeContent(text))).toBe(text);
  });

  it('keeps a leading byte order mark', () => {
    const text = '\uFEFF<p>bom</p>';
    expect(decodeToken(encodeContent(text))).toBe(text);
  });

  it('round-trips long content', () => {
    let text = '';
    for (let i = 0; i < 20000; i++) {
      text += `<li data-i="${i}">${(i * 7919) % 1000}</li>\n`;
    }
    expect(decodeToken(encodeContent(text))).toBe(text);
  });

  it('is deterministic', () => {
    const html = '<main><p>same in, same out</p></main>';
    expect(encodeContent(html)).toBe(encodeContent(html));
  });

  it('produces only URL-safe characters', () => {
    let text = '';
    for (let i = 0; i < 3000; i++) {
      text += String.fromCharCode(32 + ((i * 31337) ^ (i >> 3)) % 95);
    }
    expect(encodeContent(text)).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('decodes tokens issued by the earlier service', () => {
    expect(decodeToken('eNqzyTC0y8i00QdSABNmAyc')).toBe('<h1>hi</h1>');
  });
});

describe('decodeToken failures', () => {
  it('rejects characters outside the URL-safe alphabet', () => {
    expect(codecErrorOf(() => decodeToken('eNo+AAAA')).kind).toBe('malformed-text');
    expect(codecErrorOf(() => decodeToken('eNoDAAAAAAE=')).kind).toBe('malformed-text');
    expect(codecErrorOf(() => decodeToken('NOT BASE64')).kind).toBe('malformed-text');
  });

  it('rejects lengths no base64 string can have', () => {
    expect(codecErrorOf(() => decodeToken('A')).kind).toBe('malformed-text');
    expect(codecErrorOf(() => decodeToken('AAAAA')).kind).toBe('malformed-text');
  });

  it('rejects bytes that are not a zlib stream', () => {
    const token = bytesToBase64Url(new Uint8Array([1, 2, 3, 4]));
    expect(codecErrorOf(() => decodeToken(token)).kind).toBe('malformed-data');
  });

  it('rejects an empty token', () => {
    expect(codecErrorOf(() => decodeToken('')).kind).toBe('malformed-data');
  });

  it('rejects a truncated stream', () => {
    const bytes = base64UrlToBytes(encodeContent('<p>truncated somewhere in the middle</p>'));
    const token = bytesToBase64Url(bytes.slice(0, bytes.length - 4));
    expect(codecErrorOf(() => decodeToken(token)).kind).toBe('malformed-data');
  });

  it('rejects content that is not UTF-8', () => {
    const token = bytesToBase64Url(deflate(new Uint8Array([0xff, 0xfe, 0xfd])));
    expect(codecErrorOf(() => decodeToken(token)).kind).toBe('malformed-data');
  });

  it('stops a deflate bomb at the default ceiling', () => {
    const bomb = encodeContent('\0'.repeat(8 * DEFAULT_MAX_CONTENT_BYTES));
    expect(bomb.length).toBeLessThan(20_000);
    expect(codecErrorOf(() => decodeToken(bomb)).kind).toBe('size-exceeded');
  });

  it('stops inflating within one chunk of the ceiling', () => {
    const bomb = encodeContent('\0'.repeat(8 * DEFAULT_MAX_CONTENT_BYTES));
    const error = codecErrorOf(() => decodeToken(bomb, { maxContentBytes: 1000 }));

    expect(error.kind).toBe('size-exceeded');
    const stoppedAfter = Number(/stopped after (\d+) bytes/.exec(error.message)?.[1]);
    expect(stoppedAfter).toBeGreaterThan(1000);
    expect(stoppedAfter).toBeLessThanOrEqual(1000 + INFLATE_CHUNK_SIZE);
  });

  it('replaces lone surrogates with U+FFFD', () => {
    expect(decodeToken(encodeContent('a\uD800b'))).toBe('a\uFFFDb');
  });

  it('honours a custom ceiling', () => {
    const token = encodeContent('x'.repeat(11));
    expect(codecErrorOf(() => decodeToken(token, { maxContentBytes: 10 })).kind).toBe(
      'size-exceeded'
    );
    expect(decodeToken(token, { maxContentBytes: 11 })).toBe('x'.repeat(11));
  });
});

describe('base64url helpers', () => {
  it('omits padding', () => {
    expect(bytesToBase64Url(new Uint8Array([0xfb, 0xff]))).toBe('-_8');
  });

  it('reads what it writes', () => {
    const bytes = new Uint8Array([0, 1, 2, 250, 251, 252, 253, 254, 255]);
    expect(base64UrlToBytes(bytesToBase64Url(bytes))).toEqual(bytes);
  });
});
