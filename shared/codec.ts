/**
 * shared/codec.ts
 *
 * Lossless content <-> URL token transformation.
 *
 *   content --UTF-8--> bytes --zlib level 9--> CompressedBlock --base64url--> token
 *
 * The codec knows nothing about secrets. It must stay deterministic: the
 * signature is computed over the token text, so the same content has to
 * produce the same token on every server that issues links.
 *
 * UNTRUSTED INPUT: tokens arrive in URLs. Decoding streams the inflater and
 * aborts as soon as the output passes the ceiling, so a small deflate bomb
 * never expands into memory.
 */

import { deflate, Inflate } from 'pako';
import { CodecError } from './errors.js';
import type { Content, DecodeOptions, EncodedToken } from './types.js';

/**
 * Default decompression ceiling: 1 MiB of HTML/JS per link.
 */
export const DEFAULT_MAX_CONTENT_BYTES = 1024 * 1024;

/**
 * zlib's maximum compression level. Part of the wire format: links issued by
 * earlier deployments were compressed at this level.
 */
const COMPRESSION_LEVEL = 9;

/**
 * Inflater output chunk size. Bounds how far past the ceiling decoding can
 * get before it is aborted.
 */
export const INFLATE_CHUNK_SIZE = 16 * 1024;

const Z_OK = 0;

const URL_SAFE_TEXT = /^[A-Za-z0-9_-]*$/;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

// ============================================================================
// URL-SAFE BASE64
// ============================================================================

/**
 * Encodes bytes as unpadded URL-safe base64 (RFC 4648 §5).
 */
export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Decodes unpadded URL-safe base64.
 *
 * Buffer's decoder silently skips characters it does not know, so the
 * alphabet and length are checked first.
 *
 * @throws CodecError (`malformed-text`) on characters outside `A-Z a-z 0-9 - _`
 *   or a length no base64 string can have.
 */
export function base64UrlToBytes(text: string): Uint8Array {
  if (!URL_SAFE_TEXT.test(text)) {
    throw new CodecError('malformed-text', 'Token contains characters outside the URL-safe alphabet');
  }
  if (text.length % 4 === 1) {
    throw new CodecError('malformed-text', `Token length ${text.length} is not valid base64`);
  }
  return new Uint8Array(Buffer.from(text, 'base64url'));
}

// ============================================================================
// COMPRESSION
// ============================================================================

function concatChunks(chunks: Uint8Array[], total: number): Uint8Array {
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Inflates a zlib stream, failing once more than `maxBytes` come out.
 */
function inflateBounded(compressed: Uint8Array, maxBytes: number): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  let endStatus: number | undefined;

  const inflator = new Inflate({ chunkSize: INFLATE_CHUNK_SIZE });

  inflator.onData = (chunk) => {
    const bytes = chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk);
    total += bytes.length;
    if (total > maxBytes) {
      // Throwing out of onData stops pako mid-stream.
      throw new CodecError(
        'size-exceeded',
        `Decompressed content exceeds the ${maxBytes} byte limit (stopped after ${total} bytes)`
      );
    }
    chunks.push(bytes);
  };

  inflator.onEnd = (status) => {
    endStatus = status;
  };

  inflator.push(compressed, true);

  if (endStatus === undefined) {
    throw new CodecError('malformed-data', 'Compressed stream is truncated');
  }
  if (endStatus !== Z_OK) {
    throw new CodecError('malformed-data', `Compressed stream is corrupt (zlib status ${endStatus})`);
  }

  return concatChunks(chunks, total);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Compresses content and renders it as a URL-safe token.
 *
 * Never fails for string input. `encodeContent('')` is `eNoDAAAAAAE`, the
 * zlib stream of zero bytes.
 *
 * Content is encoded as UTF-8, which cannot represent a lone surrogate: each
 * one is written as U+FFFD, so only well-formed text comes back unchanged.
 */
export function encodeContent(content: Content): EncodedToken {
  const compressed = deflate(encoder.encode(content), { level: COMPRESSION_LEVEL });
  return bytesToBase64Url(compressed);
}

/**
 * Reverses {@link encodeContent}.
 *
 * @throws CodecError
 *   - `malformed-text` when the token is not URL-safe base64
 *   - `malformed-data` when the bytes are not a complete zlib stream of UTF-8
 *   - `size-exceeded` when the output would pass `maxContentBytes`
 */
export function decodeToken(token: EncodedToken, options: DecodeOptions = {}): Content {
  const maxBytes = options.maxContentBytes ?? DEFAULT_MAX_CONTENT_BYTES;
  const compressed = base64UrlToBytes(token);
  const bytes = inflateBounded(compressed, maxBytes);

  try {
    return decoder.decode(bytes);
  } catch {
    throw new CodecError('malformed-data', 'Decompressed content is not valid UTF-8');
  }
}
