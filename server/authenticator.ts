/**
 * server/authenticator.ts
 *
 * Keyed integrity for link tokens.
 *
 *   sign:   token                 -> token "." base64url(HMAC-SHA256(key, token))
 *   verify: token "." candidateTag -> recompute, constant-time compare, decode
 *
 * Only the server (and whoever holds SECRET_KEY) can mint a tag the server
 * accepts. The tag covers the token TEXT, so any edited character in a
 * link is caught before decompression ever runs.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import nacl from 'tweetnacl';
import { bytesToBase64Url, decodeToken } from '../shared/codec.js';
import { AuthError } from '../shared/errors.js';
import { PAYLOAD_SEPARATOR } from '../shared/linkFormat.js';
import type { Content, DecodeOptions, EncodedToken, SignedPayload } from '../shared/types.js';

const encoder = new TextEncoder();

/**
 * Computes the tag text for a token: unpadded base64url of HMAC-SHA256 over
 * the token's UTF-8 bytes, keyed with the key's UTF-8 bytes.
 */
export function computeTag(token: EncodedToken, key: string): string {
  const tag = hmac(sha256, encoder.encode(key), encoder.encode(token));
  return bytesToBase64Url(tag);
}

/**
 * Constant-time string equality.
 *
 * nacl.verify inspects every byte of equal-length inputs before answering,
 * so timing does not reveal how long the matching prefix is. It returns
 * false for empty or differently sized inputs.
 */
export function constantTimeEqual(a: string, b: string): boolean {
  return nacl.verify(encoder.encode(a), encoder.encode(b));
}

/**
 * Binds a token to a key. Deterministic.
 */
export function signToken(token: EncodedToken, key: string): SignedPayload {
  return `${token}${PAYLOAD_SEPARATOR}${computeTag(token, key)}`;
}

/**
 * Splits a payload on its last separator.
 *
 * @throws AuthError (`malformed-payload`) when there is no separator or the
 *   token part is empty.
 */
export function splitPayload(payload: string): { token: EncodedToken; tag: string } {
  const at = payload.lastIndexOf(PAYLOAD_SEPARATOR);
  if (at < 0) {
    throw new AuthError('malformed-payload', 'Payload has no tag separator');
  }
  if (at === 0) {
    throw new AuthError('malformed-payload', 'Payload has an empty token');
  }
  return {
    token: payload.slice(0, at),
    tag: payload.slice(at + PAYLOAD_SEPARATOR.length),
  };
}

/**
 * Verifies a signed payload and, only if the tag matches, decodes it.
 *
 * Tags are compared as TEXT rather than as decoded bytes: the last base64
 * character carries filler bits, and two tag strings that decode to the
 * same bytes must still count as different links.
 *
 * @throws AuthError when the payload is malformed or the tag does not match
 * @throws CodecError unchanged from {@link decodeToken} after a valid tag
 */
export function verifyAndDecode(
  payload: string,
  key: string,
  options: DecodeOptions = {}
): Content {
  const { token, tag } = splitPayload(payload);
  const expected = computeTag(token, key);

  if (!constantTimeEqual(expected, tag)) {
    throw new AuthError('signature-mismatch', 'Payload tag does not match');
  }

  return decodeToken(token, options);
}

// ============================================================================
// KEY-BOUND AUTHENTICATOR
// ============================================================================

export interface AuthenticatorOptions extends DecodeOptions {
  /** The process-wide secret. Never changes for the lifetime of the instance. */
  key: string;
}

/**
 * The signing functions bound to one immutable key, injected at
 * construction.
 */
export class Authenticator {
  private readonly key: string;
  private readonly keyDigest: string;
  private readonly decodeOptions: DecodeOptions;

  constructor(options: AuthenticatorOptions) {
    this.key = options.key;
    this.keyDigest = computeTag(options.key, options.key);
    this.decodeOptions = { maxContentBytes: options.maxContentBytes };
  }

  sign(token: EncodedToken): SignedPayload {
    return signToken(token, this.key);
  }

  verifyAndDecode(payload: string): Content {
    return verifyAndDecode(payload, this.key, this.decodeOptions);
  }

  /**
   * Constant-time check that a caller-supplied credential is this key.
   *
   * Both sides are keyed digests of the same length, so the comparison takes
   * as long for a short guess as for a full-length one.
   */
  matchesKey(candidate: string): boolean {
    return constantTimeEqual(this.keyDigest, computeTag(candidate, this.key));
  }
}
