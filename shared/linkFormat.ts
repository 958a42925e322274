/**
 * shared/linkFormat.ts
 *
 * Where a payload sits inside a link URL.
 *
 *   current: <domain>/?p=<token>.<base64url tag>
 *   legacy:  <domain>/?d=<token>&s=<hex tag>
 *
 * Legacy links were issued by the earlier service. Their tag is the same
 * HMAC-SHA256 over the same token, only written in hex, so they are
 * rewritten into the current shape and checked by the same verifier.
 */

import { bytesToBase64Url } from './codec.js';
import type { SignedPayload } from './types.js';

/**
 * Joins token and tag. Absent from the base64url alphabet, so the last
 * occurrence always marks where the tag starts.
 */
export const PAYLOAD_SEPARATOR = '.';

/**
 * Query parameters of a link, as parsed by Express or URLSearchParams.
 */
export type LinkQuery = Readonly<Record<string, unknown>>;

const HEX_TAG = /^[0-9a-f]{64}$/;

/**
 * Rewrites a legacy `d`/`s` pair into the current payload shape.
 *
 * Legacy tags were always written as lowercase hex. A tag that is not 64
 * lowercase hex digits becomes an empty tag, which the verifier rejects like
 * any other mismatch.
 */
export function legacyPayload(token: string, hexTag: string): SignedPayload {
  const tag = HEX_TAG.test(hexTag)
    ? bytesToBase64Url(new Uint8Array(Buffer.from(hexTag, 'hex')))
    : '';
  return `${token}${PAYLOAD_SEPARATOR}${tag}`;
}

/**
 * Extracts the signed payload from a link's query, or null when the query
 * carries no link at all.
 */
export function payloadFromQuery(query: LinkQuery): SignedPayload | null {
  const { p, d, s } = query;
  if (typeof p === 'string' && p.length > 0) {
    return p;
  }
  if (typeof d === 'string' && typeof s === 'string' && d.length > 0 && s.length > 0) {
    return legacyPayload(d, s);
  }
  return null;
}

/**
 * `<domain>/?p=<payload>`. The payload alphabet needs no escaping.
 */
export function buildLinkUrl(domain: string, payload: SignedPayload): string {
  return `${domain.replace(/\/+$/, '')}/?p=${payload}`;
}
