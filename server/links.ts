/**
 * server/links.ts
 *
 * The two operations the HTTP layer calls: turn an application into a link
 * payload, and turn a link payload back into the application.
 */

import { encodeContent } from '../shared/codec.js';
import { isLinkError, type LinkError } from '../shared/errors.js';
import type { Content, GenerateOptions, SignedPayload } from '../shared/types.js';
import type { Authenticator } from './authenticator.js';
import { minifyHtml } from './minify.js';

/**
 * Outcome of resolving a link. Bad links are values, not exceptions.
 */
export type ResolveResult =
  | { ok: true; content: Content }
  | { ok: false; error: LinkError };

/**
 * Link generation and resolution bound to one authenticator.
 */
export class LinkService {
  constructor(private readonly authenticator: Authenticator) {}

  generateLink(content: Content, options: GenerateOptions = {}): SignedPayload {
    const source = options.minify ? minifyHtml(content) : content;
    return this.authenticator.sign(encodeContent(source));
  }

  /**
   * Verifies and decodes a payload. Only LinkErrors are turned into results;
   * anything else is a bug and propagates.
   */
  resolveLink(payload: string): ResolveResult {
    try {
      return { ok: true, content: this.authenticator.verifyAndDecode(payload) };
    } catch (error) {
      if (isLinkError(error)) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Whether a caller-supplied credential is the signing key.
   */
  authorize(candidateKey: string): boolean {
    return this.authenticator.matchesKey(candidateKey);
  }
}
