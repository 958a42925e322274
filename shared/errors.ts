/**
 * shared/errors.ts
 *
 * Typed failures raised while decoding or verifying a link.
 *
 * ORACLE NOTE: The `kind` is for internal logs only. The HTTP layer maps
 * every LinkError to the same generic response so a caller cannot learn
 * which verification stage rejected a forged link.
 */

export type CodecErrorKind = 'malformed-data' | 'malformed-text' | 'size-exceeded';

export type AuthErrorKind = 'malformed-payload' | 'signature-mismatch';

export type LinkErrorKind = CodecErrorKind | AuthErrorKind;

/**
 * Base class for every recoverable link failure.
 */
export abstract class LinkError extends Error {
  abstract readonly kind: LinkErrorKind;
}

/**
 * The token text or the compressed stream inside it is unusable.
 */
export class CodecError extends LinkError {
  readonly kind: CodecErrorKind;

  constructor(kind: CodecErrorKind, message: string) {
    super(message);
    this.name = 'CodecError';
    this.kind = kind;
  }
}

/**
 * The payload is not shaped like `token.tag`, or its tag does not match.
 */
export class AuthError extends LinkError {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, message: string) {
    super(message);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

export function isLinkError(error: unknown): error is LinkError {
  return error instanceof LinkError;
}
