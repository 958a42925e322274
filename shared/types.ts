/**
 * shared/types.ts
 *
 * Type definitions for the Stateless App Runner.
 * These interfaces define the data structures that flow between the admin
 * client, the HTTP layer and the link codec.
 *
 * STATELESS PRINCIPLE:
 * Nothing here has an id or a timestamp. An application exists only as the
 * signed payload inside its own URL; the server stores none of them.
 */

/**
 * HTML/JS source of one application. Opaque to the codec.
 */
export type Content = string;

/**
 * Unpadded URL-safe base64 of the zlib-compressed UTF-8 content.
 */
export type EncodedToken = string;

/**
 * Wire form of a link: `<EncodedToken>.<base64url HMAC-SHA256 tag>`.
 */
export type SignedPayload = string;

/**
 * Tuning knobs for decoding untrusted tokens.
 */
export interface DecodeOptions {
  /**
   * Largest number of decompressed bytes accepted before decoding is aborted.
   * Links come from untrusted URLs, so this ceiling is always applied.
   */
  maxContentBytes?: number;
}

/**
 * Options applied on the generation path, before encoding.
 */
export interface GenerateOptions {
  /** Strip comments and collapse whitespace before compressing. */
  minify?: boolean;
}

/**
 * Request body for the link generation endpoint.
 */
export interface GenerateRequest {
  /** The application source to embed. */
  html: string;

  /**
   * Must equal the server's secret key. Acts as the admin credential:
   * only holders of the key may mint links the server will accept.
   */
  key: string;

  /** Base URL the link points at. Defaults to the server's APP_DOMAIN. */
  domain?: string;

  minify?: boolean;
}

/**
 * Response from the link generation endpoint.
 */
export interface GenerateResponse {
  /** Full shareable URL: `<domain>/?p=<payload>` */
  url: string;

  payload: SignedPayload;

  /** Length of `url` in characters, shown by the admin page. */
  length: number;
}

/**
 * Error body returned by the JSON endpoints.
 */
export interface ErrorResponse {
  error: string;
}

/**
 * Response from the health endpoint.
 */
export interface HealthResponse {
  status: 'ok';
}
