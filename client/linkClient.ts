/**
 * client/linkClient.ts
 *
 * Helpers for programs that issue or open links against a running server:
 * admin scripts, CI jobs that publish a build as a link, and tests.
 *
 * The secret key only ever travels to the server's own generation endpoint.
 * Links themselves carry no secret: the tag proves origin, it unlocks
 * nothing.
 */

import { payloadFromQuery } from '../shared/linkFormat.js';
import type {
  ErrorResponse,
  GenerateRequest,
  GenerateResponse,
  SignedPayload,
} from '../shared/types.js';

function isErrorResponse(body: unknown): body is ErrorResponse {
  return (
    typeof body === 'object' &&
    body !== null &&
    'error' in body &&
    typeof body.error === 'string'
  );
}

function isGenerateResponse(body: unknown): body is GenerateResponse {
  return (
    typeof body === 'object' &&
    body !== null &&
    'url' in body &&
    typeof body.url === 'string' &&
    'payload' in body &&
    typeof body.payload === 'string' &&
    'length' in body &&
    typeof body.length === 'number'
  );
}

// ============================================================================
// ISSUING
// ============================================================================

/**
 * Asks a server to mint a link.
 *
 * @param serverUrl - Base URL of the server (e.g., 'http://localhost:3000')
 * @param request - Application source plus the server's secret key
 * @throws Error with the server's message when the request is refused
 */
export async function requestLink(
  serverUrl: string,
  request: GenerateRequest
): Promise<GenerateResponse> {
  const response = await fetch(`${serverUrl.replace(/\/+$/, '')}/api/generate`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(request),
  });

  const body: unknown = await response.json();

  if (!response.ok) {
    throw new Error(isErrorResponse(body) ? body.error : 'Failed to generate link');
  }
  if (!isGenerateResponse(body)) {
    throw new Error('Unexpected response from link generator');
  }

  return body;
}

// ============================================================================
// OPENING
// ============================================================================

/**
 * Pulls the signed payload out of a link URL.
 *
 * Accepts current links (`?p=<token>.<tag>`) and legacy ones
 * (`?d=<token>&s=<hex tag>`). Returns null when the URL carries no link.
 */
export function extractPayload(url: string): SignedPayload | null {
  return payloadFromQuery(Object.fromEntries(new URL(url).searchParams));
}

/**
 * Opens a link and returns the application HTML.
 *
 * @throws Error when the server refuses the link
 */
export async function fetchApp(url: string): Promise<string> {
  const response = await fetch(url);
  const text = await response.text();

  if (!response.ok) {
    throw new Error(`Link refused (${response.status}): ${text}`);
  }

  return text;
}
