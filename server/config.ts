/**
 * server/config.ts
 *
 * Process configuration, read from the environment exactly once at startup.
 *
 * SECRET KEY LIFECYCLE:
 * If SECRET_KEY is unset, a random key is generated here and lives only in
 * memory. Links issued under it stop verifying when the process restarts.
 * That is an accepted limitation of keeping no server-side state.
 */

import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import nacl from 'tweetnacl';
import { bytesToBase64Url, DEFAULT_MAX_CONTENT_BYTES } from '../shared/codec.js';

export type SecretKeySource = 'env' | 'generated';

export interface ServerConfig {
  port: number;

  /** Default base URL of generated links. */
  domain: string;

  /** HMAC key shared by every link this process issues or accepts. */
  secretKey: string;

  secretKeySource: SecretKeySource;

  /** Decompression ceiling applied to every incoming link. */
  maxContentBytes: number;

  /** Directory holding index.html and admin.html. */
  publicDir: string;
}

const DEFAULT_PORT = 3000;

/**
 * Random key length in bytes, before base64url rendering (43 characters).
 */
const GENERATED_KEY_BYTES = 32;

/**
 * Generates a fresh URL-safe secret key.
 */
export function generateSecretKey(): string {
  return bytesToBase64Url(nacl.randomBytes(GENERATED_KEY_BYTES));
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * `public/` beside the sources when run with tsx, or two levels up from
 * dist/server when run from the build.
 */
function defaultPublicDir(): string {
  const candidates = ['../public', '../../public'].map((relative) =>
    fileURLToPath(new URL(relative, import.meta.url))
  );
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0];
}

/**
 * Builds the immutable server configuration.
 *
 * @param env - Environment to read; defaults to process.env
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServerConfig> {
  const port = parsePositiveInt(env['PORT'], DEFAULT_PORT);

  const providedKey = env['SECRET_KEY'];
  const secretKeySource: SecretKeySource = providedKey ? 'env' : 'generated';
  const secretKey = providedKey ? providedKey : generateSecretKey();

  return Object.freeze({
    port,
    domain: env['APP_DOMAIN'] || `http://localhost:${port}`,
    secretKey,
    secretKeySource,
    maxContentBytes: parsePositiveInt(env['MAX_CONTENT_BYTES'], DEFAULT_MAX_CONTENT_BYTES),
    publicDir: env['PUBLIC_DIR'] || defaultPublicDir(),
  });
}
