/**
 * server/app.ts
 *
 * HTTP surface of the Stateless App Runner.
 *
 * The server keeps nothing. GET / with a link payload verifies and returns
 * the embedded application; POST /api/generate mints payloads for holders
 * of the secret key.
 *
 * ORACLE RESISTANCE:
 * Every rejected link gets the same status and body, whether the payload was
 * malformed, forged or undecodable. Only the log records which stage failed.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { buildLinkUrl, payloadFromQuery } from '../shared/linkFormat.js';
import type {
  ErrorResponse,
  GenerateRequest,
  GenerateResponse,
  HealthResponse,
} from '../shared/types.js';
import { Authenticator } from './authenticator.js';
import type { ServerConfig } from './config.js';
import { LinkService } from './links.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Maximum JSON body size for link generation.
 */
const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export const INVALID_LINK_MESSAGE = 'Invalid or corrupted link';

/**
 * Sent on every response, errors and 404s included. Scripts and styles may
 * come from the two public CDNs embedded apps commonly use.
 */
export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'Content-Security-Policy': [
    "default-src 'self'",
    "script-src 'self' https://unpkg.com https://cdn.jsdelivr.net 'unsafe-inline'",
    "style-src 'self' https://cdn.jsdelivr.net https://unpkg.com 'unsafe-inline'",
    'img-src * data: blob:',
    'connect-src *',
    'font-src * data:',
    "frame-ancestors 'self'",
  ].join('; '),
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'SAMEORIGIN',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
};

export const generateRequestSchema = z.object({
  html: z.string({ required_error: 'html is required', invalid_type_error: 'html must be a string' }),
  key: z.string({ required_error: 'key is required', invalid_type_error: 'key must be a string' }),
  domain: z.string({ invalid_type_error: 'domain must be a string' }).optional(),
  minify: z.boolean({ invalid_type_error: 'minify must be a boolean' }).optional(),
}) satisfies z.ZodType<GenerateRequest>;

function httpStatusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

// ============================================================================
// EXPRESS APP
// ============================================================================

/**
 * Builds the Express application for one immutable configuration.
 */
export function createApp(config: Readonly<ServerConfig>): express.Express {
  const links = new LinkService(
    new Authenticator({ key: config.secretKey, maxContentBytes: config.maxContentBytes })
  );

  const app = express();

  app.disable('x-powered-by');

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.set(SECURITY_HEADERS);
    next();
  });

  app.use(express.json({ limit: MAX_PAYLOAD_SIZE }));

  /**
   * GET /
   *
   * With ?p=<payload> (or legacy ?d=&s=): runs the embedded application.
   * Without: the landing page.
   */
  app.get('/', (req: Request, res: Response, next: NextFunction) => {
    const payload = payloadFromQuery(req.query);

    if (payload === null) {
      res.sendFile('index.html', { root: config.publicDir }, (err) => {
        if (err) next(err);
      });
      return;
    }

    const result = links.resolveLink(payload);
    if (!result.ok) {
      // LOG NOTE: kind only. The payload itself is never logged.
      console.warn(`Rejected link (${result.error.kind})`);
      res.status(400).type('text/plain').send(INVALID_LINK_MESSAGE);
      return;
    }

    res.type('html').send(result.content);
  });

  /**
   * GET /admin
   *
   * Link generator form. Useless without the secret key.
   */
  app.get('/admin', (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile('admin.html', { root: config.publicDir }, (err) => {
      if (err) next(err);
    });
  });

  /**
   * POST /api/generate
   *
   * Mints a link for { html, key, domain?, minify? }. The key must be the
   * server's own secret, so only its holders can issue links.
   */
  app.post(
    '/api/generate',
    (req: Request, res: Response<GenerateResponse | ErrorResponse>) => {
      const parsed = generateRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          error: parsed.error.issues[0]?.message ?? 'Invalid request',
        });
        return;
      }

      const { html, key, domain, minify } = parsed.data;

      if (!links.authorize(key)) {
        res.status(403).json({ error: 'Invalid key' });
        return;
      }

      const payload = links.generateLink(html, { minify });
      const url = buildLinkUrl(domain || config.domain, payload);

      res.json({ url, payload, length: url.length });
    }
  );

  /**
   * Health check endpoint.
   */
  app.get('/api/health', (_req: Request, res: Response<HealthResponse>) => {
    res.json({ status: 'ok' });
  });

  app.use((_req: Request, res: Response<ErrorResponse>) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response<ErrorResponse>, _next: NextFunction) => {
    const status = httpStatusOf(err);
    if (status < 500) {
      res.status(status).json({ error: status === 404 ? 'Not found' : 'Invalid request' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
