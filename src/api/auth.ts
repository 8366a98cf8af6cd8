import { timingSafeEqual } from 'node:crypto';
import type { ApiServer } from './server.js';
import { AuthenticationError } from '../errors/request.js';

export const TOKEN_HEADER = 'x-service-token';

const PUBLIC_PATHS = new Set(['/health']);

function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Rejects every request without the shared secret before any route runs.
 * The health check stays reachable without it.
 */
export function registerAuthHook(app: ApiServer, token: string): void {
  app.addHook('onRequest', async (req) => {
    const path = req.url.split('?')[0] ?? req.url;
    if (PUBLIC_PATHS.has(path)) return;

    const presented = req.headers[TOKEN_HEADER];
    if (typeof presented !== 'string' || !tokensMatch(presented, token)) {
      throw new AuthenticationError();
    }
  });
}
