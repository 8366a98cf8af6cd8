import Fastify, {
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import type { SearchService } from '../search/searchService.js';
import type { Logger } from '../logging/logger.js';
import { ListingSearchError } from '../errors/base.js';
import { registerAuthHook } from './auth.js';
import { registerIndexRoute } from './routes/indexDocument.js';
import { registerRemoveRoute } from './routes/remove.js';
import { registerSearchRoute } from './routes/search.js';
import { registerRebuildRoute } from './routes/rebuild.js';
import { registerHealthRoute } from './routes/health.js';

export type ApiServer = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  Logger
>;

export interface ApiServerDeps {
  service: SearchService;
  logger: Logger;
  /** Shared secret expected in the x-service-token header. */
  token: string;
  /** Rebuild payloads carry the whole catalogue. */
  bodyLimit?: number;
}

const STATUS_BY_CODE: Record<string, number> = {
  AUTHENTICATION_ERROR: 401,
  INVALID_FILTER: 400,
  INVALID_REQUEST: 400,
  ENCODING_ERROR: 500,
  INDEX_STORE_ERROR: 500,
};

function statusFor(err: Error): number {
  if (err instanceof ListingSearchError) return STATUS_BY_CODE[err.code] ?? 500;
  if ('statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400) {
    return err.statusCode;
  }
  return 500;
}

/**
 * Creates a Fastify server with auth and all 5 routes registered.
 * Does NOT call listen() — caller must do that (or use server.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): ApiServer {
  const app = Fastify({
    loggerInstance: deps.logger,
    bodyLimit: deps.bodyLimit ?? 64 * 1024 * 1024,
  });

  app.setErrorHandler<Error>(async (err, req, reply) => {
    const status = statusFor(err);
    if (status >= 500) {
      req.log.error({ err }, 'request failed');
    } else {
      req.log.info({ status, reason: err.message }, 'request rejected');
    }
    return reply.status(status).send({ error: err.message });
  });

  registerAuthHook(app, deps.token);
  registerIndexRoute(app, deps.service);
  registerRemoveRoute(app, deps.service);
  registerSearchRoute(app, deps.service);
  registerRebuildRoute(app, deps.service);
  registerHealthRoute(app, deps.service);

  return app;
}
