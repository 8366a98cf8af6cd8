import { Agent, request } from 'undici';
import type { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type {
  ListingDocument,
  RankedResult,
  WhereClause,
} from '../types/search.types.js';
import {
  healthResponseSchema,
  okResponseSchema,
  rebuildResponseSchema,
  searchResponseSchema,
} from '../api/schemas.js';
import type { HealthResponse } from '../api/schemas.js';
import { TOKEN_HEADER } from '../api/auth.js';
import { ListingSearchError } from '../errors/base.js';
import type { Outcome } from './outcome.js';
import { failure, success } from './outcome.js';

export type ClientTransport = { socketPath: string } | { baseUrl: string };

export type ListingSearchClientOptions = ClientTransport & {
  token: string;
  logger: Logger;
  /** Per-request timeout for everything but rebuild. */
  timeoutMs?: number;
  rebuildTimeoutMs?: number;
};

export interface SearchParams {
  query: string;
  filters?: WhereClause | null;
  limit?: number;
  /** Return every raw neighbour instead of the cut-off list. */
  bypassCutoff?: boolean;
}

export class ServiceRequestError extends ListingSearchError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'SERVICE_REQUEST_ERROR', cause);
  }
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_REBUILD_TIMEOUT_MS = 300_000;

function errorMessage(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return undefined;
}

/**
 * Client for the search sidecar, used by the owning application.
 *
 * Index and remove are side effects of unrelated user actions, so they never
 * throw: the caller gets an Outcome and failures are logged. Search degrades
 * to an empty list. Create one client per process and close() it on shutdown.
 */
export class ListingSearchClient {
  private readonly agent: Agent;
  private readonly origin: string;
  private readonly token: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly rebuildTimeoutMs: number;

  constructor(options: ListingSearchClientOptions) {
    if ('socketPath' in options) {
      this.agent = new Agent({ connect: { socketPath: options.socketPath } });
      this.origin = 'http://listing-search';
    } else {
      this.agent = new Agent();
      this.origin = options.baseUrl.replace(/\/+$/, '');
    }
    this.token = options.token;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rebuildTimeoutMs = options.rebuildTimeoutMs ?? DEFAULT_REBUILD_TIMEOUT_MS;
  }

  async index(doc: ListingDocument): Promise<Outcome> {
    try {
      await this.call('POST', '/index', doc, okResponseSchema);
      return success();
    } catch (err) {
      this.logger.error({ err, id: doc.id }, 'failed to index listing');
      return failure(err);
    }
  }

  async remove(id: string): Promise<Outcome> {
    try {
      await this.call('POST', '/remove', { id }, okResponseSchema);
      return success();
    } catch (err) {
      this.logger.error({ err, id }, 'failed to remove listing');
      return failure(err);
    }
  }

  /** Best match first. Any failure yields an empty list. */
  async search(params: SearchParams): Promise<RankedResult[]> {
    try {
      const body = {
        query: params.query,
        filters: params.filters ?? null,
        limit: params.limit ?? 20,
      };
      const path = params.bypassCutoff ? '/search?bypass_cutoff=1' : '/search';
      const response = await this.call('POST', path, body, searchResponseSchema);
      return response.results;
    } catch (err) {
      this.logger.error({ err }, 'vector search failed');
      return [];
    }
  }

  /** Number of listings indexed, or the reason the rebuild failed. */
  async rebuild(listings: ListingDocument[]): Promise<Outcome<number>> {
    try {
      const response = await this.call(
        'POST',
        '/rebuild',
        { listings },
        rebuildResponseSchema,
        this.rebuildTimeoutMs,
      );
      return success(response.count);
    } catch (err) {
      this.logger.error({ err }, 'vector index rebuild failed');
      return failure<number>(err);
    }
  }

  /** Throws when the service is unreachable. */
  async health(): Promise<HealthResponse> {
    return this.call('GET', '/health', undefined, healthResponseSchema);
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private async call<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    payload: unknown,
    schema: S,
    timeoutMs = this.timeoutMs,
  ): Promise<z.output<S>> {
    let statusCode: number;
    let body: unknown;
    try {
      const response = await request(`${this.origin}${path}`, {
        method,
        dispatcher: this.agent,
        headers: {
          [TOKEN_HEADER]: this.token,
          ...(payload === undefined ? {} : { 'content-type': 'application/json' }),
        },
        ...(payload === undefined ? {} : { body: JSON.stringify(payload) }),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      statusCode = response.statusCode;
      body = await response.body.json();
    } catch (err) {
      throw new ServiceRequestError(`Request to ${path} failed`, undefined, err);
    }

    if (statusCode >= 400) {
      throw new ServiceRequestError(
        `${path} responded ${statusCode}: ${errorMessage(body) ?? 'unknown error'}`,
        statusCode,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ServiceRequestError(`Unexpected response from ${path}`, statusCode, parsed.error);
    }
    return parsed.data;
  }
}
