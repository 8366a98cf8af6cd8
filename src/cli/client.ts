import { loadConfig } from '../config/loader.js';
import { createLogger } from '../logging/logger.js';
import { ListingSearchClient } from '../client/searchClient.js';
import type { ClientTransport } from '../client/searchClient.js';

/** Runs `fn` against the service described by the local config, then closes the client. */
export async function withClient(fn: (client: ListingSearchClient) => Promise<void>): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const transport: ClientTransport = config.api.socketPath
    ? { socketPath: config.api.socketPath }
    : { baseUrl: `http://${config.api.host}:${config.api.port}` };
  const client = new ListingSearchClient({ ...transport, token: config.api.token, logger });
  try {
    await fn(client);
  } finally {
    await client.close();
  }
}
