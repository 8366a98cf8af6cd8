import type { Command } from 'commander';
import { rm } from 'node:fs/promises';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { createLogger } from '../../logging/logger.js';
import { createSearchService } from '../../search/index.js';
import { createApiServer } from '../../api/server.js';
import { parsePort } from '../options.js';

interface ServeOptions {
  socket?: string;
  host?: string;
  port?: number;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Load the model, open the index and serve the search API')
    .option('--socket <path>', 'Unix domain socket to listen on')
    .option('--host <h>', 'Host to bind to when no socket is configured')
    .option('--port <n>', 'Port to listen on when no socket is configured', parsePort)
    .action(async (opts: ServeOptions) => {
      const config = loadConfig();
      if (opts.socket) config.api.socketPath = opts.socket;
      if (opts.host) config.api.host = opts.host;
      if (opts.port) config.api.port = opts.port;
      validateConfig(config);

      const logger = createLogger({ level: config.logLevel });
      const service = await createSearchService(config, logger);
      const app = createApiServer({ service, logger, token: config.api.token });

      const { socketPath } = config.api;
      if (socketPath) {
        // A socket file left behind by a crashed process blocks listen()
        await rm(socketPath, { force: true });
        await app.listen({ path: socketPath });
      } else {
        await app.listen({ port: config.api.port, host: config.api.host });
      }

      let closing = false;
      const shutdown = (signal: NodeJS.Signals): void => {
        if (closing) return;
        closing = true;
        logger.info({ signal }, 'shutting down');
        void app
          .close()
          .then(() => service.close())
          .then(
            () => process.exit(0),
            (err: unknown) => {
              logger.error({ err }, 'shutdown failed');
              process.exit(1);
            },
          );
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
