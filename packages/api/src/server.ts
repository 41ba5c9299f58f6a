// Standalone HTTP server
//
// Usage:
//   npm run serve                                  -> in-memory stores
//   PROCESSING_DATABASE_URL=... npm run serve      -> Postgres processing store

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { consoleLogger, describeError, loadConfig } from '@carechain/runtime';
import { createServices } from './services.js';
import { createContext } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

const logger = consoleLogger;
const config = loadConfig(process.env);
const services = createServices(config, { logger });

const server = createHTTPServer({
  router: appRouter,
  createContext: ({ req }) => createContext({ services, headers: req.headers }),
  onError({ path, error }) {
    if (error.code === 'INTERNAL_SERVER_ERROR') {
      logger.error('Request failed', { path, ...describeError(error.cause ?? error) });
    }
  },
});

server.listen(config.port);
logger.info('API listening', { port: config.port });

function shutdown(signal: string) {
  logger.info('Shutting down', { signal });
  server.close();
  services.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Failed to close stores', describeError(error));
      process.exit(1);
    }
  );
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
