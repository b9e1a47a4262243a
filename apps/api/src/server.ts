import { createLogger, serializeError } from '@usersvc/shared';

import { createApp } from './app';
import { loadConfig } from './config';
import { ApiObservability } from './observability';
import { UserService } from './users-service';
import { UserStore } from './users-store';

const config = loadConfig();
const logger = createLogger({ service: config.serviceName, level: config.logLevel });

const store = new UserStore();
const users = new UserService(store);
const observability = new ApiObservability();

const app = createApp({
  serviceName: config.serviceName,
  users,
  logger,
  observability,
});

const server = app.listen(config.port, () => {
  logger.info('api listening', { port: config.port });
});

server.on('error', (error: unknown) => {
  logger.error('api server error', serializeError(error));
  process.exitCode = 1;
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info('api stopping', { signal });
  server.close((error?: Error) => {
    if (error) {
      logger.error('api shutdown failed', serializeError(error));
      process.exitCode = 1;
      return;
    }
    logger.info('api stopped');
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
