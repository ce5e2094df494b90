import { config as loadEnv } from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { closeStores, initStores, openStores } from './repo';
import { createLogger } from './utils/logger';

loadEnv();

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const stores = openStores(config.database);
  await initStores(stores);
  logger.info('PhoneBook and audit stores ready');

  const app = createApp({ stores, logger });
  const server = app.listen(config.server.port, () => {
    logger.info({ port: config.server.port }, 'PhoneBook service listening');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    server.close((closeError) => {
      if (closeError) logger.error({ err: closeError }, 'HTTP server close failed');
      closeStores(stores).then(
        () => logger.info('Stores closed'),
        (err: unknown) => {
          logger.error({ err }, 'Closing stores failed');
          process.exitCode = 1;
        },
      );
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  createLogger('fatal').fatal({ err }, 'PhoneBook service failed to start');
  process.exit(1);
});
