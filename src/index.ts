import dotenvFlow from 'dotenv-flow';
import type { Server } from 'http';

import { createApp } from './app';
import { createServices } from './bootstrap';
import { getAppConfig } from './config/appConfig';
import { getMercedesConfig, getTokenStoreConfig } from './config/mercedesConfig';
import { logger } from './utils/logger';

dotenvFlow.config({ silent: true });

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

let server: Server | undefined;
let shuttingDown = false;

const closeServer = (instance: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    instance.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
    // scrapers hold keep-alive connections open
    instance.closeIdleConnections();
  });

const start = async (): Promise<void> => {
  const appConfig = getAppConfig();
  const mercedes = getMercedesConfig();
  const tokenStore = getTokenStoreConfig();

  const services = await createServices({ app: appConfig, mercedes, tokenStore });
  const { state } = services.tokenManager.status();

  server = createApp(services, appConfig).listen(appConfig.port, () => {
    logger.info(
      { port: appConfig.port, vin: mercedes.vin, store: tokenStore.statePath, authState: state },
      'exporter listening',
    );
  });
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  logger.info({ signal }, 'shutdown signal received');

  if (server) {
    await closeServer(server);
  }

  logger.info('shutdown complete');
  process.exit(0);
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'exporter failed to start');
  process.exit(1);
});

shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'error during shutdown');
      process.exit(1);
    });
  });
});
