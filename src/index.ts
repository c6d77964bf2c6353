import { buildApp } from './app';
import { config } from './config';
import pool from './db';
import { logger } from './utils/logger';

const server = buildApp().listen(config.PORT, () => {
  logger.info(`API listening on :${config.PORT}`);
});

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

signals.forEach(signal => {
  process.on(signal, () => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    server.close(err => {
      if (err) logger.error({ err }, 'error while closing HTTP server');
      pool
        .end()
        .then(() => {
          logger.info('Server closed');
          process.exit(0);
        })
        .catch((poolErr: unknown) => {
          logger.error({ err: poolErr }, 'error while closing MySQL pool');
          process.exit(1);
        });
    });
  });
});
