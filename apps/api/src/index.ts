import { createServer } from 'http';

import { createApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './core/logger/index.js';

const app = createApp();
const server = createServer(app);

server.on('error', (err) => {
  logger.fatal({ err, host: env.HOST, port: env.PORT }, 'API server failed');
  process.exit(1);
});

server.listen(env.PORT, env.HOST, () => {
  const baseUrl = `http://${env.HOST}:${env.PORT}`;
  logger.info({ baseUrl, host: env.HOST, port: env.PORT }, 'API server started');
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Received shutdown signal');

  server.close((err?: Error) => {
    if (err) {
      logger.error({ err }, 'Error during server shutdown');
      process.exit(1);
    }
    logger.info('Server closed');
    process.exit();
  });
};

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.on(signal, () => shutdown(signal));
});
