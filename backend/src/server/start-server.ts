import { Express } from 'express';
import { Server } from 'node:http';
import { logger } from '../utils/logger.js';

interface StartServerOptions {
  app: Express;
  port: string | number;
}

export const startServer = ({ app, port }: StartServerOptions): Server => {
  const server = app.listen(port, () => logger.info(`Fishing safety backend listening on ${port}`));

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Shutting down...`);
    server.close((err) => {
      if (err) {
        logger.error('Graceful shutdown failed', { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });

    setTimeout(() => {
      logger.error('Shutdown timeout reached, forcing exit.');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.stack : String(reason) });
  });
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.stack });
    shutdown('uncaughtException');
  });

  return server;
};
