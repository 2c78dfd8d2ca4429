import { createServer } from 'http';
import { createApp } from './app';
import { cardDataService, config } from './singletons';
import logger from './utils/logger';

// Fail fast: no requests are served without a card snapshot
cardDataService.load();

const app = createApp();
const httpServer = createServer(app);

httpServer.listen(config.port, '0.0.0.0', () => {
  logger.info(`[Server] Running on http://0.0.0.0:${config.port}`);
});

const gracefulShutdown = () => {
  logger.info('[Server] Received kill signal, shutting down gracefully');

  httpServer.close(() => {
    logger.info('[Server] Closed out remaining connections');
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('[Server] Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);
