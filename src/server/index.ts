import express from 'express';
import { createServer } from 'http';
import { WebSocketServer } from './websocket/server';
import { GameSessionManager } from './game/GameSessionManager';
import { logger } from './utils/logger';
import { config } from './config';

/**
 * HTTP side of the match server. Sensing clients talk over Socket.IO; the
 * HTTP routes only report liveness.
 */
export function createApp(sessionManager: GameSessionManager): express.Express {
  const app = express();

  app.get(['/health', '/healthz'], (_req, res) => {
    const { sessions, parties } = sessionManager.getStats();
    res.status(200).json({
      status: 'ok',
      version: config.app.version,
      sessions,
      parties,
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      error: {
        message: 'Route not found',
        code: 'NOT_FOUND',
      },
    });
  });

  return app;
}

function startServer() {
  const sessionManager = new GameSessionManager();
  const app = createApp(sessionManager);
  const server = createServer(app);
  const wsServer = new WebSocketServer(server, sessionManager);

  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Server running on ${config.server.host}:${config.server.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    wsServer
      .close()
      .then(() => {
        logger.info('Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception', { error });
    process.exit(1);
  });
}

if (require.main === module) {
  startServer();
}
