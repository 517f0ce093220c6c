/**
 * Blunder Chapters API - Entry Point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { createApp } from './app.js';
import { analysisDefaultsFromConfig, config, engineOptionsFromConfig, validateConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { EngineSession } from './engine/EngineSession.js';
import { ChessComClient } from './services/ChessComClient.js';
import { ChapterPublisher } from './services/ChapterPublisher.js';
import { LichessStudyClient } from './services/LichessStudyClient.js';

const startServer = async () => {
  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  const defaults = analysisDefaultsFromConfig();

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      stockfishPath: config.stockfishPath,
      depth: defaults.depth,
      metric: defaults.metric,
    },
    'Starting Blunder Chapters API'
  );

  // One engine session for the lifetime of the server
  let engine: EngineSession;
  try {
    logger.info('Starting engine session...');
    engine = await EngineSession.open(engineOptionsFromConfig());
    logger.info('Engine session ready');
  } catch (error) {
    logger.error({ err: error }, 'Failed to start engine session');
    process.exit(1);
  }

  const chesscom = new ChessComClient({ userAgent: config.chesscomUserAgent });
  const publisher =
    config.lichessToken && config.lichessStudyId
      ? new ChapterPublisher(new LichessStudyClient({ token: config.lichessToken }), config.lichessStudyId)
      : null;

  const app = createApp({
    engine,
    openGameSource: (username, maxGames) => chesscom.iterateGames(username, maxGames),
    publisher,
    defaults,
  });

  // Start HTTP server
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');
    });

    try {
      await engine.close();
    } catch (error) {
      logger.error({ err: error }, 'Error closing engine session');
    }

    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
};

startServer().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
