/**
 * Puzzle Import API - Entry Point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { createApp } from './app.js';
import { config, validateConfig } from './config/index.js';
import { createServices } from './container.js';
import { ConfigError, exitCodeFor } from './utils/errors.js';
import { logger } from './utils/logger.js';

const startServer = async () => {
  const missing = validateConfig();
  if (missing.length > 0) {
    throw new ConfigError(`Missing configuration: ${missing.join(', ')}`, { missing });
  }

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      sourceMode: config.sourceMode,
      plyConvention: config.plyConvention,
    },
    'Starting Puzzle Import API'
  );

  const app = createApp(createServices());

  // Start HTTP server
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
};

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(exitCodeFor(error));
});
