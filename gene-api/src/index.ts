import { config, validateConfig } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { initializeGeneStore } from './services/dataset-loader';
import { openGeneStore } from './services/gene-store';
import { GeneQueryService } from './services/query-service';

async function main(): Promise<void> {
  validateConfig();

  const store = openGeneStore(config.database.url);
  // Seeding must finish before the server accepts traffic
  await initializeGeneStore(store, { dataFile: config.dataset.file });

  const app = createApp(new GeneQueryService(store));

  const server = app.listen(config.server.port, () => {
    logger.info(`🚀 ${config.api.title} running on port ${config.server.port}`);
    logger.info(`📊 Environment: ${config.server.nodeEnv}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    server.close(() => {
      logger.info('HTTP server closed');
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close gene store', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start gene API', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
