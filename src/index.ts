import { createApp } from './app';
import { createContainerFromEnv, shutdownContainer } from './container';
import { env } from './config/environment';
import { logger } from './config/logger';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  const container = await createContainerFromEnv();

  // Verify the item store before accepting traffic
  await container.store.ping();
  logger.info('Item store connection verified', { store: container.storeDriver });

  // Leases held by clients of a previous run are dropped
  if (env.RELEASE_ON_STARTUP) {
    await container.maintenanceService.releaseAll();
  }

  const { scanned, registered } = await container.catalogService.sync();
  logger.info('Image directory scanned', { directory: container.catalogService.directory, scanned, registered });

  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Label Queue API Server                                    ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(44)} ║
║  Store:       ${container.storeDriver.padEnd(44)} ║
║  Port:        ${String(env.PORT).padEnd(44)} ║
║  Docs:        http://localhost:${env.PORT}/docs
║  Health:      http://localhost:${env.PORT}/health
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections');
  });

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string): void => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');

      shutdownContainer(container)
        .then(() => {
          logger.info('Shutting down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Failed to release reservations and close item store', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
