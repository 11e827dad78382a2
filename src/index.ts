import { createApp } from './app';
import { createContainer } from './container';
import { env } from './config/environment';
import { logger } from './config/logger';
import { createPersistenceGateway, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Wires the container, verifies the data store, seeds the first
 * quartermaster and starts the Express server with graceful shutdown
 */
async function startServer(): Promise<void> {
  const gateway = createPersistenceGateway(env);

  if (!(await testConnection(gateway))) {
    throw new Error('Database connection failed');
  }

  const container = createContainer(gateway, {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
    bcryptRounds: env.BCRYPT_ROUNDS,
  });

  await container.userService.ensureDefaultQuartermaster(
    env.DEFAULT_QUARTERMASTER_USERNAME,
    env.DEFAULT_QUARTERMASTER_PASSWORD
  );

  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Custody Inventory API Server                              ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(42)} ║
║  Data store:  ${env.DATA_STORE.padEnd(42)} ║
║  Port:        ${String(env.PORT).padEnd(42)} ║
║  Docs:        http://localhost:${env.PORT}/docs${' '.repeat(25)} ║
║  Health:      http://localhost:${env.PORT}/health${' '.repeat(23)} ║
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections');
  });

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
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
  logger.error('Failed to start server', { error });
  process.exit(1);
});
