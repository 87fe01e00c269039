import dotenv from 'dotenv';
import RedisStore from 'connect-redis';
import { createApp } from './app';
import { loadConfig, usesDefaultSuperadmin } from './config';
import { DatabaseConnection } from './database/connection';
import { RedisConnection } from './database/redis';
import { AllocationRepository } from './database/repositories/AllocationRepository';
import { MonthlyHoursRepository } from './database/repositories/MonthlyHoursRepository';
import { AuthService } from './services/AuthService';
import { DashboardService } from './services/DashboardService';
import { DirectoryService } from './services/DirectoryService';
import { MonthlyHoursService } from './services/MonthlyHoursService';
import { RoleResolver } from './services/RoleResolver';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  const config = loadConfig();

  if (usesDefaultSuperadmin(config)) {
    logger.log(
      config.env === 'production' ? 'warn' : 'info',
      'Superadmin login is enabled with the default credentials; set SUPERADMIN_PASSWORD'
    );
  }
  if (!config.directory.url) {
    logger.warn('LDAP_SERVER is not set; directory logins will be refused');
  }

  const redis = new RedisConnection(config.redis);
  await redis.connect();

  const database = new DatabaseConnection(config.database);
  await database.connect();

  const directory = new DirectoryService(config.directory);
  const authService = new AuthService(
    config.superadmin,
    directory,
    new RoleResolver({ adminGroups: config.directory.adminGroups })
  );
  const dashboardService = new DashboardService({
    allocations: new AllocationRepository(database),
    directory,
    hoursPerFteMonth: config.hoursPerFteMonth
  });
  const monthlyHoursService = new MonthlyHoursService(
    new MonthlyHoursRepository(database),
    config.hoursPerFteMonth
  );

  const app = createApp({
    config,
    sessionStore: new RedisStore({
      client: redis.getClient(),
      prefix: 'allocation:sess:',
      ttl: config.session.ttlSeconds
    }),
    authService,
    directory,
    dashboardService,
    monthlyHoursService
  });

  const server = app.listen(config.port, () => {
    logger.info('Resource allocation portal started', {
      port: config.port,
      environment: config.env
    });
  });

  const gracefulShutdown = (signal: string): void => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');

      Promise.all([database.disconnect(), redis.disconnect()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error)
          });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason)
    });
    process.exit(1);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
