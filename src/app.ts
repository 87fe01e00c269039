import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Store } from 'express-session';
import { AppConfig } from './config';
import { AuthController } from './controllers/AuthController';
import { DashboardController } from './controllers/DashboardController';
import { DirectoryController } from './controllers/DirectoryController';
import { MeController } from './controllers/MeController';
import { PageController } from './controllers/PageController';
import { SettingsController } from './controllers/SettingsController';
import { correlationIdMiddleware } from './middleware/correlationId';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createLoginRateLimit } from './middleware/rateLimiting';
import { requestLogger } from './middleware/requestLogger';
import { createSessionMiddleware } from './middleware/session';
import { createApiRoutes } from './routes/apiRoutes';
import { createAuthRoutes } from './routes/authRoutes';
import { createPageRoutes } from './routes/pageRoutes';
import { AuthService } from './services/AuthService';
import { DashboardService } from './services/DashboardService';
import { DirectoryService } from './services/DirectoryService';
import { MonthlyHoursService } from './services/MonthlyHoursService';

export interface AppDependencies {
  config: AppConfig;
  sessionStore: Store;
  authService: AuthService;
  directory: DirectoryService;
  dashboardService: DashboardService;
  monthlyHoursService: MonthlyHoursService;
}

export const createApp = (deps: AppDependencies): express.Application => {
  const { config } = deps;
  const app = express();

  // Secure cookies behind a TLS-terminating proxy
  if (config.session.secureCookie) {
    app.set('trust proxy', 1);
  }

  // Correlation ID tracking (should be first)
  app.use(correlationIdMiddleware);

  app.use(helmet());

  app.use(cors({
    origin: config.allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-request-id', 'x-correlation-id']
  }));

  // Login accepts both JSON and form posts
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  app.use(requestLogger);

  app.use(createSessionMiddleware(config.session, deps.sessionStore));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  app.use('/auth', createAuthRoutes(
    new AuthController(deps.authService, config.session.cookieName),
    createLoginRateLimit(config.loginRateLimitMax)
  ));

  app.use('/api', createApiRoutes({
    me: new MeController(),
    directory: new DirectoryController(deps.directory),
    dashboard: new DashboardController(deps.dashboardService),
    settings: new SettingsController(deps.monthlyHoursService)
  }));

  app.use(createPageRoutes(new PageController()));

  app.use(notFoundHandler);

  // Global error handler
  app.use(errorHandler);

  return app;
};
