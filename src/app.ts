import express, { Express } from 'express';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createRoutes, RouteDependencies } from './routes';

export type AppDependencies = RouteDependencies;

/**
 * Build the Express app around its collaborators; nothing here touches global state.
 */
export function createApp(deps: AppDependencies): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/', createRoutes(deps));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
