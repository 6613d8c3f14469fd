import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createFormsRouter, type FormsRouterDeps } from './routes/forms.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';

export type AppDeps = FormsRouterDeps;

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '20mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createFormsRouter(deps));

  app.use(errorHandler);

  return app;
}
