import express from 'express';
import type { AdminAuthSettings } from './config/adminAuth';
import type { RecipeBook } from './domains/pricing';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createAuthRouter } from './routes/auth.routes';
import { createEstimateRouter } from './routes/estimate.routes';
import { createMaterialsRouter } from './routes/materials.routes';
import { createQuotesRouter } from './routes/quotes.routes';
import type { MaterialCostStore } from './services/materials.service';
import type { QuoteService } from './services/quotes.service';

export type AppDeps = {
  quotes: QuoteService;
  materials: MaterialCostStore;
  recipeBook: RecipeBook;
  adminAuth: AdminAuthSettings;
  logRequests?: boolean;
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  if (deps.logRequests !== false) {
    app.use(requestLoggerMiddleware);
  }

  app.use(createEstimateRouter(deps.recipeBook));
  app.use(createQuotesRouter(deps.quotes));
  app.use(createMaterialsRouter(deps.materials, deps.adminAuth));
  app.use(createAuthRouter(deps.adminAuth));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
