import express, { Express } from 'express';
import { AppConfig } from './config/env-validator';
import { errorMiddleware, notFoundMiddleware } from './middlewares/error.middleware';
import { createPublicRateLimiter } from './middlewares/rate-limit.middleware';
import { requestLoggerMiddleware } from './middlewares/request-logger.middleware';
import { Catalog } from './modules/catalog/catalog.types';
import { CatalogService } from './modules/catalog/catalog.service';
import { createCatalogRouter } from './modules/catalog/catalog.routes';
import { HealthController } from './modules/health/health.controller';
import { PlannerService } from './modules/planner/planner.service';
import { createPlannerRouter } from './modules/planner/planner.routes';
import { WorkloadNarrator } from './modules/workload/workload.types';

export interface AppDependencies {
    config: Pick<AppConfig, 'schedule' | 'rateLimitMax'>;
    catalog: Catalog;
    narrator: WorkloadNarrator;
}

export function createApp({ config, catalog, narrator }: AppDependencies): Express {
    const app = express();

    const catalogService = new CatalogService(catalog);
    const plannerService = new PlannerService(catalog, narrator, config.schedule);
    const healthController = new HealthController(catalogService, narrator);

    app.disable('x-powered-by');
    app.use(express.json({ limit: '100kb' }));
    app.use(requestLoggerMiddleware);

    app.get('/health', healthController.check);

    const api = express.Router();
    api.use(createPublicRateLimiter(config.rateLimitMax));
    api.use(createCatalogRouter(catalogService));
    api.use('/planner', createPlannerRouter(plannerService));
    app.use('/api/v1', api);

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
