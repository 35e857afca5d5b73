import dotenv from 'dotenv';
dotenv.config();

import { validateEnv } from './config/env-validator';
import { logger } from './utils/logger';
import { createApp } from './app';
import { loadCatalog } from './modules/catalog/catalog.loader';
import { createWorkloadNarrator } from './modules/workload/narrator.factory';

// Global unhandled exception handlers
process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception - Process will exit', { processEvent: 'uncaughtException' }, error);
    process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error('Unhandled Promise Rejection', { processEvent: 'unhandledRejection' }, error);
});

async function bootstrap() {
    const config = validateEnv();
    logger.setLevel(config.logLevel);

    const catalog = await loadCatalog(config.dataDir);
    const narrator = createWorkloadNarrator(config);
    const app = createApp({ config, catalog, narrator });

    app.listen(config.port, () => {
        logger.info('Server started', { port: config.port, nodeEnv: config.nodeEnv, narrator: narrator.mode });
    });
}

bootstrap().catch((error: unknown) => {
    logger.error('Startup failed - service will not start', { processEvent: 'startup' }, error);
    process.exit(1);
});
