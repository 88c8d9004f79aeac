// src/app.ts

import express from 'express';
import { config } from './config/config';
import { loadSampleDonors, loadSiteGraph } from './config/dataFiles';
import { logger } from './config/logger';
import { createEngineContext, EngineContext, seedDonors } from './engine/engineContext';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createDonorRoutes } from './routes/donorRoutes';
import { createEmergencyRoutes } from './routes/emergencyRoutes';
import { createMatchRoutes } from './routes/matchRoutes';
import { createStatsRoutes } from './routes/statsRoutes';

export interface AppOptions {
    now?: () => Date;  // Clock used for eligibility and match timestamps
}

/**
 * Express application setup
 *
 * The engine context is owned by the caller, so tests build an isolated
 * one per app instance.
 */
export function createApp(context: EngineContext, options: AppOptions = {}): express.Express {
    const now = options.now ?? (() => new Date());
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(requestLogger);

    // Routes
    app.use('/api/donors', createDonorRoutes(context));
    app.use('/api/match', createMatchRoutes(context, now));
    app.use('/api/emergency', createEmergencyRoutes(context, now));
    app.use('/api', createStatsRoutes(context, now));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            donors: context.registry.size(),
            queuedEmergencies: context.emergencyQueue.size(),
            matches: context.ledger.size()
        });
    });

    // Error handling
    app.use(errorHandler);

    return app;
}

// Start server
if (require.main === module) {
    const context = createEngineContext(loadSiteGraph(config.siteGraphPath));
    if (config.seed.enabled) {
        seedDonors(context, loadSampleDonors(config.seed.path));
    }

    createApp(context).listen(config.port, () => {
        logger.info(`Blood donor matching engine running on port ${config.port}`, {
            sites: context.graph.listSites().length,
            donors: context.registry.size()
        });
    });
}
