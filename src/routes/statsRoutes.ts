// src/routes/statsRoutes.ts

import { Router, Request, Response } from 'express';
import { EngineContext } from '../engine/engineContext';

/**
 * Read-only reporting routes
 */
export function createStatsRoutes(context: EngineContext, now: () => Date): Router {
    const router = Router();

    /**
     * Donor totals and eligible counts per blood type
     * GET /api/stats
     */
    router.get('/stats', (_req: Request, res: Response) => {
        const rows = context.ledger.aggregateStats(context.registry, now());
        res.json(Object.fromEntries(rows.map(({ bloodType, total, eligible }) => [bloodType, { total, eligible }])));
    });

    /**
     * Match history, most recent first
     * GET /api/matching-history
     */
    router.get('/matching-history', (_req: Request, res: Response) => {
        const matches = context.ledger.query();
        res.json({ totalMatches: matches.length, matches });
    });

    /**
     * Configured sites
     * GET /api/sites
     */
    router.get('/sites', (_req: Request, res: Response) => {
        res.json({ sites: context.graph.listSites() });
    });

    return router;
}
