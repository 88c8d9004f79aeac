// src/routes/matchRoutes.ts

import { Router, Request, Response } from 'express';
import { EngineContext } from '../engine/engineContext';
import { parseRequest } from '../middleware/validation';
import { patientQuerySchema } from '../utils/validation';

/**
 * Normal (non-emergency) match
 * GET /api/match?bloodType=&site=
 */
export function createMatchRoutes(context: EngineContext, now: () => Date): Router {
    const router = Router();

    router.get('/', (req: Request, res: Response) => {
        const { bloodType, site } = parseRequest(patientQuerySchema, req.query);
        const { donor, distanceKm } = context.matchingEngine.findBestDonor(bloodType, site, now());

        res.json({ matchFound: true, donor, distanceKm });
    });

    return router;
}
