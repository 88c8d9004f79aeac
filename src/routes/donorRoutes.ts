// src/routes/donorRoutes.ts

import { Router, Request, Response } from 'express';
import { EngineContext } from '../engine/engineContext';
import { parseRequest } from '../middleware/validation';
import { bloodTypeQuerySchema, donorRegistrationSchema } from '../utils/validation';

/**
 * Donor routes - HTTP mapping only
 * Business logic delegated to the registry
 */
export function createDonorRoutes(context: EngineContext): Router {
    const router = Router();

    /**
     * Register a donor
     * POST /api/donors
     * Body: { name, bloodType, site, lastDonationDate, totalDonations? }
     */
    router.post('/', (req: Request, res: Response) => {
        const registration = parseRequest(donorRegistrationSchema, req.body);
        const donor = context.registry.register(registration);

        res.status(201).json({ message: 'Donor added successfully', donor });
    });

    /**
     * List all donors in registration order
     * GET /api/donors
     */
    router.get('/', (_req: Request, res: Response) => {
        const donors = context.registry.listAll();
        res.json({ total: donors.length, donors });
    });

    /**
     * Donors of one blood type
     * GET /api/donors/search?bloodType=
     */
    router.get('/search', (req: Request, res: Response) => {
        const { bloodType } = parseRequest(bloodTypeQuerySchema, req.query);
        const donors = context.registry.listByType(bloodType);
        res.json({ total: donors.length, donors });
    });

    return router;
}
