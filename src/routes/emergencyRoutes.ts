// src/routes/emergencyRoutes.ts

import { Router, Request, Response } from 'express';
import { EngineContext } from '../engine/engineContext';
import { parseRequest } from '../middleware/validation';
import { emergencySubmissionSchema } from '../utils/validation';

/**
 * Emergency routes - HTTP mapping only
 * Ordering and triage policy live in EmergencyQueue
 */
export function createEmergencyRoutes(context: EngineContext, now: () => Date): Router {
    const router = Router();
    const queue = context.emergencyQueue;

    /**
     * Submit an emergency request
     * POST /api/emergency
     * Body: { urgency?, patient: { bloodType, site } }
     */
    router.post('/', (req: Request, res: Response) => {
        const submission = parseRequest(emergencySubmissionSchema, req.body);
        const { ticket, position } = queue.submit(submission, now());

        res.status(201).json({
            message: 'Emergency request added to queue',
            requestId: ticket.id,
            urgency: ticket.urgency,
            positionInQueue: position
        });
    });

    /**
     * Process the most urgent request
     * POST /api/emergency/process
     *
     * An unmatched request is still consumed; reported with 200.
     */
    router.post('/process', (_req: Request, res: Response) => {
        const outcome = queue.processNext(now());

        if (!outcome.matched) {
            res.json({
                message: 'Emergency request processed but no match found',
                request: outcome.ticket,
                urgency: outcome.ticket.urgency,
                matchFound: false,
                error: { code: outcome.error.code, message: outcome.error.message },
                remainingRequests: queue.size()
            });
            return;
        }

        res.json({
            message: 'Emergency request processed successfully',
            request: outcome.ticket,
            urgency: outcome.ticket.urgency,
            matchFound: true,
            donor: outcome.match.donor,
            distanceKm: outcome.match.distanceKm,
            remainingRequests: queue.size()
        });
    });

    /**
     * View the queue without changing it
     * GET /api/emergency/queue
     */
    router.get('/queue', (_req: Request, res: Response) => {
        const tickets = queue.peekAll();
        res.json({ totalRequests: tickets.length, queue: tickets });
    });

    return router;
}
