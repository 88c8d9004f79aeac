// src/middleware/errorHandler.ts

import { NextFunction, Request, Response } from 'express';
import { logger } from '../config/logger';
import { EngineError } from '../utils/errors';

/**
 * Map engine errors to their status; anything else is a 500
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof EngineError) {
        res.status(err.statusCode).json({ error: { code: err.code, message: err.message } });
        return;
    }

    // Malformed JSON body from express.json()
    if (err instanceof SyntaxError && 'body' in err) {
        res.status(400).json({ error: { code: 'MALFORMED_JSON', message: 'Request body is not valid JSON' } });
        return;
    }

    logger.error('Unhandled request error', { method: req.method, path: req.path, error: err.message, stack: err.stack });
    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: err.message } });
}
