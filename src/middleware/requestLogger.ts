// src/middleware/requestLogger.ts

import { NextFunction, Request, Response } from 'express';
import { logger } from '../config/logger';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const startedAt = Date.now();
    res.on('finish', () => {
        logger.http(`${req.method} ${req.originalUrl}`, {
            status: res.statusCode,
            durationMs: Date.now() - startedAt
        });
    });
    next();
}
