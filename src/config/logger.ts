// src/config/logger.ts

import winston from 'winston';
import { config } from './config';

/**
 * Human-readable format for local development
 */
const developmentFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.colorize({ all: true }),
    winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
        let line = `${timestamp} [${level}]: ${message}`;
        if (stack) {
            line += `\n${stack}`;
        }
        if (Object.keys(meta).length > 0) {
            line += ` ${JSON.stringify(meta)}`;
        }
        return line;
    })
);

/**
 * Structured format for production log shipping
 */
const productionFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

export const logger = winston.createLogger({
    level: config.logging.level,
    defaultMeta: { service: 'blood-donor-matching' },
    format: config.isDevelopment ? developmentFormat : productionFormat,
    transports: [new winston.transports.Console()],
    silent: config.isTest
});
