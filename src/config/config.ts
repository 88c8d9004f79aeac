// src/config/config.ts

import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');

/**
 * Environment validation schema
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.string().regex(/^\d+$/, 'PORT must be a number').transform(Number).default('5000'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
    SITE_GRAPH_PATH: z.string().default('data/siteGraph.json'),
    SEED_SAMPLE_DONORS: z.enum(['true', 'false']).transform(v => v === 'true').default('false'),
    SAMPLE_DONORS_PATH: z.string().default('data/sampleDonors.json')
});

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Parse and validate environment into the application config
 *
 * Relative paths resolve against the project root so the same .env works
 * from src/ under tsx and from dist/ after a build.
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }

    const e = parsed.data;
    return {
        env: e.NODE_ENV,
        isDevelopment: e.NODE_ENV === 'development',
        isTest: e.NODE_ENV === 'test',
        port: e.PORT,
        logging: {
            level: e.LOG_LEVEL
        },
        siteGraphPath: path.resolve(PROJECT_ROOT, e.SITE_GRAPH_PATH),
        seed: {
            enabled: e.SEED_SAMPLE_DONORS,
            path: path.resolve(PROJECT_ROOT, e.SAMPLE_DONORS_PATH)
        }
    };
}

export const config = buildConfig();
