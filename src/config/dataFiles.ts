// src/config/dataFiles.ts

import fs from 'fs';
import { z } from 'zod';
import { DonorRegistration } from '../models/Donor';
import { SiteGraphConfig } from '../models/Site';
import { sampleDonorsSchema, siteGraphSchema } from '../utils/validation';

function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.infer<S> {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join(', ');
        throw new Error(`Invalid data in ${filePath}: ${issues}`);
    }
    return parsed.data;
}

/**
 * Load and validate the site graph (sites plus symmetric km weights)
 */
export function loadSiteGraph(filePath: string): SiteGraphConfig {
    return readJsonFile(filePath, siteGraphSchema);
}

export function loadSampleDonors(filePath: string): DonorRegistration[] {
    return readJsonFile(filePath, sampleDonorsSchema);
}
