// src/utils/validation.ts

import { z } from 'zod';
import { MIN_URGENCY } from '../models/EmergencyTicket';

// Field-presence schemas for the HTTP boundary. Domain checks (canonical
// blood type, known site, urgency range) stay in the engine.

export const requiredString = z.string().trim().min(1);

export const donorRegistrationSchema = z.object({
    name: requiredString,
    bloodType: requiredString,
    site: requiredString,
    lastDonationDate: requiredString,
    totalDonations: z.number().int().nonnegative().optional()
});

export const patientQuerySchema = z.object({
    bloodType: requiredString,
    site: requiredString
});

export const bloodTypeQuerySchema = z.object({
    bloodType: requiredString
});

/**
 * Urgency defaults to most urgent when omitted. Numbers and numeric
 * strings go to the engine for range checking; any other value becomes
 * NaN so the engine rejects it.
 */
export const urgencySchema = z.unknown().transform(value => {
    if (value === undefined || value === null) {
        return MIN_URGENCY;
    }
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        return Number(value);
    }
    return Number.NaN;
});

export const emergencySubmissionSchema = z.object({
    urgency: urgencySchema,
    patient: patientQuerySchema
});

export const siteGraphSchema = z
    .object({
        sites: z.array(requiredString).min(1),
        edges: z.array(z.object({
            from: requiredString,
            to: requiredString,
            km: z.number().nonnegative().finite()
        }))
    })
    .superRefine((graph, ctx) => {
        const known = new Set(graph.sites);
        graph.edges.forEach((edge, index) => {
            for (const end of ['from', 'to'] as const) {
                if (!known.has(edge[end])) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ['edges', index, end],
                        message: `Unknown site ${edge[end]}`
                    });
                }
            }
        });
    });

export const sampleDonorsSchema = z.array(donorRegistrationSchema);
