// src/middleware/validation.ts

import { z } from 'zod';
import { MissingFieldError } from '../utils/errors';

/**
 * Parse request input against a presence schema
 *
 * Any shape failure is reported as the first offending field.
 *
 * @throws MissingFieldError
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
        throw new MissingFieldError(field);
    }
    return parsed.data;
}
