// src/engine/compatibility.ts

import { BloodType, isBloodType } from '../models/BloodType';
import { InvalidBloodTypeError } from '../utils/errors';

/**
 * Who can receive from whom
 *
 * Keyed by patient type; values are donor types in preference-neutral
 * table order. Directed: O- gives to everyone, AB+ receives from everyone.
 */
const BLOOD_COMPATIBILITY: Readonly<Record<BloodType, readonly BloodType[]>> = {
    'O-': ['O-'],
    'O+': ['O-', 'O+'],
    'A-': ['O-', 'A-'],
    'A+': ['O-', 'O+', 'A-', 'A+'],
    'B-': ['O-', 'B-'],
    'B+': ['O-', 'O+', 'B-', 'B+'],
    'AB-': ['O-', 'A-', 'B-', 'AB-'],
    'AB+': ['O-', 'O+', 'A-', 'A+', 'B-', 'B+', 'AB-', 'AB+']
};

/**
 * Normalize user-supplied blood type text
 *
 * Decodes URL escaping ("AB%2B"), strips all whitespace, upper-cases.
 * Malformed escapes are left as typed and fail canonical lookup later.
 */
export function normalizeBloodType(raw: string): string {
    let decoded = raw;
    try {
        decoded = decodeURIComponent(raw);
    } catch (err) {
        if (!(err instanceof URIError)) {
            throw err;
        }
    }
    return decoded.replace(/\s+/g, '').toUpperCase();
}

/**
 * Normalize and validate a blood type
 *
 * @throws InvalidBloodTypeError if not one of the 8 canonical types
 */
export function parseBloodType(raw: string): BloodType {
    const normalized = normalizeBloodType(raw);
    if (!isBloodType(normalized)) {
        throw new InvalidBloodTypeError(raw);
    }
    return normalized;
}

/**
 * Donor types a patient of the given type may receive from
 *
 * @throws InvalidBloodTypeError for a non-canonical patient type
 */
export function compatibleDonorTypes(patientType: string): readonly BloodType[] {
    return BLOOD_COMPATIBILITY[parseBloodType(patientType)];
}
