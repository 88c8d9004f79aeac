// src/models/BloodType.ts

/**
 * Canonical blood types, in table order
 */
export const BLOOD_TYPES = ['O-', 'O+', 'A-', 'A+', 'B-', 'B+', 'AB-', 'AB+'] as const;

export type BloodType = typeof BLOOD_TYPES[number];

export function isBloodType(value: string): value is BloodType {
    return BLOOD_TYPES.some(type => type === value);
}
